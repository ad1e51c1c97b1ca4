// src/types/gauge-types.ts

import type { Decimal } from 'decimal.js';
import type {
  GaugeMeasureMode,
  GaugeMeasureState,
  GaugeMeasureUnit,
} from '../constants/wire-codes.js';

// !=============================================================================
// ! Measurement
// !=============================================================================

/** Measure returned by the gauge for a `D` request */
export interface GaugeMeasure {
  readonly value: Decimal;
  readonly unit: GaugeMeasureUnit;
  readonly mode: GaugeMeasureMode;
  readonly state: GaugeMeasureState;
}

// !=============================================================================
// ! Transport
// !=============================================================================

/** Byte stream the protocol handler talks through */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  /**
   * Resolves with every byte up to and including `terminator`, or with whatever has
   * accumulated once `timeout` elapses. A timeout never rejects.
   */
  readUntil(terminator: number, timeout?: number): Promise<Uint8Array>;
  flush?(): Promise<void>;
}

/** Link settings of a connection type */
export interface GaugeProfile {
  readonly name: string;
  readonly baudRate: number;
  /** Hardware (RTS/CTS) flow control */
  readonly rtscts: boolean;
  /** Per-read timeout, milliseconds */
  readonly readTimeout: number;
}

/** Options for the Node.js serialport transport */
export interface NodeSerialTransportOptions {
  baudRate?: number;
  rtscts?: boolean;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  readTimeout?: number;
  maxBufferSize?: number;
}

/** Options handed to the serial port factory */
export interface SerialPortFactoryOptions {
  path: string;
  baudRate: number;
  rtscts: boolean;
  dataBits: 5 | 6 | 7 | 8;
  stopBits: 1 | 2;
  parity: 'none' | 'even' | 'mark' | 'odd' | 'space';
}

/** Subset of the `serialport` stream API used by the transport */
export interface SerialPortHandle {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
  write(data: Uint8Array, callback: (err: Error | null | undefined) => void): boolean;
  drain(callback: (err: Error | null) => void): void;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  removeAllListeners(event: string): unknown;
}

export type SerialPortFactory = (options: SerialPortFactoryOptions) => SerialPortHandle;

/** Options for the emulator-backed transport */
export interface EmulatorTransportOptions {
  readTimeout?: number;
}

// !=============================================================================
// ! Protocol and session
// !=============================================================================

/** Lifecycle of a protocol handler */
export type GaugeProtocolState = 'awaiting-banner' | 'ready' | 'powered-off' | 'detached';

export interface GaugeProtocolOptions {
  /** Read timeout used for every exchange, milliseconds */
  readTimeout?: number;
  /** Collect exchange statistics */
  diagnostics?: boolean;
}

export interface GaugeSessionOptions extends GaugeProtocolOptions {
  /** Builds the transport instead of the default serialport one */
  transportFactory?: (path: string, profile: GaugeProfile) => Transport;
}

// !=============================================================================
// ! Discovery
// !=============================================================================

/** Port description as reported by `SerialPort.list()` */
export interface SerialPortInfo {
  path: string;
  manufacturer?: string | undefined;
  pnpId?: string | undefined;
  vendorId?: string | undefined;
  productId?: string | undefined;
}

export interface GaugeDeviceInfo {
  path: string;
  description: string;
}

// !=============================================================================
// ! Emulator
// !=============================================================================

export interface GaugeEmulatorOptions {
  /** Overload threshold, newtons */
  capacity?: number;
  /** Number of measures kept in memory */
  memorySize?: number;
  banner?: string;
  loggerEnabled?: boolean;
}

// !=============================================================================
// ! Diagnostics
// !=============================================================================

export interface DiagnosticsOptions {
  loggerName?: string;
  /** Error count that triggers a warning */
  notificationThreshold?: number;
  /** Error rate (%) that triggers a warning */
  errorRateThreshold?: number;
}

export interface DiagnosticsStats {
  uptimeSeconds: number;
  totalRequests: number;
  successfulResponses: number;
  errorResponses: number;
  timeouts: number;
  rejections: number;
  errorRate: number | null;
  averageResponseTime: number | null;
  lastResponseTime: number | null;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  totalDataSent: number;
  totalDataReceived: number;
  commandCounts: Record<string, number>;
  errorCounts: Record<string, number>;
  lastErrorMessage: string | null;
  lastErrors: string[];
}

// !=============================================================================
// ! Logger
// !=============================================================================

/** Logging levels */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Logging context */
export interface LogContext {
  command?: string;
  response?: string;
  responseTime?: number;
  path?: string;
  logger?: string;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogField = keyof LogContext | 'timestamp' | 'level' | 'logger';

/** Category logger */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  group(): void;
  groupEnd(): void;
  setLevel(lvl: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}
