import { SerialPort } from 'serialport';
import { concatUint8Arrays, allocUint8Array, toHex } from '../../utils/utils.js';
import Logger from '../../logger.js';
import {
  GaugeConfigError,
  NodeSerialTransportError,
  NodeSerialConnectionError,
  NodeSerialReadError,
  NodeSerialWriteError,
} from '../../errors.js';
import {
  Transport,
  NodeSerialTransportOptions,
  SerialPortFactory,
  SerialPortHandle,
} from '../../types/gauge-types.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 256000,
  DEFAULT_MAX_BUFFER_SIZE: 4096,
  POLL_INTERVAL_MS: 10,
} as const;

// ========== LOGGER ==========
const loggerInstance = new Logger();
loggerInstance.setLogFormat(['timestamp', 'level', 'logger', 'path']);
const logger = loggerInstance.createLogger('NodeSerialTransport');
logger.setLevel('info');

export const defaultSerialPortFactory: SerialPortFactory = options =>
  new SerialPort({ ...options, autoOpen: false });

function toConnectionError(err: Error): NodeSerialConnectionError {
  const message = err.message.toLowerCase();
  if (message.includes('permission') || message.includes('access denied')) {
    return new NodeSerialConnectionError('Permission denied', { cause: err });
  }
  if (message.includes('busy') || message.includes('lock')) {
    return new NodeSerialConnectionError('Serial port is busy', { cause: err });
  }
  if (
    message.includes('no such file') ||
    message.includes('not found') ||
    message.includes('does not exist')
  ) {
    return new NodeSerialConnectionError('Serial port does not exist', { cause: err });
  }
  return new NodeSerialConnectionError(err.message, { cause: err });
}

/**
 * Serial link to the gauge over the `serialport` package.
 * Incoming bytes are buffered; `readUntil` cuts them at the terminator.
 */
class NodeSerialTransport implements Transport {
  private path: string;
  private options: Required<NodeSerialTransportOptions>;
  private portFactory: SerialPortFactory;
  private port: SerialPortHandle | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private pendingError: Error | null = null;
  private _isOpen: boolean = false;

  constructor(
    path: string,
    options: NodeSerialTransportOptions = {},
    portFactory: SerialPortFactory = defaultSerialPortFactory
  ) {
    this.path = path;
    this.portFactory = portFactory;
    this.options = {
      baudRate: 9600,
      rtscts: false,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      readTimeout: 100,
      maxBufferSize: NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      ...options,
    };
  }

  get isOpen(): boolean {
    return this._isOpen && this.port !== null && this.port.isOpen;
  }

  async connect(): Promise<void> {
    if (this.isOpen) {
      logger.warn('Serial port already open', { path: this.path });
      return;
    }

    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new GaugeConfigError(`Invalid baud rate: ${this.options.baudRate}`);
    }

    try {
      await this._createAndOpenPort();
      logger.info('Serial port opened', {
        path: this.path,
        baudRate: this.options.baudRate,
        rtscts: this.options.rtscts,
      });
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new NodeSerialTransportError(String(err));
      logger.error(`Failed to open serial port: ${error.message}`, { path: this.path });
      this._isOpen = false;
      this.port = null;
      throw error;
    }
  }

  private _createAndOpenPort(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const port = this.portFactory({
        path: this.path,
        baudRate: this.options.baudRate,
        rtscts: this.options.rtscts,
        dataBits: this.options.dataBits,
        stopBits: this.options.stopBits,
        parity: this.options.parity,
      });
      this.port = port;

      port.open((err: Error | null) => {
        if (err) {
          reject(toConnectionError(err));
          return;
        }

        this._isOpen = true;
        this.readBuffer = allocUint8Array(0);
        this.pendingError = null;
        this._removeAllListeners();
        port.on('data', chunk => this._onData(chunk));
        port.on('error', error => this._onError(error));
        port.on('close', () => this._onClose());
        resolve();
      });
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    if (this.readBuffer.length + chunk.length > this.options.maxBufferSize) {
      this.pendingError = new NodeSerialReadError(
        `Read buffer overflow: ${this.readBuffer.length + chunk.length} > ${this.options.maxBufferSize} bytes`
      );
      logger.error(this.pendingError.message, { path: this.path });
      this.readBuffer = allocUint8Array(0);
      return;
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    logger.trace(`RX ${toHex(chunk)}`, { path: this.path });
  }

  private _onError(err: Error): void {
    logger.error(`Serial port error: ${err.message}`, { path: this.path });
    this.pendingError = new NodeSerialTransportError(err.message, { cause: err });
  }

  private _onClose(): void {
    logger.info('Serial port closed', { path: this.path });
    this._isOpen = false;
  }

  private _removeAllListeners(): void {
    if (this.port) {
      this.port.removeAllListeners('data');
      this.port.removeAllListeners('error');
      this.port.removeAllListeners('close');
    }
  }

  async flush(): Promise<void> {
    this.readBuffer = allocUint8Array(0);
  }

  async write(buffer: Uint8Array): Promise<void> {
    const port = this.port;
    if (!this.isOpen || port === null) throw new NodeSerialWriteError('Port closed');
    if (buffer.length === 0) throw new NodeSerialWriteError('Nothing to write');

    await new Promise<void>((resolve, reject) => {
      port.write(buffer, (err: Error | null | undefined) => {
        if (err) {
          reject(new NodeSerialWriteError(err.message, { cause: err }));
          return;
        }
        port.drain((drainErr: Error | null) => {
          if (drainErr) {
            reject(new NodeSerialWriteError(drainErr.message, { cause: drainErr }));
            return;
          }
          resolve();
        });
      });
    });
    logger.trace(`TX ${toHex(buffer)}`, { path: this.path });
  }

  readUntil(terminator: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    const start = Date.now();
    return new Promise<Uint8Array>((resolve, reject) => {
      const check = (): void => {
        if (this.pendingError) {
          const error = this.pendingError;
          this.pendingError = null;
          reject(error);
          return;
        }
        if (!this.isOpen) {
          reject(new NodeSerialReadError('Port closed'));
          return;
        }
        const index = this.readBuffer.indexOf(terminator);
        if (index !== -1) {
          const line = this.readBuffer.slice(0, index + 1);
          this.readBuffer = this.readBuffer.slice(index + 1);
          resolve(line);
          return;
        }
        if (Date.now() - start >= timeout) {
          // timeout: hand back whatever arrived
          const partial = this.readBuffer;
          this.readBuffer = allocUint8Array(0);
          resolve(partial);
          return;
        }
        setTimeout(check, NODE_SERIAL_CONSTANTS.POLL_INTERVAL_MS);
      };
      check();
    });
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    this._isOpen = false;
    this.readBuffer = allocUint8Array(0);
    if (!port) return;

    this._removeAllListeners();
    this.port = null;
    if (!port.isOpen) return;

    await new Promise<void>((resolve, reject) => {
      port.close((err: Error | null) => {
        if (err) {
          reject(
            new NodeSerialConnectionError(`Failed to close port: ${err.message}`, { cause: err })
          );
          return;
        }
        resolve();
      });
    });
    logger.info('Serial port closed by user', { path: this.path });
  }

  /** Current count of buffered, not yet read bytes */
  get bufferedBytes(): number {
    return this.readBuffer.length;
  }
}

export { NodeSerialTransport };
