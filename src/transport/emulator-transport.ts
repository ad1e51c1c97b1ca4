// src/transport/emulator-transport.ts

import Logger from '../logger.js';
import { GaugeEmulator } from '../gauge-emulator/gauge-emulator.js';
import { COMMAND_TERMINATOR } from '../constants/constants.js';
import { TransportError } from '../errors.js';
import { EmulatorTransportOptions, Transport } from '../types/gauge-types.js';
import { allocUint8Array, concatUint8Arrays, decodeAscii, encodeAscii } from '../utils/utils.js';

const POLL_INTERVAL_MS = 5;

const loggerInstance = new Logger();
const logger = loggerInstance.createLogger('EmulatorTransport');
logger.setLevel('warn');

/**
 * Transport wired to an in-process {@link GaugeEmulator}. Written frames are handed to the
 * emulator and its replies are queued for reading, CR terminated.
 */
class EmulatorTransport implements Transport {
  private readonly emulator: GaugeEmulator;
  private readonly readTimeout: number;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private pendingCommand: string = '';
  private _isOpen: boolean = false;

  constructor(emulator: GaugeEmulator, options: EmulatorTransportOptions = {}) {
    this.emulator = emulator;
    this.readTimeout = options.readTimeout ?? 100;
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async connect(): Promise<void> {
    if (this._isOpen) return;
    this._isOpen = true;
    this.readBuffer = allocUint8Array(0);
    this.pendingCommand = '';
    this._enqueue(this.emulator.startLines());
  }

  async disconnect(): Promise<void> {
    this._isOpen = false;
    this.readBuffer = allocUint8Array(0);
  }

  /**
   * Drops the link as an unplugged cable would.
   */
  simulateDisconnect(): void {
    logger.warn('Link dropped');
    this._isOpen = false;
  }

  async flush(): Promise<void> {
    this.readBuffer = allocUint8Array(0);
  }

  async write(buffer: Uint8Array): Promise<void> {
    if (!this._isOpen) throw new TransportError('Emulator link closed');

    this.pendingCommand += decodeAscii(buffer);
    const terminator = String.fromCharCode(COMMAND_TERMINATOR);
    let index = this.pendingCommand.indexOf(terminator);
    while (index !== -1) {
      const command = this.pendingCommand.slice(0, index);
      this.pendingCommand = this.pendingCommand.slice(index + 1);
      this._enqueue(this.emulator.handleCommand(command));
      index = this.pendingCommand.indexOf(terminator);
    }
  }

  readUntil(terminator: number, timeout: number = this.readTimeout): Promise<Uint8Array> {
    const start = Date.now();
    return new Promise<Uint8Array>((resolve, reject) => {
      const check = (): void => {
        if (!this._isOpen) {
          reject(new TransportError('Emulator link closed'));
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
          const partial = this.readBuffer;
          this.readBuffer = allocUint8Array(0);
          resolve(partial);
          return;
        }
        setTimeout(check, POLL_INTERVAL_MS);
      };
      check();
    });
  }

  private _enqueue(lines: string[]): void {
    const frames = lines.map(line =>
      concatUint8Arrays([encodeAscii(line), new Uint8Array([COMMAND_TERMINATOR])])
    );
    this.readBuffer = concatUint8Arrays([this.readBuffer, ...frames]);
  }
}

export { EmulatorTransport };
