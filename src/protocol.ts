// src/protocol.ts

import { Mutex } from 'async-mutex';
import type { Decimal } from 'decimal.js';
import Logger from './logger.js';
import { Diagnostics } from './utils/diagnostics.js';
import { LineFramer } from './framers/line-framer.js';
import { REJECT_TOKEN } from './constants/constants.js';
import { GaugeMeasureMode, GaugeMeasureUnit } from './constants/wire-codes.js';
import {
  GaugeCommandRejectedError,
  GaugePoweredOffError,
  GaugeResponseTimeoutError,
  GaugeStateError,
} from './errors.js';
import { buildZeroRequest, parseZeroResponse } from './commands/zero.js';
import { buildMeasureRequest, parseMeasureResponse } from './commands/measure.js';
import { buildSetModeRequest, parseSetModeResponse } from './commands/set-mode.js';
import { buildSetUnitRequest, parseSetUnitResponse } from './commands/set-unit.js';
import {
  buildSetLimitPointsRequest,
  parseSetLimitPointsResponse,
} from './commands/set-limit-points.js';
import {
  buildClearAllRequest,
  buildClearLastRequest,
  buildStoreRequest,
  parseClearAllResponse,
  parseClearLastResponse,
  parseStoreResponse,
} from './commands/memory.js';
import { buildPowerOffRequest } from './commands/power-off.js';
import {
  GaugeMeasure,
  GaugeProtocolOptions,
  GaugeProtocolState,
  LogLevel,
  Transport,
} from './types/gauge-types.js';

const loggerInstance = new Logger();
loggerInstance.setLogFormat(['timestamp', 'level', 'logger', 'command', 'response', 'responseTime']);
const logger = loggerInstance.createLogger('GaugeProtocol');
logger.setLevel('error');

const DEFAULT_READ_TIMEOUT = 100;

/**
 * Drives a gauge over a transport it does not own.
 *
 * Every operation is one exchange: the command is written, then exactly one CR terminated line
 * is read back. Exchanges are serialized by a mutex, so a handler shared between callers never
 * has two of them in flight.
 */
class GaugeProtocol {
  private readonly transport: Transport;
  private readonly framer: LineFramer = new LineFramer();
  private readonly readTimeout: number;
  private readonly diagnostics: Diagnostics | null;
  private readonly _mutex: Mutex = new Mutex();
  private _state: GaugeProtocolState = 'awaiting-banner';

  constructor(transport: Transport, options: GaugeProtocolOptions = {}) {
    this.transport = transport;
    this.readTimeout = options.readTimeout ?? DEFAULT_READ_TIMEOUT;
    this.diagnostics = options.diagnostics ? new Diagnostics({ loggerName: 'GaugeProtocol' }) : null;
  }

  get state(): GaugeProtocolState {
    return this._state;
  }

  enableLogger(level: LogLevel = 'info'): void {
    logger.setLevel(level);
  }

  disableLogger(): void {
    logger.setLevel('error');
  }

  getDiagnostics(): Diagnostics | null {
    return this.diagnostics;
  }

  /**
   * Marks the handler unusable once its transport has been closed by the owner.
   */
  detach(): void {
    if (this._state !== 'powered-off') {
      this._state = 'detached';
    }
  }

  private _assertReady(operation: string): void {
    switch (this._state) {
      case 'ready':
        return;
      case 'awaiting-banner':
        throw new GaugeStateError(`readStartLine() must be called before ${operation}()`);
      case 'powered-off':
        throw new GaugePoweredOffError(operation);
      case 'detached':
        throw new GaugeStateError(`Session is closed, ${operation}() is not allowed`);
    }
  }

  /**
   * Runs `fn` with exclusive access to the transport, after checking the lifecycle.
   */
  private async _exclusive<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    // fail fast, then check again once the lock is ours
    this._assertReady(operation);
    return this._mutex.runExclusive(async () => {
      this._assertReady(operation);
      return fn();
    });
  }

  private async _tx(command: string): Promise<void> {
    const frame = this.framer.buildFrame(command);
    await this.transport.write(frame);
    this.diagnostics?.recordDataSent(frame.length);
  }

  private async _rx(): Promise<{ text: string; terminated: boolean }> {
    const bytes = await this.transport.readUntil(this.framer.terminatorByte, this.readTimeout);
    this.diagnostics?.recordDataReceived(bytes.length);
    return this.framer.parseFrame(bytes);
  }

  /**
   * Runs one exchange and hands the trimmed reply to `parse`. Stale bytes left by an earlier
   * timed out exchange are dropped before the command is written.
   * @throws GaugeCommandRejectedError If the gauge replies `E`
   * @throws GaugeResponseTimeoutError If no terminated line arrives within the read timeout
   */
  private async _request<T>(command: string, parse: (response: string) => T): Promise<T> {
    const start = Date.now();
    this.diagnostics?.recordRequest(command);
    try {
      await this.transport.flush?.();
      await this._tx(command);
      const { text, terminated } = await this._rx();
      const responseTime = Date.now() - start;

      if (!terminated) {
        throw new GaugeResponseTimeoutError(command, text, this.readTimeout);
      }
      if (text === REJECT_TOKEN) {
        throw new GaugeCommandRejectedError(command);
      }

      const result = parse(text);
      logger.debug('Exchange complete', { command, response: text, responseTime });
      this.diagnostics?.recordSuccess(responseTime, command);
      return result;
    } catch (err: unknown) {
      if (err instanceof Error) {
        this.diagnostics?.recordError(err, { command, responseTimeMs: Date.now() - start });
        logger.warn(`Exchange failed: ${err.message}`, { command });
      }
      throw err;
    }
  }

  private _assertAwaitingBanner(): void {
    if (this._state === 'awaiting-banner') return;
    if (this._state === 'ready') throw new GaugeStateError('Start line was already read');
    this._assertReady('readStartLine');
  }

  /**
   * Reads the "Gauge Started." line sent when the link comes up. Must run once, first.
   * @returns The banner, trimmed (empty when the gauge stayed silent)
   */
  async readStartLine(): Promise<string> {
    this._assertAwaitingBanner();
    return this._mutex.runExclusive(async () => {
      this._assertAwaitingBanner();
      const { text } = await this._rx();
      this._state = 'ready';
      logger.info('Gauge started', { response: text });
      return text;
    });
  }

  /**
   * Resets the measure (tare)
   */
  async zero(): Promise<void> {
    await this._exclusive('zero', () => this._request(buildZeroRequest(), parseZeroResponse));
  }

  /**
   * Asks the gauge for a measure
   * @throws GaugeParseError If the reply is not a valid measure record
   */
  async measure(): Promise<GaugeMeasure> {
    return this._exclusive('measure', () =>
      this._request(buildMeasureRequest(), parseMeasureResponse)
    );
  }

  async setMode(mode: GaugeMeasureMode): Promise<void> {
    await this._exclusive('setMode', () =>
      this._request(buildSetModeRequest(mode), response => parseSetModeResponse(mode, response))
    );
  }

  async setUnit(unit: GaugeMeasureUnit): Promise<void> {
    await this._exclusive('setUnit', () =>
      this._request(buildSetUnitRequest(unit), response => parseSetUnitResponse(unit, response))
    );
  }

  /**
   * Sets the comparator limits. Values are sent with two decimals.
   * @throws RangeError If a value is not finite or `low` is above `high`
   */
  async setLimitPoints(low: Decimal.Value, high: Decimal.Value): Promise<void> {
    const command = buildSetLimitPointsRequest(low, high);
    await this._exclusive('setLimitPoints', () =>
      this._request(command, response => parseSetLimitPointsResponse(command, response))
    );
  }

  /**
   * Stores the current measure in the gauge memory
   */
  async store(): Promise<void> {
    await this._exclusive('store', () => this._request(buildStoreRequest(), parseStoreResponse));
  }

  async clearLast(): Promise<void> {
    await this._exclusive('clearLast', () =>
      this._request(buildClearLastRequest(), parseClearLastResponse)
    );
  }

  async clearAll(): Promise<void> {
    await this._exclusive('clearAll', () =>
      this._request(buildClearAllRequest(), parseClearAllResponse)
    );
  }

  /**
   * Turns the gauge off. Nothing is read back, and the handler refuses every later call.
   * The transport stays open; its owner still has to close it.
   */
  async powerOff(): Promise<void> {
    await this._exclusive('powerOff', async () => {
      const command = buildPowerOffRequest();
      this.diagnostics?.recordRequest(command);
      // terminal whatever the write outcome: the device state is unknown afterwards
      this._state = 'powered-off';
      await this._tx(command);
      logger.info('Gauge powered off', { command });
    });
  }
}

export { GaugeProtocol };
