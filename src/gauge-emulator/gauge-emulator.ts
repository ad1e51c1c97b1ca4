// src/gauge-emulator/gauge-emulator.ts

import { Decimal } from 'decimal.js';
import Logger from '../logger.js';
import { ACK_TOKEN, BANNER_LINE, COMMANDS, REJECT_TOKEN } from '../constants/constants.js';
import {
  GaugeMeasureMode,
  GaugeMeasureState,
  GaugeMeasureUnit,
  encodeMode,
  encodeState,
  encodeUnit,
} from '../constants/wire-codes.js';
import { GaugeConfigError } from '../errors.js';
import { GaugeEmulatorOptions, LoggerInstance } from '../types/gauge-types.js';

/** Standard gravity, N per kgf */
const STANDARD_GRAVITY = new Decimal('9.80665');
const DISPLAY_DECIMALS = 2;
const DISPLAY_INTEGER_DIGITS = 3;
const LIMIT_FRAME = /^E(-?[0-9]+\.[0-9]{2})(-?[0-9]+\.[0-9]{2})$/;

/**
 * In-process stand-in for a DST/DSV gauge. Takes one command line (without terminator)
 * and returns the reply lines it would send back.
 */
class GaugeEmulator {
  private readonly capacity: Decimal;
  private readonly memorySize: number;
  private readonly banner: string;
  private logger: LoggerInstance;

  private force: Decimal = new Decimal(0);
  private offset: Decimal = new Decimal(0);
  private peak: Decimal = new Decimal(0);
  private unit: GaugeMeasureUnit = GaugeMeasureUnit.Newton;
  private mode: GaugeMeasureMode = GaugeMeasureMode.Realtime;
  private highLimit: Decimal | null = null;
  private lowLimit: Decimal | null = null;
  private memory: string[] = [];
  private overrides: Map<string, string | null> = new Map();
  private poweredOff: boolean = false;
  private received: string[] = [];

  constructor(options: GaugeEmulatorOptions = {}) {
    const capacity = options.capacity ?? 500;
    if (!Number.isFinite(capacity) || capacity <= 0) {
      throw new GaugeConfigError(`Capacity must be a positive number, got ${capacity}`);
    }
    this.capacity = new Decimal(capacity);
    this.memorySize = options.memorySize ?? 1000;
    this.banner = options.banner ?? BANNER_LINE;

    const loggerInstance = new Logger();
    this.logger = loggerInstance.createLogger('GaugeEmulator');
    this.logger.setLevel(options.loggerEnabled ? 'debug' : 'none');
  }

  get isPoweredOff(): boolean {
    return this.poweredOff;
  }

  /** Lines received so far, in order */
  get receivedCommands(): readonly string[] {
    return this.received;
  }

  /** Line sent when the link comes up */
  startLines(): string[] {
    return this.poweredOff ? [] : [this.banner];
  }

  /**
   * Applies a force to the sensor, newtons. Positive is compression.
   */
  setForce(newtons: Decimal.Value): void {
    this.force = new Decimal(newtons);
    const net = this.force.minus(this.offset);
    if (net.abs().greaterThan(this.peak.abs())) {
      this.peak = net;
    }
  }

  /**
   * Forces the reply of a command. `null` makes the gauge stay silent for it.
   */
  setResponseOverride(command: string, reply: string | null): void {
    this.overrides.set(command, reply);
  }

  clearResponseOverrides(): void {
    this.overrides.clear();
  }

  getMemory(): readonly string[] {
    return [...this.memory];
  }

  getSettings(): {
    unit: GaugeMeasureUnit;
    mode: GaugeMeasureMode;
    lowLimit: string | null;
    highLimit: string | null;
  } {
    return {
      unit: this.unit,
      mode: this.mode,
      lowLimit: this.lowLimit?.toFixed(DISPLAY_DECIMALS) ?? null,
      highLimit: this.highLimit?.toFixed(DISPLAY_DECIMALS) ?? null,
    };
  }

  /**
   * Handles one command line.
   * @returns Reply lines, without terminator
   */
  handleCommand(command: string): string[] {
    if (this.poweredOff) return [];
    this.received.push(command);
    this.logger.debug('Command received', { command });

    if (this.overrides.has(command)) {
      const reply = this.overrides.get(command);
      return reply == null ? [] : [reply];
    }

    const reply = this._process(command);
    return reply === null ? [] : [reply];
  }

  private _process(command: string): string | null {
    switch (command) {
      case COMMANDS.ZERO:
        this.offset = this.force;
        this.peak = new Decimal(0);
        return ACK_TOKEN;
      case COMMANDS.MEASURE:
        return this._formatReading();
      case encodeMode(GaugeMeasureMode.Realtime):
      case encodeMode(GaugeMeasureMode.Peak):
        this.mode =
          command === GaugeMeasureMode.Peak ? GaugeMeasureMode.Peak : GaugeMeasureMode.Realtime;
        this.peak = new Decimal(0);
        return ACK_TOKEN;
      case encodeUnit(GaugeMeasureUnit.Newton):
        this.unit = GaugeMeasureUnit.Newton;
        return ACK_TOKEN;
      case encodeUnit(GaugeMeasureUnit.Kilograms):
        this.unit = GaugeMeasureUnit.Kilograms;
        return ACK_TOKEN;
      case COMMANDS.STORE:
        if (this.memory.length >= this.memorySize) return REJECT_TOKEN;
        this.memory.push(this._formatReading());
        return ACK_TOKEN;
      case COMMANDS.CLEAR_LAST:
        this.memory.pop();
        return ACK_TOKEN;
      case COMMANDS.CLEAR_ALL:
        this.memory = [];
        return ACK_TOKEN;
      case COMMANDS.POWER_OFF:
        this.poweredOff = true;
        this.logger.info('Powered off');
        return null;
      default:
        return this._processLimits(command);
    }
  }

  private _processLimits(command: string): string {
    const match = LIMIT_FRAME.exec(command);
    if (!match || match[1] === undefined || match[2] === undefined) {
      this.logger.warn('Unknown command', { command });
      return REJECT_TOKEN;
    }
    const high = new Decimal(match[1]);
    const low = new Decimal(match[2]);
    if (low.greaterThan(high)) return REJECT_TOKEN;
    this.highLimit = high;
    this.lowLimit = low;
    return ACK_TOKEN;
  }

  private _currentNewtons(): Decimal {
    return this.mode === GaugeMeasureMode.Peak ? this.peak : this.force.minus(this.offset);
  }

  private _toDisplayUnit(newtons: Decimal): Decimal {
    const value =
      this.unit === GaugeMeasureUnit.Kilograms ? newtons.dividedBy(STANDARD_GRAVITY) : newtons;
    return value.toDecimalPlaces(DISPLAY_DECIMALS, Decimal.ROUND_HALF_EVEN);
  }

  private _state(newtons: Decimal, displayed: Decimal): GaugeMeasureState {
    if (newtons.abs().greaterThan(this.capacity)) return GaugeMeasureState.Overload;
    if (this.lowLimit !== null && displayed.lessThan(this.lowLimit)) {
      return GaugeMeasureState.BelowLimit;
    }
    if (this.highLimit !== null && displayed.greaterThan(this.highLimit)) {
      return GaugeMeasureState.AboveLimit;
    }
    return GaugeMeasureState.Good;
  }

  private _formatReading(): string {
    const newtons = this._currentNewtons();
    const displayed = this._toDisplayUnit(newtons);
    const sign = displayed.isNegative() && !displayed.isZero() ? '-' : '+';
    const [integerPart = '0', fractionPart = '00'] = displayed
      .abs()
      .toFixed(DISPLAY_DECIMALS)
      .split('.');
    const magnitude = `${integerPart.padStart(DISPLAY_INTEGER_DIGITS, '0')}.${fractionPart}`;
    return (
      sign +
      magnitude +
      encodeUnit(this.unit) +
      encodeMode(this.mode) +
      encodeState(this._state(newtons, displayed))
    );
  }
}

export { GaugeEmulator };
