// src/utils/diagnostics.ts

import Logger from '../logger.js';
import { GaugeCommandRejectedError, GaugeResponseTimeoutError } from '../errors.js';
import { DiagnosticsOptions, DiagnosticsStats, LoggerInstance } from '../types/gauge-types.js';

const loggerInstance = new Logger();
loggerInstance.setLogFormat(['timestamp', 'level', 'logger', 'command', 'responseTime']);

const MAX_LAST_ERRORS = 10;

/**
 * Collects statistics about gauge exchanges.
 */
class Diagnostics {
  private notificationThreshold: number;
  private errorRateThreshold: number;
  private logger: LoggerInstance;
  private startTime: number;
  private totalRequests: number = 0;
  private successfulResponses: number = 0;
  private errorResponses: number = 0;
  private timeouts: number = 0;
  private rejections: number = 0;
  private lastResponseTime: number | null = null;
  private minResponseTime: number | null = null;
  private maxResponseTime: number | null = null;
  private _totalResponseTime: number = 0;
  private lastErrorMessage: string | null = null;
  private lastErrors: string[] = [];
  private commandCounts: Record<string, number> = {};
  private errorCounts: Record<string, number> = {};
  private totalDataSent: number = 0;
  private totalDataReceived: number = 0;

  constructor(options: DiagnosticsOptions = {}) {
    this.notificationThreshold = options.notificationThreshold ?? 10;
    this.errorRateThreshold = options.errorRateThreshold ?? 10;
    this.logger = loggerInstance.createLogger(options.loggerName ?? 'Diagnostics');
    this.logger.setLevel('none');
    this.startTime = Date.now();
  }

  /**
   * Resets all statistics and counters to their initial state.
   */
  reset(): void {
    this.totalRequests = 0;
    this.successfulResponses = 0;
    this.errorResponses = 0;
    this.timeouts = 0;
    this.rejections = 0;
    this.lastResponseTime = null;
    this.minResponseTime = null;
    this.maxResponseTime = null;
    this._totalResponseTime = 0;
    this.lastErrorMessage = null;
    this.lastErrors = [];
    this.commandCounts = {};
    this.errorCounts = {};
    this.totalDataSent = 0;
    this.totalDataReceived = 0;
    this.startTime = Date.now();
  }

  /**
   * Warns once the error count or the error rate goes past its threshold.
   */
  private sendNotification(): void {
    const errorRate = this.errorRate;
    if (
      this.errorResponses <= this.notificationThreshold &&
      (errorRate == null || errorRate <= this.errorRateThreshold)
    )
      return;

    this.logger.warn('Excessive errors detected', {
      errorCount: this.errorResponses,
      errorRate: errorRate?.toFixed(2) ?? 'N/A',
      lastError: this.lastErrorMessage ?? undefined,
    });
  }

  recordRequest(command: string): void {
    this.totalRequests++;
    this.commandCounts[command] = (this.commandCounts[command] ?? 0) + 1;
    this.logger.trace('Request sent', { command });
  }

  recordSuccess(responseTimeMs: number, command?: string): void {
    this.successfulResponses++;
    this.lastResponseTime = responseTimeMs;
    this.minResponseTime =
      this.minResponseTime == null
        ? responseTimeMs
        : Math.min(this.minResponseTime, responseTimeMs);
    this.maxResponseTime =
      this.maxResponseTime == null
        ? responseTimeMs
        : Math.max(this.maxResponseTime, responseTimeMs);
    this._totalResponseTime += responseTimeMs;
    this.logger.trace('Response received', { command, responseTime: responseTimeMs });
  }

  recordError(error: Error, options: { command?: string; responseTimeMs?: number } = {}): void {
    this.errorResponses++;
    this.lastErrorMessage = error.message;
    this.lastErrors.push(error.message);
    if (this.lastErrors.length > MAX_LAST_ERRORS) this.lastErrors.shift();

    if (error instanceof GaugeResponseTimeoutError) this.timeouts++;
    else if (error instanceof GaugeCommandRejectedError) this.rejections++;

    this.errorCounts[error.name] = (this.errorCounts[error.name] ?? 0) + 1;

    this.logger.error(error.message, {
      command: options.command,
      responseTime: options.responseTimeMs,
    });

    this.sendNotification();
  }

  recordDataSent(byteLength: number): void {
    this.totalDataSent += byteLength;
  }

  recordDataReceived(byteLength: number): void {
    this.totalDataReceived += byteLength;
  }

  /**
   * Average response time of successful exchanges, milliseconds
   */
  get averageResponseTime(): number | null {
    return this.successfulResponses === 0
      ? null
      : this._totalResponseTime / this.successfulResponses;
  }

  /**
   * Error rate as a percentage of all requests
   */
  get errorRate(): number | null {
    return this.totalRequests === 0 ? null : (this.errorResponses / this.totalRequests) * 100;
  }

  get uptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  getStats(): DiagnosticsStats {
    return {
      uptimeSeconds: this.uptimeSeconds,
      totalRequests: this.totalRequests,
      successfulResponses: this.successfulResponses,
      errorResponses: this.errorResponses,
      timeouts: this.timeouts,
      rejections: this.rejections,
      errorRate: this.errorRate,
      averageResponseTime: this.averageResponseTime,
      lastResponseTime: this.lastResponseTime,
      minResponseTime: this.minResponseTime,
      maxResponseTime: this.maxResponseTime,
      totalDataSent: this.totalDataSent,
      totalDataReceived: this.totalDataReceived,
      commandCounts: { ...this.commandCounts },
      errorCounts: { ...this.errorCounts },
      lastErrorMessage: this.lastErrorMessage,
      lastErrors: [...this.lastErrors],
    };
  }

  enableLogger(level: 'trace' | 'debug' | 'info' | 'warn' | 'error' = 'info'): void {
    this.logger.setLevel(level);
  }
}

export { Diagnostics };
