// src/utils/diagnostics.ts

import {
  DeviceRejectedError,
  RequestCancelledError,
  RequestTimedOutError,
} from '../errors.js';
import { headsetLogger } from '../logger.js';
import type {
  DiagnosticsOptions,
  DiagnosticsStats,
  LoggerInstance,
} from '../types/headset-types.js';

const MAX_LAST_ERRORS = 10;

/**
 * Collects request/response statistics for one client.
 */
class Diagnostics {
  private logger: LoggerInstance;
  private startTime: number;
  private totalRequests: number = 0;
  private successfulResponses: number = 0;
  private errorResponses: number = 0;
  private timeouts: number = 0;
  private cancellations: number = 0;
  private rejections: number = 0;
  private decodeErrors: number = 0;
  private frameErrors: number = 0;
  private unsolicitedMessages: number = 0;
  private lastResponseTime: number | null = null;
  private minResponseTime: number | null = null;
  private maxResponseTime: number | null = null;
  private _totalResponseTime: number = 0;
  private totalDataSent: number = 0;
  private totalDataReceived: number = 0;
  private requestsByPath: Record<string, number> = {};
  private lastErrorMessage: string | null = null;
  private lastErrors: string[] = [];

  constructor(options: DiagnosticsOptions = {}) {
    this.logger = headsetLogger.createLogger(options.loggerName ?? 'Diagnostics');
    this.startTime = Date.now();
  }

  /**
   * Resets all statistics and counters to their initial state.
   */
  reset(): void {
    this.startTime = Date.now();
    this.totalRequests = 0;
    this.successfulResponses = 0;
    this.errorResponses = 0;
    this.timeouts = 0;
    this.cancellations = 0;
    this.rejections = 0;
    this.decodeErrors = 0;
    this.frameErrors = 0;
    this.unsolicitedMessages = 0;
    this.lastResponseTime = null;
    this.minResponseTime = null;
    this.maxResponseTime = null;
    this._totalResponseTime = 0;
    this.totalDataSent = 0;
    this.totalDataReceived = 0;
    this.requestsByPath = {};
    this.lastErrorMessage = null;
    this.lastErrors = [];
  }

  recordRequest(path: string): void {
    this.totalRequests++;
    this.requestsByPath[path] = (this.requestsByPath[path] ?? 0) + 1;
    this.logger.trace('Request sent', { path });
  }

  recordSuccess(responseTimeMs: number, path: string): void {
    this.successfulResponses++;
    this.lastResponseTime = responseTimeMs;
    this.minResponseTime =
      this.minResponseTime == null ? responseTimeMs : Math.min(this.minResponseTime, responseTimeMs);
    this.maxResponseTime =
      this.maxResponseTime == null ? responseTimeMs : Math.max(this.maxResponseTime, responseTimeMs);
    this._totalResponseTime += responseTimeMs;
    this.logger.trace('Response received', { path, responseTime: responseTimeMs });
  }

  /**
   * Records a failed request. Timeouts, cancellations and device rejections
   * get their own counters.
   */
  recordError(error: Error, path: string): void {
    this.errorResponses++;
    if (error instanceof RequestTimedOutError) this.timeouts++;
    else if (error instanceof RequestCancelledError) this.cancellations++;
    else if (error instanceof DeviceRejectedError) this.rejections++;
    this.rememberError(error);
    this.logger.debug(error.message, { path });
  }

  recordDecodeError(error: Error): void {
    this.decodeErrors++;
    this.rememberError(error);
  }

  recordFrameError(error: Error): void {
    this.frameErrors++;
    this.rememberError(error);
  }

  recordUnsolicited(path: string): void {
    this.unsolicitedMessages++;
    this.logger.trace('Unsolicited message', { path });
  }

  recordDataSent(byteLength: number): void {
    this.totalDataSent += byteLength;
  }

  recordDataReceived(byteLength: number): void {
    this.totalDataReceived += byteLength;
  }

  private rememberError(error: Error): void {
    this.lastErrorMessage = error.message;
    this.lastErrors.push(error.message);
    if (this.lastErrors.length > MAX_LAST_ERRORS) this.lastErrors.shift();
  }

  /**
   * Average response time in milliseconds for successful responses.
   */
  get averageResponseTime(): number | null {
    return this.successfulResponses === 0
      ? null
      : this._totalResponseTime / this.successfulResponses;
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
      cancellations: this.cancellations,
      rejections: this.rejections,
      decodeErrors: this.decodeErrors,
      frameErrors: this.frameErrors,
      unsolicitedMessages: this.unsolicitedMessages,
      averageResponseTime: this.averageResponseTime,
      minResponseTime: this.minResponseTime,
      maxResponseTime: this.maxResponseTime,
      lastResponseTime: this.lastResponseTime,
      totalDataSent: this.totalDataSent,
      totalDataReceived: this.totalDataReceived,
      requestsByPath: { ...this.requestsByPath },
      lastErrorMessage: this.lastErrorMessage,
      lastErrors: [...this.lastErrors],
    };
  }

  /**
   * Prints formatted statistics through the logger at info level.
   */
  printStats(): void {
    const stats = this.getStats();
    this.logger.info('=== Headset Diagnostics ===');
    this.logger.info(`Uptime: ${stats.uptimeSeconds} seconds`);
    this.logger.info(`Total Requests: ${stats.totalRequests}`);
    this.logger.info(`Successful Responses: ${stats.successfulResponses}`);
    this.logger.info(
      `Error Responses: ${stats.errorResponses} ` +
        `(timeouts ${stats.timeouts}, rejected ${stats.rejections}, ` +
        `cancelled ${stats.cancellations})`
    );
    this.logger.info(`Decode Errors: ${stats.decodeErrors}, Frame Errors: ${stats.frameErrors}`);
    this.logger.info(
      `Average Response Time: ${stats.averageResponseTime?.toFixed(2) ?? 'N/A'} ms`
    );
    this.logger.info(`Data Sent: ${stats.totalDataSent} bytes`);
    this.logger.info(`Data Received: ${stats.totalDataReceived} bytes`);
    this.logger.info(`Requests by path: ${JSON.stringify(stats.requestsByPath, null, 2)}`);
    this.logger.info('===========================');
  }

  serialize(): string {
    return JSON.stringify(this.getStats(), null, 2);
  }
}

export { Diagnostics };
