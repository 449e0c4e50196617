// tests/utils/diagnostics.test.ts

import { describe, expect, it } from 'vitest';
import {
  DecodingError,
  DeviceRejectedError,
  RequestCancelledError,
  RequestTimedOutError,
  SessionClosedError,
} from '../../src/errors.js';
import { Diagnostics } from '../../src/utils/diagnostics.js';

describe('Diagnostics', () => {
  it('tracks response times', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordRequest('/a');
    diagnostics.recordRequest('/a');
    diagnostics.recordRequest('/b');
    diagnostics.recordSuccess(10, '/a');
    diagnostics.recordSuccess(30, '/b');

    const stats = diagnostics.getStats();
    expect(stats.totalRequests).toBe(3);
    expect(stats.successfulResponses).toBe(2);
    expect(stats.averageResponseTime).toBe(20);
    expect(stats.minResponseTime).toBe(10);
    expect(stats.maxResponseTime).toBe(30);
    expect(stats.lastResponseTime).toBe(30);
    expect(stats.requestsByPath).toEqual({ '/a': 2, '/b': 1 });
  });

  it('counts failures by cause', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordError(new RequestTimedOutError(1, '/a', 100), '/a');
    diagnostics.recordError(new RequestCancelledError(2, '/a'), '/a');
    diagnostics.recordError(new DeviceRejectedError('/b'), '/b');
    diagnostics.recordError(new SessionClosedError(), '/b');
    diagnostics.recordDecodeError(new DecodingError('bad xml'));

    expect(diagnostics.getStats()).toMatchObject({
      errorResponses: 4,
      timeouts: 1,
      cancellations: 1,
      rejections: 1,
      decodeErrors: 1,
      lastErrorMessage: 'bad xml',
    });
  });

  it('keeps only the ten most recent errors', () => {
    const diagnostics = new Diagnostics();
    for (let i = 0; i < 12; i++) {
      diagnostics.recordFrameError(new Error(`error ${i}`));
    }

    const { lastErrors, frameErrors } = diagnostics.getStats();
    expect(frameErrors).toBe(12);
    expect(lastErrors).toHaveLength(10);
    expect(lastErrors[0]).toBe('error 2');
    expect(lastErrors[9]).toBe('error 11');
  });

  it('starts over on reset', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordRequest('/a');
    diagnostics.recordSuccess(5, '/a');
    diagnostics.recordDataSent(12);
    diagnostics.recordDataReceived(40);
    diagnostics.reset();

    const stats = diagnostics.getStats();
    expect(stats.totalRequests).toBe(0);
    expect(stats.averageResponseTime).toBeNull();
    expect(stats.totalDataSent).toBe(0);
    expect(stats.totalDataReceived).toBe(0);
    expect(JSON.parse(diagnostics.serialize())).toEqual(stats);
  });
});
