import {
  isThrottlingError,
  throttleDelay,
  withThrottleRetry,
} from '../../../src/lambda';
import { silentLogger } from '../../support/logger';

function serviceError(name: string, message: string, httpStatusCode: number): Error {
  const error = new Error(message);
  error.name = name;
  return Object.assign(error, { $metadata: { httpStatusCode } });
}

describe('isThrottlingError', () => {
  test('treats every 429 as throttling', () => {
    expect(isThrottlingError(serviceError('UnknownError', 'slow down', 429))).toBe(true);
  });

  test.each([
    ['ThrottlingException', 'Rate exceeded', 400],
    ['TooManyRequestsException', 'Too many requests', 400],
    ['ServiceUnavailable', 'Too Many Requests', 503],
    ['InternalFailure', 'RequestLimitExceeded', 503],
  ])('detects %s with message %p and status %d', (name, message, status) => {
    expect(isThrottlingError(serviceError(name, message, status))).toBe(true);
  });

  test.each([
    ['AccessDeniedException', 'not authorized', 400],
    ['ThrottlingException', 'Rate exceeded', 500],
    ['InternalServiceError', 'unavailable', 503],
  ])('ignores %s with message %p and status %d', (name, message, status) => {
    expect(isThrottlingError(serviceError(name, message, status))).toBe(false);
  });

  test('ignores errors without an HTTP status', () => {
    expect(isThrottlingError(new Error('ThrottlingException'))).toBe(false);
    expect(isThrottlingError('ThrottlingException')).toBe(false);
    expect(isThrottlingError(undefined)).toBe(false);
  });
});

describe('throttleDelay', () => {
  test('doubles from 100 ms up to 400 ms', () => {
    expect([1, 2, 3, 4, 10].map((attempt) => throttleDelay(attempt))).toEqual([
      100, 200, 400, 400, 400,
    ]);
  });

  test('takes custom bounds', () => {
    expect(throttleDelay(3, { baseDelayMs: 50, maxDelayMs: 1_000 })).toBe(200);
  });
});

describe('withThrottleRetry', () => {
  const throttled = () => serviceError('ThrottlingException', 'Rate exceeded', 400);

  test('retries throttled requests with growing delays', async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const request = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(throttled())
      .mockRejectedValueOnce(throttled())
      .mockResolvedValueOnce('ok');
    const logger = silentLogger();

    await expect(withThrottleRetry(request, { sleep }, logger)).resolves.toBe('ok');

    expect(request).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(logger.warn).toHaveBeenCalledWith('Cooling down to prevent request limits', {
      attempt: 1,
      delayMs: 100,
    });
  });

  test('rethrows other errors without retrying', async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const failure = serviceError('AccessDeniedException', 'not authorized', 400);
    const request = jest.fn<Promise<string>, []>().mockRejectedValue(failure);

    await expect(withThrottleRetry(request, { sleep })).rejects.toBe(failure);
    expect(request).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  test('gives up after the last attempt', async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const last = throttled();
    const request = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(throttled())
      .mockRejectedValueOnce(throttled())
      .mockRejectedValueOnce(last);

    await expect(withThrottleRetry(request, { sleep, maxAttempts: 3 })).rejects.toBe(last);
    expect(request).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  test('makes ten attempts by default', async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const request = jest.fn<Promise<string>, []>().mockRejectedValue(throttled());

    await expect(withThrottleRetry(request, { sleep })).rejects.toThrow('Rate exceeded');
    expect(request).toHaveBeenCalledTimes(10);
    expect(sleep).toHaveBeenCalledTimes(9);
  });
});
