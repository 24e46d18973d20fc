import type { Context } from 'aws-lambda';
import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import {
  ConfigurationError,
  InvalidEventError,
  InvocationTimeoutError,
  createHandler,
  parseEvent,
} from '../../../src/lambda';
import type { InvocationContext, Runner } from '../../../src/lambda';
import { silentLogger } from '../../support/logger';

const ENV = { AWS_REGION: 'eu-central-1' };

const GreetEvent = z.object({ name: z.string().min(1) });
type GreetEvent = z.infer<typeof GreetEvent>;

function makeContext(remainingMs = 30_000, awsRequestId = 'c6af9ac6-7b61-11e6-9a41-93e812345678'): Context {
  return {
    callbackWaitsForEmptyEventLoop: true,
    functionName: 'rotate-app-user',
    functionVersion: '$LATEST',
    invokedFunctionArn: 'arn:aws:lambda:eu-central-1:123456789012:function:rotate-app-user',
    memoryLimitInMB: '256',
    awsRequestId,
    logGroupName: '/aws/lambda/rotate-app-user',
    logStreamName: '2024/05/01/[$LATEST]0123456789abcdef',
    getRemainingTimeInMillis: () => remainingMs,
    done: () => undefined,
    fail: () => undefined,
    succeed: () => undefined,
  };
}

class GreetRunner implements Runner<{ greeting: string }, GreetEvent, string> {
  readonly eventSchema = GreetEvent;
  readonly contexts: InvocationContext[] = [];

  setup = jest.fn(async () => ({ greeting: 'Hello' }));

  async run(shared: { greeting: string }, event: GreetEvent, context: InvocationContext): Promise<string> {
    this.contexts.push(context);
    return `${shared.greeting}, ${event.name}`;
  }
}

describe('parseEvent', () => {
  test('returns the parsed event', () => {
    expect(parseEvent(GreetEvent, { name: 'Ada' })).toEqual({ name: 'Ada' });
  });

  test('fails with the schema issues', () => {
    let caught: unknown;
    try {
      parseEvent(GreetEvent, { name: 42 });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(InvalidEventError);
    if (caught instanceof InvalidEventError) {
      expect(caught.message).toMatch(/^Unable to parse lambda event: /);
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0].path).toEqual(['name']);
    }
  });
});

describe('createHandler', () => {
  test('fails at load time without a region', () => {
    expect(() => createHandler(new GreetRunner(), { env: {}, logger: silentLogger() })).toThrow(
      ConfigurationError,
    );
  });

  test('runs setup once and reuses shared state', async () => {
    const runner = new GreetRunner();
    const handler = createHandler(runner, { env: ENV, logger: silentLogger() });

    await expect(handler({ name: 'Ada' }, makeContext())).resolves.toBe('Hello, Ada');
    await expect(handler({ name: 'Grace' }, makeContext())).resolves.toBe('Hello, Grace');

    expect(runner.setup).toHaveBeenCalledTimes(1);
  });

  test('does not run setup before the first invocation', () => {
    const runner = new GreetRunner();
    createHandler(runner, { env: ENV, logger: silentLogger() });

    expect(runner.setup).not.toHaveBeenCalled();
  });

  test('passes region, request id and a deadline from the context', async () => {
    const runner = new GreetRunner();
    const handler = createHandler(runner, { env: ENV, logger: silentLogger() });
    const before = Date.now();

    await handler({ name: 'Ada' }, makeContext(30_000, 'req-42'));

    const [context] = runner.contexts;
    expect(context.region).toBe('eu-central-1');
    expect(context.requestId).toBe('req-42');
    expect(context.deadline).toBeGreaterThanOrEqual(before + 30_000);
    expect(context.deadline).toBeLessThanOrEqual(Date.now() + 30_000);
  });

  test('rejects an event that does not match the schema', async () => {
    const runner = new GreetRunner();
    const logger = silentLogger();
    const handler = createHandler(runner, { env: ENV, logger });

    await expect(handler({ name: '' }, makeContext())).rejects.toBeInstanceOf(InvalidEventError);
    expect(runner.contexts).toHaveLength(0);
    expect(logger.error).toHaveBeenCalledWith('Lambda invocation failed', {
      requestId: 'c6af9ac6-7b61-11e6-9a41-93e812345678',
      event: { name: '' },
      error: expect.any(InvalidEventError),
    });
  });

  test('reports a timeout before the function is killed', async () => {
    const runner: Runner<void, GreetEvent, string> = {
      eventSchema: GreetEvent,
      setup: async () => undefined,
      run: (_shared, _event, context) => sleep(5_000, 'late', { signal: context.signal }),
    };
    const handler = createHandler(runner, { env: ENV, logger: silentLogger() });

    await expect(handler({ name: 'Ada' }, makeContext(200))).rejects.toBeInstanceOf(
      InvocationTimeoutError,
    );
  });

  test('runs a failed setup again on the next invocation', async () => {
    const runner = new GreetRunner();
    runner.setup.mockRejectedValueOnce(new Error('secrets unavailable'));
    const logger = silentLogger();
    const handler = createHandler(runner, { env: ENV, logger });

    await expect(handler({ name: 'Ada' }, makeContext())).rejects.toThrow('secrets unavailable');
    expect(logger.error).toHaveBeenCalledWith('Lambda runtime setup failed', {
      region: 'eu-central-1',
      error: expect.objectContaining({ message: 'secrets unavailable' }),
    });
    await expect(handler({ name: 'Ada' }, makeContext())).resolves.toBe('Hello, Ada');
    expect(runner.setup).toHaveBeenCalledTimes(2);
  });
});
