import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TaskQueueService } from './task-queue.service';

describe('TaskQueueService', () => {
  let queue: TaskQueueService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    queue = new TaskQueueService(new ConfigService({ TASK_INITIAL_BACKOFF_MS: '0', TASK_MAX_BACKOFF_MS: '0' }));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should run a job once when it succeeds', async () => {
    const handler = jest.fn().mockResolvedValue(undefined);

    queue.enqueue('ok', handler, { maxRetries: 3 });
    await queue.drain();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(queue.pendingCount).toBe(0);
  });

  it('should retry a failing job until it succeeds', async () => {
    const handler = jest
      .fn()
      .mockRejectedValueOnce(new Error('Network error'))
      .mockRejectedValueOnce(new Error('Network error'))
      .mockResolvedValue(undefined);

    queue.enqueue('flaky', handler, { maxRetries: 6 });
    await queue.drain();

    expect(handler).toHaveBeenCalledTimes(3);
    expect(Logger.prototype.error).not.toHaveBeenCalled();
  });

  it('should give up after the last retry and log the error', async () => {
    const handler = jest.fn().mockRejectedValue(new Error('Network error'));

    queue.enqueue('broken', handler, { maxRetries: 1 });
    await queue.drain();

    expect(handler).toHaveBeenCalledTimes(2);
    expect(Logger.prototype.error).toHaveBeenCalledWith('task:give-up name=broken err=Network error');
  });

  it('should reject from runWithRetries once retries are exhausted', async () => {
    const handler = jest.fn().mockRejectedValue(new Error('boom'));

    await expect(queue.runWithRetries('direct', handler, { maxRetries: 2 })).rejects.toThrow('boom');
    expect(handler).toHaveBeenCalledTimes(3);
  });

  it('should wait for jobs enqueued by other jobs when draining', async () => {
    const inner = jest.fn().mockResolvedValue(undefined);
    const outer = jest.fn(async () => {
      queue.enqueue('inner', inner, { maxRetries: 0 });
    });

    queue.enqueue('outer', outer, { maxRetries: 0 });
    await queue.drain();

    expect(inner).toHaveBeenCalledTimes(1);
  });

  it('should skip a unique job while one with the same name is running', async () => {
    let finish: () => void = () => undefined;
    const first = jest.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );
    const second = jest.fn().mockResolvedValue(undefined);

    queue.enqueue('sync:1', first, { maxRetries: 0, unique: true });
    queue.enqueue('sync:1', second, { maxRetries: 0, unique: true });
    queue.enqueue('sync:2', second, { maxRetries: 0, unique: true });
    finish();
    await queue.drain();

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);

    queue.enqueue('sync:1', second, { maxRetries: 0, unique: true });
    await queue.drain();
    expect(second).toHaveBeenCalledTimes(2);
  });

  it('should stop retrying on shutdown instead of waiting out the backoff', async () => {
    const slowQueue = new TaskQueueService(
      new ConfigService({ TASK_INITIAL_BACKOFF_MS: '600000', TASK_MAX_BACKOFF_MS: '600000' }),
    );
    const handler = jest.fn().mockRejectedValue(new Error('Network error'));

    slowQueue.enqueue('failing', handler, { maxRetries: 6 });
    await new Promise((resolve) => setImmediate(resolve));
    await slowQueue.onApplicationShutdown();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(slowQueue.pendingCount).toBe(0);
    expect(Logger.prototype.error).toHaveBeenCalledWith('task:give-up name=failing err=Network error');

    slowQueue.enqueue('late', handler, { maxRetries: 0 });
    expect(handler).toHaveBeenCalledTimes(1);
  });
});
