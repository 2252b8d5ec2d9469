import { withStageTimeout } from './stage-timeout';
import { RequestCancelledError, StageTimeoutError } from './errors';

describe('withStageTimeout', () => {
  it('should resolve with the task result', async () => {
    await expect(withStageTimeout('classify', 100, async () => 'EDUCATION')).resolves.toBe(
      'EDUCATION',
    );
  });

  it('should reject with a StageTimeoutError and abort the task signal', async () => {
    let taskSignal: AbortSignal | undefined;

    const run = withStageTimeout('respond', 10, (signal) => {
      taskSignal = signal;
      return new Promise<string>(() => undefined);
    });

    await expect(run).rejects.toBeInstanceOf(StageTimeoutError);
    await expect(run).rejects.toMatchObject({ stage: 'respond', timeoutMs: 10 });
    expect(taskSignal?.aborted).toBe(true);
  });

  it('should pass task errors through unchanged', async () => {
    const failure = new Error('model offline');

    await expect(
      withStageTimeout('respond', 100, async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
  });

  it('should reject at once when the request is already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const task = jest.fn(async () => 'never');

    await expect(withStageTimeout('retrieve', 100, task, controller.signal)).rejects.toBeInstanceOf(
      RequestCancelledError,
    );
    expect(task).not.toHaveBeenCalled();
  });

  it('should reject with RequestCancelledError when the request is cancelled mid-stage', async () => {
    const controller = new AbortController();

    const run = withStageTimeout(
      'retrieve',
      1000,
      () => new Promise<string>(() => undefined),
      controller.signal,
    );
    controller.abort();

    await expect(run).rejects.toBeInstanceOf(RequestCancelledError);
  });
});
