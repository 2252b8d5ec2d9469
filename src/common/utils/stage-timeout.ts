import { RequestCancelledError, StageTimeoutError } from './errors';

/**
 * Run one pipeline stage against its timeout and the request's abort signal.
 *
 * The task receives a child signal that is aborted when either fires, so HTTP
 * calls made inside the stage are released as well. Rejects with
 * `StageTimeoutError` or `RequestCancelledError`; the task's own errors pass
 * through untouched.
 */
export async function withStageTimeout<T>(
  stage: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal,
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new RequestCancelledError();
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(new RequestCancelledError());
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  const interrupted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => {
        const reason: unknown = controller.signal.reason;
        reject(
          reason instanceof StageTimeoutError
            ? reason
            : new RequestCancelledError(),
        );
      },
      { once: true },
    );
  });

  const timer = setTimeout(
    () => controller.abort(new StageTimeoutError(stage, timeoutMs)),
    timeoutMs,
  );

  try {
    return await Promise.race([task(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
