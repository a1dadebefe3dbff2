/**
 * Per-call deadlines combined with an optional run-level AbortSignal.
 */

export class DeadlineExceededError extends Error {
  constructor(public timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Operation aborted');
}

/**
 * Runs `task` with a signal that aborts when either the timer fires or the
 * parent signal aborts. The returned promise settles as soon as that
 * happens, even if `task` ignores its signal.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw abortReason(parent);
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent ? abortReason(parent) : undefined);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const timer = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(abortReason(controller.signal)), {
      once: true,
    });
  });

  try {
    return await Promise.race([task(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
