/**
 * Deadlines for network stages.
 */

export interface StageDeadline {
  /** Aborts when the deadline passes or the parent aborts */
  signal: AbortSignal;
  /** Did the deadline (not the parent) fire? */
  timedOut: () => boolean;
  /** Release the timer */
  clear: () => void;
}

/**
 * Create a stage signal bounded by `timeoutMs` and linked to `parent`.
 */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): StageDeadline {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);

  const onParentAbort = () => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    clear: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Race a promise against a timer, so a collaborator that ignores its
 * abort signal still cannot hold a stage past its deadline.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
