export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor(label: string) {
    super(`${label} aborted`);
    this.name = 'AbortedError';
  }
}

/**
 * Runs `work` with its own AbortSignal that fires after `ms` or when `parent`
 * aborts, whichever comes first. The returned promise settles as soon as the
 * signal fires even if `work` ignores it.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) throw new AbortedError(label);

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const cancelled = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, ms));
    }, ms);
    if (parent) {
      onParentAbort = () => {
        controller.abort();
        reject(new AbortedError(label));
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([work(controller.signal), cancelled]);
  } finally {
    if (timer) clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
  }
}
