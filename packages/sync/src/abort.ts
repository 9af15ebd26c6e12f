/**
 * AbortController that also aborts when a parent signal does.
 *
 * Call `release()` once the controller is no longer needed so the parent
 * does not keep a listener alive.
 */
export function createLinkedController(parent?: AbortSignal): {
  controller: AbortController;
  release: () => void;
} {
  const controller = new AbortController();
  if (!parent) {
    return { controller, release: () => {} };
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, release: () => {} };
  }
  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return {
    controller,
    release: () => parent.removeEventListener('abort', onAbort),
  };
}

/**
 * Resolve after `ms`, or reject with the abort reason when `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
