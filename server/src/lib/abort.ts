/**
 * Combine a caller's AbortSignal with a timeout.
 *
 * The combined signal aborts with the caller's reason if the caller aborts
 * first, or with a timeout error once `timeoutMs` elapses. Always call
 * `cleanup` once the guarded work settles.
 */
export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; timedOut: () => boolean; cleanup: () => void } {
  const combinedController = new AbortController();
  let didTimeOut = false;

  const timeout = setTimeout(() => {
    didTimeOut = true;
    if (!combinedController.signal.aborted) {
      combinedController.abort(new Error(`Timed out after ${timeoutMs}ms`));
    }
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(callerSignal?.reason);
  };

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: combinedController.signal, timedOut: () => didTimeOut, cleanup };
}

/**
 * Link a child controller to a parent signal so aborting the parent aborts
 * the child. Returns a function that detaches the link.
 */
export function linkAbort(parent: AbortSignal, child: AbortController): () => void {
  const onAbort = () => {
    if (!child.signal.aborted) child.abort(parent.reason);
  };
  if (parent.aborted) {
    onAbort();
    return () => {};
  }
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}
