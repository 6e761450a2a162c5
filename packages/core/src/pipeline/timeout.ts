/**
 * Run an abortable call under a deadline
 *
 * The call receives a signal that is aborted when the deadline passes;
 * the returned promise rejects with the error from `onTimeout`.
 * A non-positive or infinite timeout disables the deadline.
 */
export async function callWithTimeout<T>(
  call: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();

  if (!(timeoutMs > 0) || !Number.isFinite(timeoutMs)) {
    return call(controller.signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
