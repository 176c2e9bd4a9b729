const ABORTED = { done: true, value: undefined } as const;

/** Settles once `signal` aborts. Never settles without a signal. */
function whenAborted(signal: AbortSignal | undefined): Promise<typeof ABORTED> {
  return new Promise((resolve) => {
    if (signal === undefined) return;
    if (signal.aborted) {
      resolve(ABORTED);
      return;
    }
    signal.addEventListener('abort', () => resolve(ABORTED), { once: true });
  });
}

/**
 * Iterate `iterator` until it ends or `signal` aborts.
 *
 * On abort, a `next()` still in flight is abandoned and the iterator is asked
 * to `return()` without waiting for a stalled producer to answer.
 */
export async function* untilAborted<T>(iterator: AsyncIterator<T>, signal?: AbortSignal): AsyncIterable<T> {
  const aborted = whenAborted(signal);
  let exhausted = false;

  try {
    while (signal?.aborted !== true) {
      const next = await Promise.race([iterator.next(), aborted]);
      if (next.done) {
        exhausted = signal?.aborted !== true;
        return;
      }
      yield next.value;
    }
  } finally {
    if (!exhausted) {
      await Promise.race([iterator.return?.(), aborted]);
    }
  }
}
