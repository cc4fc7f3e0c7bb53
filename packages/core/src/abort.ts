/**
 * Run `operation` so that it settles no later than `signal` aborts.
 *
 * The operation itself is not interrupted; its eventual result is ignored
 * once the signal has fired and the returned promise rejects with
 * `signal.reason`.
 */
export function raceAbort<T>(signal: AbortSignal | undefined, operation: () => Promise<T>): Promise<T> {
  if (!signal) {
    return operation()
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason)
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason)
    signal.addEventListener('abort', onAbort, { once: true })

    operation().then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      },
    )
  })
}
