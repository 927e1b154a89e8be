/**
 * An abort signal that fires after `timeoutMs` or when the caller's signal
 * aborts, whichever comes first. Call dispose() once the request settles.
 */
export interface TimeoutSignal {
  signal: AbortSignal
  /** True when the timeout, not the caller, aborted */
  timedOut(): boolean
  dispose(): void
}

export function timeoutSignal(timeoutMs: number, parent?: AbortSignal): TimeoutSignal {
  const controller = new AbortController()
  let expired = false
  const timer = setTimeout(() => {
    expired = true
    controller.abort()
  }, timeoutMs)
  const onParentAbort = () => controller.abort()

  if (parent?.aborted) {
    controller.abort()
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true })
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
    },
  }
}
