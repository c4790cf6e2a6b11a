/**
 * Timer helpers shared by the limiter and the turn driver.
 */
import { createTimeoutError } from '@crewroom/types'

/**
 * Abortable sleep. Rejects with a timeout error when the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(createTimeoutError('Wait aborted', { component: 'orchestrator' }))
      return
    }

    const onAbort = (): void => {
      clearTimeout(timer)
      reject(createTimeoutError('Wait aborted', { component: 'orchestrator' }))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
