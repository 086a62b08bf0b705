import type {Platform} from './types.js'

export function isPlatform(value: string): value is Platform {
  return /^[^/\s]+\/[^/\s]+$/.test(value)
}

/**
 * Runs tasks with at most `limit` in flight. Results keep the order of `tasks`.
 */
export async function withConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number
): Promise<Array<PromiseSettledResult<T>>> {
  const results: Array<PromiseSettledResult<T>> = Array.from({length: tasks.length})
  let next = 0

  async function worker() {
    while (next < tasks.length) {
      const i = next++
      try {
        results[i] = {status: 'fulfilled', value: await tasks[i]()}
      } catch (error) {
        results[i] = {status: 'rejected', reason: error}
      }
    }
  }

  await Promise.all(Array.from({length: Math.min(Math.max(limit, 1), tasks.length)}, async () => worker()))
  return results
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
