import type {FailureResult, SkippedResult, StepRef, StepResult, SuccessResult} from './types.js'

type Streams = {
  stdout?: string;
  stderr?: string;
}

export function success<T>(step: StepRef, output: T, streams?: Streams): SuccessResult<T> {
  const result: SuccessResult<T> = {step, status: 'success', output, ...streams}
  return Object.freeze(result)
}

export function skipped(step: StepRef, streams?: Streams): SkippedResult {
  const result: SkippedResult = {step, status: 'skipped', ...streams}
  return Object.freeze(result)
}

/**
 * A failure always carries a diagnostic: an empty `stderr` is replaced by a
 * generic message naming the step.
 */
export function failure(step: StepRef, details: {stderr?: string; stdout?: string; code?: string}): FailureResult {
  const stderr = details.stderr && details.stderr.trim() !== '' ? details.stderr : `${step.title} failed without diagnostic output`
  const result: FailureResult = {
    step,
    status: 'failure',
    stderr,
    ...(details.stdout === undefined ? {} : {stdout: details.stdout}),
    ...(details.code === undefined ? {} : {code: details.code})
  }
  return Object.freeze(result)
}

export function isSuccess<T>(result: StepResult<T>): result is SuccessResult<T> {
  return result.status === 'success'
}
