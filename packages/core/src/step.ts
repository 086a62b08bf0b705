import type {PublishContext} from './context.js'
import {HoistError} from './errors.js'
import {failure, skipped, success} from './step-result.js'
import type {FailureResult, SkippedResult, StepRef, StepResult, SuccessResult} from './types.js'

/**
 * A unit of publish work with a typed input and output.
 *
 * Subclasses implement `run()`. `execute()` reports the step's lifecycle and
 * turns expected errors into failure results; defects propagate. Side effects
 * only happen inside `run()`.
 */
export abstract class Step<I = void, O = undefined> {
  abstract readonly id: string
  abstract readonly title: string

  constructor(protected readonly context: PublishContext) {}

  get ref(): StepRef {
    return {id: this.id, title: this.title}
  }

  async execute(input: I): Promise<StepResult<O>> {
    const {reporter, job} = this.context
    const step = this.ref
    const startedAt = Date.now()
    reporter.emit({...job, event: 'STEP_STARTING', step})

    let result: StepResult<O>
    try {
      result = await this.run(input)
    } catch (error) {
      if (!(error instanceof HoistError) || !error.expected) {
        throw error
      }

      result = failure(step, {stderr: error.message, code: error.code})
    }

    const durationMs = Date.now() - startedAt
    switch (result.status) {
      case 'success': {
        reporter.emit({...job, event: 'STEP_FINISHED', step, durationMs, stdout: result.stdout})
        break
      }

      case 'skipped': {
        reporter.emit({...job, event: 'STEP_SKIPPED', step, durationMs, reason: result.stdout ?? result.stderr})
        break
      }

      case 'failure': {
        reporter.emit({...job, event: 'STEP_FAILED', step, durationMs, stderr: result.stderr, code: result.code})
        break
      }
    }

    return result
  }

  /**
   * Result of a step that was never started because an earlier one failed.
   */
  notRun(reason: string): SkippedResult {
    const result = skipped(this.ref, {stdout: reason})
    this.context.reporter.emit({...this.context.job, event: 'STEP_SKIPPED', step: result.step, durationMs: 0, reason})
    return result
  }

  protected abstract run(input: I): Promise<StepResult<O>>

  protected success(output: O, streams?: {stdout?: string; stderr?: string}): SuccessResult<O> {
    return success(this.ref, output, streams)
  }

  protected skipped(streams?: {stdout?: string; stderr?: string}): SkippedResult {
    return skipped(this.ref, streams)
  }

  protected failure(details: {stderr?: string; stdout?: string; code?: string}): FailureResult {
    return failure(this.ref, details)
  }
}
