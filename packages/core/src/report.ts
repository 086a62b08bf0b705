import type {FailureResult, StepResult} from './types.js'

export type ReportStatus = 'success' | 'failure'

/**
 * Ordered results of one publish workflow. Skipped steps do not fail the report.
 */
export class WorkflowReport {
  readonly results: ReadonlyArray<StepResult<unknown>>

  constructor(
    readonly name: string,
    readonly connector: string,
    results: ReadonlyArray<StepResult<unknown>>
  ) {
    this.results = Object.freeze([...results])
    Object.freeze(this)
  }

  get status(): ReportStatus {
    return this.failedSteps.length > 0 ? 'failure' : 'success'
  }

  get failedSteps(): FailureResult[] {
    return this.results.filter((result): result is FailureResult => result.status === 'failure')
  }

  toJSON() {
    return {
      name: this.name,
      connector: this.connector,
      status: this.status,
      steps: this.results.map(result => ({
        id: result.step.id,
        title: result.step.title,
        status: result.status,
        stdout: result.stdout,
        stderr: result.stderr,
        code: result.status === 'failure' ? result.code : undefined
      }))
    }
  }
}
