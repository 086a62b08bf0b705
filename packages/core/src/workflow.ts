import type {PublishContext} from './context.js'
import {HoistError, type MetadataError} from './errors.js'
import {MetadataUpload, MetadataValidation, metadataValidationStep} from './metadata.js'
import {WorkflowReport} from './report.js'
import type {Semaphore} from './semaphore.js'
import {failure} from './step-result.js'
import type {Step} from './step.js'
import {BuildForPublish} from './steps/build.js'
import {CheckImageDoesNotExist} from './steps/check-image.js'
import {PushImageToRegistry} from './steps/push-image.js'
import {UploadSpecToCache} from './steps/upload-spec.js'
import type {PlatformArtifactSet, SkippedResult, StepRef, StepResult} from './types.js'

export const reportName = 'PUBLISH RESULTS'

export type WorkflowState = 'GATING' | 'BUILDING' | 'FINALIZING' | 'DONE'

const validTransitions: Record<WorkflowState, readonly WorkflowState[]> = {
  GATING: ['BUILDING', 'FINALIZING', 'DONE'],
  BUILDING: ['FINALIZING', 'DONE'],
  FINALIZING: ['DONE'],
  DONE: []
}

/**
 * A publish step fed from the build output. `input` declares which part of
 * the artifact set the step consumes.
 */
export type PublishStage = {
  step: StepRef;
  /** Attempted even when an earlier stage failed */
  always: boolean;
  run(artifacts: PlatformArtifactSet): Promise<StepResult<unknown>>;
  notRun(reason: string): SkippedResult;
}

export function stage<I>(
  step: Step<I, unknown>,
  input: (artifacts: PlatformArtifactSet) => I,
  options?: {always?: boolean}
): PublishStage {
  return {
    step: step.ref,
    always: options?.always ?? false,
    async run(artifacts) {
      return step.execute(input(artifacts))
    },
    notRun(reason) {
      return step.notRun(reason)
    }
  }
}

/**
 * Publish state machine for one connector.
 *
 * GATING: metadata validation, then the registry existence gate. A failure
 * ends the workflow. An already published image only refreshes the metadata.
 * BUILDING: builds every platform; a failed build ends the workflow.
 * FINALIZING: spec cache upload, registry push, metadata upload. A failed
 * publish stage stops the next publish stages (recorded as skipped), but the
 * metadata upload is always attempted.
 * DONE: the report is assembled, once.
 */
export class PublishWorkflow {
  private current: WorkflowState = 'GATING'
  private readonly results: Array<StepResult<unknown>> = []

  constructor(private readonly context: PublishContext) {}

  get state(): WorkflowState {
    return this.current
  }

  async run(): Promise<WorkflowReport> {
    const {context} = this
    if (this.current !== 'GATING' || this.results.length > 0) {
      throw new HoistError('WORKFLOW_ALREADY_RUN', `Publish workflow for ${context.connector} already ran`)
    }

    context.reporter.emit({...context.job, event: 'PUBLISH_START', imageRef: context.imageRef})
    const metadataUpload = new MetadataUpload(context)

    const gate = await this.runSequence([
      new MetadataValidation(context, context.metadataPath),
      new CheckImageDoesNotExist(context)
    ])

    if (gate.status === 'skipped') {
      context.logger.info('The connector version is already published. Uploading metadata anyway.')
      this.transition('FINALIZING')
      this.results.push(await metadataUpload.execute())
      return this.finish()
    }

    if (gate.status === 'failure') {
      return this.finish()
    }

    this.transition('BUILDING')
    const build = await new BuildForPublish(context).execute()
    this.results.push(build)
    if (build.status !== 'success') {
      return this.finish()
    }

    this.transition('FINALIZING')
    await this.runStages([
      stage(new UploadSpecToCache(context), ([primary]) => primary),
      stage(new PushImageToRegistry(context), artifacts => artifacts),
      stage(metadataUpload, () => undefined, {always: true})
    ], build.output)

    return this.finish()
  }

  /**
   * Runs steps in order until one does not succeed.
   * @returns The last result
   */
  private async runSequence(steps: Array<Step<void, unknown>>): Promise<StepResult<unknown>> {
    let last: StepResult<unknown> | undefined
    for (const step of steps) {
      last = await step.execute()
      this.results.push(last)
      if (last.status !== 'success') {
        break
      }
    }

    if (!last) {
      throw new HoistError('EMPTY_SEQUENCE', 'No step to run')
    }

    return last
  }

  private async runStages(stages: PublishStage[], artifacts: PlatformArtifactSet): Promise<void> {
    let failedStep: StepRef | undefined
    for (const publishStage of stages) {
      if (failedStep && !publishStage.always) {
        this.results.push(publishStage.notRun(`Not run: ${failedStep.title} failed.`))
        continue
      }

      const result = await publishStage.run(artifacts)
      this.results.push(result)
      if (result.status === 'failure') {
        failedStep ??= result.step
      }
    }
  }

  private transition(target: WorkflowState): void {
    if (!validTransitions[this.current].includes(target)) {
      throw new HoistError('INVALID_TRANSITION', `Invalid workflow transition: ${this.current} -> ${target}`)
    }

    this.current = target
  }

  private finish(): WorkflowReport {
    const {context} = this
    this.transition('DONE')
    const report = new WorkflowReport(reportName, context.connector, this.results)
    if (report.status === 'failure') {
      context.reporter.emit({...context.job, event: 'PUBLISH_FAILED', failedSteps: report.failedSteps.map(result => result.step.id)})
    } else {
      context.reporter.emit({...context.job, event: 'PUBLISH_FINISHED', steps: report.results.length})
    }

    return report
  }
}

/**
 * Runs the publish workflow of one connector while holding a semaphore slot.
 * The slot and the context's resources are released on every exit path.
 */
export async function runPublishPipeline(context: PublishContext, semaphore: Semaphore): Promise<WorkflowReport> {
  return semaphore.use(async () => {
    await context.open()
    try {
      return await new PublishWorkflow(context).run()
    } finally {
      await context.close()
    }
  })
}

/**
 * Report of a connector whose metadata file could not be loaded, so no
 * publish context could be built for it.
 */
export function invalidMetadataReport(connector: string, error: MetadataError): WorkflowReport {
  return new WorkflowReport(reportName, connector, [
    failure(metadataValidationStep, {stderr: error.message, code: error.code})
  ])
}
