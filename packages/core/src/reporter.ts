import {createLogger, type Logger} from './logger.js'
import type {StepRef} from './types.js'

/** Common fields identifying one connector publish. */
export type JobContext = {
  connector: string;
  jobId: string;
}

/**
 * Discriminated union of publish workflow events.
 *
 * Lifecycle:
 * 1. PUBLISH_START - Workflow holds a concurrency slot and begins
 * 2. For each step that runs:
 *    a. STEP_STARTING
 *    b. STEP_FINISHED, STEP_SKIPPED or STEP_FAILED
 * 3. PUBLISH_FINISHED - Report assembled without failures
 *    OR PUBLISH_FAILED - At least one step failed
 */
export type PublishStartEvent = JobContext & {
  event: 'PUBLISH_START';
  imageRef: string;
}

export type StepStartingEvent = JobContext & {
  event: 'STEP_STARTING';
  step: StepRef;
}

export type StepFinishedEvent = JobContext & {
  event: 'STEP_FINISHED';
  step: StepRef;
  durationMs: number;
  stdout?: string;
}

export type StepSkippedEvent = JobContext & {
  event: 'STEP_SKIPPED';
  step: StepRef;
  durationMs: number;
  reason?: string;
}

export type StepFailedEvent = JobContext & {
  event: 'STEP_FAILED';
  step: StepRef;
  durationMs: number;
  stderr: string;
  code?: string;
}

export type PublishFinishedEvent = JobContext & {
  event: 'PUBLISH_FINISHED';
  steps: number;
}

export type PublishFailedEvent = JobContext & {
  event: 'PUBLISH_FAILED';
  failedSteps: string[];
}

export type PublishEvent =
  | PublishStartEvent
  | StepStartingEvent
  | StepFinishedEvent
  | StepSkippedEvent
  | StepFailedEvent
  | PublishFinishedEvent
  | PublishFailedEvent

/**
 * Interface for reporting publish workflow events.
 */
export type Reporter = {
  emit(event: PublishEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  constructor(private readonly logger: Logger = createLogger()) {}

  emit(event: PublishEvent): void {
    if (event.event === 'STEP_FAILED' || event.event === 'PUBLISH_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }
}
