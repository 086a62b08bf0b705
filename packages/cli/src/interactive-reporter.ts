import process from 'node:process'
import {Chalk, type ChalkInstance} from 'chalk'
import {type Reporter, type PublishEvent, type StepFailedEvent, formatDuration} from '@hoist/core'

export type InteractiveReporterOptions = {
  verbose?: boolean;
  color?: boolean;
  write?: (line: string) => void;
}

/**
 * Reporter printing one colored line per event to stderr. Several connectors
 * publish at once, so every line carries the connector name.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly chalk: ChalkInstance
  private readonly write: (line: string) => void
  private readonly failures = new Map<string, StepFailedEvent[]>()

  constructor(options?: InteractiveReporterOptions) {
    this.verbose = options?.verbose ?? false
    this.chalk = options?.color === false ? new Chalk({level: 0}) : new Chalk()
    this.write = options?.write ?? (line => {
      process.stderr.write(`${line}\n`)
    })
  }

  emit(event: PublishEvent): void {
    const prefix = this.chalk.gray(`[${event.connector}]`)

    switch (event.event) {
      case 'PUBLISH_START': {
        this.write(this.chalk.bold(`▶ ${event.connector}: publishing ${this.chalk.cyan(event.imageRef)}`))
        break
      }

      case 'STEP_STARTING': {
        if (this.verbose) {
          this.write(`${prefix} ${this.chalk.cyan('…')} ${event.step.title}`)
        }

        break
      }

      case 'STEP_FINISHED': {
        this.write(`${prefix} ${this.chalk.green('✓')} ${this.chalk.green(event.step.title)} (${formatDuration(event.durationMs)})`)
        if (this.verbose && event.stdout) {
          this.write(`${prefix}   ${this.chalk.gray(event.stdout)}`)
        }

        break
      }

      case 'STEP_SKIPPED': {
        const reason = event.reason ? ` (${event.reason})` : ''
        this.write(`${prefix} ${this.chalk.gray('⊙')} ${this.chalk.gray(`${event.step.title}${reason}`)}`)
        break
      }

      case 'STEP_FAILED': {
        const code = event.code ? ` (${event.code})` : ''
        this.write(`${prefix} ${this.chalk.red('✗')} ${this.chalk.red(`${event.step.title}${code}`)}`)
        const failures = this.failures.get(event.jobId) ?? []
        failures.push(event)
        this.failures.set(event.jobId, failures)
        break
      }

      case 'PUBLISH_FINISHED': {
        this.write(this.chalk.bold.green(`✓ ${event.connector}: published (${event.steps} steps)`))
        break
      }

      case 'PUBLISH_FAILED': {
        this.printFailedStderr(event.jobId, event.failedSteps)
        this.write(this.chalk.bold.red(`✗ ${event.connector}: publish failed`))
        break
      }
    }
  }

  private printFailedStderr(jobId: string, failedSteps: string[]): void {
    const failures = (this.failures.get(jobId) ?? []).filter(failure => failedSteps.includes(failure.step.id))
    for (const failure of failures) {
      const lines = failure.stderr.trimEnd().split('\n').slice(-InteractiveReporter.maxStderrLines)
      this.write(this.chalk.red(`  ── ${failure.step.title} stderr ──`))
      for (const line of lines) {
        this.write(this.chalk.red(`  ${line}`))
      }
    }

    this.failures.delete(jobId)
  }
}
