import process from 'node:process'
import chalk, {Chalk, type ChalkInstance} from 'chalk'
import type {Command} from 'commander'
import {
  ConsoleReporter,
  DockerCliBackend,
  DockerManifestInspector,
  GcloudStorage,
  MetadataError,
  PublishContext,
  Semaphore,
  createLogger,
  errorMessage,
  invalidMetadataReport,
  readConnectorMetadata,
  runPublishPipeline,
  type ConnectorMetadata,
  type WorkflowReport
} from '@hoist/core'
import {InteractiveReporter} from '../interactive-reporter.js'
import {loadConfig} from '../config.js'
import {resolvePublishSettings, type PublishOptions} from '../settings.js'
import {getGlobalOptions, resolveConnectorDir} from '../utils.js'

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value]
}

function printSummary(reports: WorkflowReport[], paint: ChalkInstance): void {
  for (const report of reports) {
    const status = report.status === 'success' ? paint.green('success') : paint.red('failure')
    console.log(paint.bold(`\n${report.name}: ${paint.cyan(report.connector)} ${status}`))
    for (const result of report.results) {
      const symbol = result.status === 'success'
        ? paint.green('✓')
        : (result.status === 'skipped' ? paint.gray('⊙') : paint.red('✗'))
      console.log(`  ${symbol} ${result.step.id.padEnd(20)} ${result.step.title}`)
      if (result.status === 'failure') {
        console.log(paint.red(`      ${result.stderr.trimEnd().split('\n').join('\n      ')}`))
      }
    }
  }
}

export function registerPublishCommand(program: Command): void {
  program
    .command('publish')
    .description('Publish connector images, specs and metadata')
    .argument('<connector-dirs...>', 'Connector directories containing a metadata.yaml')
    .option('-c, --concurrency <number>', 'Max connectors published at once (default: 1)', Number)
    .option('--build-concurrency <number>', 'Max platform builds per connector (default: all platforms)', Number)
    .option('--pre-release', 'Publish a pre-release: never update the latest tags')
    .option('--registry <host>', 'Image registry host (default: docker.io)')
    .option('-p, --platform <platform>', 'Required platform, repeatable (default: linux/amd64 and linux/arm64)', collect)
    .option('--spec-cache-bucket <bucket>', 'Bucket receiving connector specs')
    .option('--metadata-bucket <bucket>', 'Bucket receiving metadata files')
    .option('--spec-cache-credentials <path>', 'Credential file for the spec cache bucket')
    .option('--metadata-credentials <path>', 'Credential file for the metadata bucket')
    .option('--verbose', 'Print every step as it starts and its output')
    .action(async (connectorDirs: string[], options: PublishOptions, cmd: Command) => {
      const {json, color, logLevel} = getGlobalOptions(cmd)
      const config = await loadConfig(process.cwd())
      const settings = resolvePublishSettings(options, config, process.env)

      const logger = createLogger({level: logLevel ?? (json ? undefined : 'warn')})
      const reporter = json
        ? new ConsoleReporter(logger)
        : new InteractiveReporter({verbose: options.verbose, color})
      const backend = new DockerCliBackend()
      const inspector = new DockerManifestInspector()
      const storage = new GcloudStorage()
      const semaphore = new Semaphore(settings.concurrency)
      const controller = new AbortController()

      const onSignal = (signal: NodeJS.Signals) => {
        logger.warn({signal}, 'cancelling running publishes')
        controller.abort()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      const publishConnector = async (pathOrDir: string): Promise<WorkflowReport> => {
        const {name, dir} = await resolveConnectorDir(pathOrDir)
        let metadata: ConnectorMetadata
        try {
          metadata = await readConnectorMetadata(dir)
        } catch (error: unknown) {
          if (error instanceof MetadataError) {
            return invalidMetadataReport(name, error)
          }

          throw error
        }

        const context = new PublishContext({
          connector: name,
          connectorDir: dir,
          metadata,
          registry: settings.registry,
          platforms: settings.platforms,
          preRelease: settings.preRelease,
          specCacheBucket: settings.specCacheBucket,
          metadataBucket: settings.metadataBucket,
          specCacheCredentials: settings.specCacheCredentials,
          metadataCredentials: settings.metadataCredentials,
          buildConcurrency: settings.buildConcurrency,
          backend,
          inspector,
          storage,
          reporter,
          logger,
          signal: controller.signal
        })
        return runPublishPipeline(context, semaphore)
      }

      try {
        const outcomes = await Promise.allSettled(connectorDirs.map(async dir => publishConnector(dir)))
        const reports: WorkflowReport[] = []
        const errors: Array<{connector: string; error: string}> = []

        for (const [index, outcome] of outcomes.entries()) {
          if (outcome.status === 'fulfilled') {
            reports.push(outcome.value)
          } else {
            errors.push({connector: connectorDirs[index], error: errorMessage(outcome.reason)})
          }
        }

        if (json) {
          console.log(JSON.stringify({reports, errors}, null, 2))
        } else {
          const paint = color ? chalk : new Chalk({level: 0})
          printSummary(reports, paint)
          for (const {connector, error} of errors) {
            console.error(paint.red(`\n✗ ${connector}: ${error}`))
          }
        }

        if (errors.length > 0 || reports.some(report => report.status === 'failure')) {
          process.exitCode = 1
        }
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
