import {mkdtemp, readFile, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {setTimeout} from 'node:timers/promises'
import {PublishContext, type PublishContextOptions} from '../context.js'
import {ContainerBackend, type BuildRequest, type ManifestInspector, type ObjectStorage, type RunImageRequest, type UploadRequest} from '../engine/index.js'
import {OperationCancelledError, type HoistError} from '../errors.js'
import {createLogger} from '../logger.js'
import type {PublishEvent, Reporter} from '../reporter.js'
import type {BuiltImage, CallOptions, CommandResult, Platform} from '../types.js'

export const repository = 'hoist/source-test'
export const tag = '1.2.3'
export const imageRef = `docker.io/${repository}:${tag}`

export const ossSpec = '{"type":"SPEC","spec":{"connectionSpecification":{"type":"object"}}}'
export const cloudSpec = '{"type":"SPEC","spec":{"connectionSpecification":{"type":"object","required":["host"]}}}'

/**
 * Creates a temporary directory for test isolation.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'hoist-test-'))
}

/**
 * Creates a connector directory holding a `metadata.yaml`.
 */
export async function createConnectorDir(options?: {repository?: string; tag?: string}): Promise<string> {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'metadata.yaml'), [
    'data:',
    '  name: Test Source',
    `  dockerRepository: ${options?.repository ?? repository}`,
    `  dockerImageTag: "${options?.tag ?? tag}"`,
    ''
  ].join('\n'), 'utf8')
  return dir
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: PublishEvent[]} {
  const events: PublishEvent[] = []
  const reporter: Reporter = {
    emit(event: PublishEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/** Timestamped record of an external call, shared by all fakes of a test. */
export type RecordedCall = {
  label: string;
  kind: 'build' | 'run' | 'push' | 'inspect' | 'upload';
  target: string;
  startedAt: number;
  finishedAt: number;
}

async function record<T>(log: RecordedCall[], call: Omit<RecordedCall, 'startedAt' | 'finishedAt'>, delayMs: number, fn: () => T | Promise<T>): Promise<T> {
  const startedAt = performance.now()
  if (delayMs > 0) {
    await setTimeout(delayMs)
  }

  try {
    return await fn()
  } finally {
    log.push({...call, startedAt, finishedAt: performance.now()})
  }
}

function throwIfAborted(command: string, options?: CallOptions): void {
  if (options?.signal?.aborted) {
    throw new OperationCancelledError(command)
  }
}

export class FakeBackend extends ContainerBackend {
  readonly builds: BuildRequest[] = []
  readonly runs: Array<{image: BuiltImage; request: RunImageRequest}> = []
  readonly pushes: Array<{primary: BuiltImage; ref: string; variants: readonly BuiltImage[]}> = []
  readonly buildErrors = new Map<Platform, Error>()
  readonly buildDelays = new Map<Platform, number>()
  specOutputs: Record<string, string> = {OSS: `starting\n${ossSpec}\n`, CLOUD: `starting\n${ossSpec}\n`}
  pushError?: HoistError

  constructor(private readonly log: RecordedCall[] = [], private readonly label = 'default', private readonly delayMs = 0) {
    super()
  }

  async build(request: BuildRequest, options?: CallOptions): Promise<BuiltImage> {
    const delay = this.buildDelays.get(request.platform) ?? this.delayMs
    return record(this.log, {label: this.label, kind: 'build', target: request.platform}, delay, () => {
      throwIfAborted('docker buildx', options)
      this.builds.push(request)
      const error = this.buildErrors.get(request.platform)
      if (error) {
        throw error
      }

      return {platform: request.platform, ref: `${request.repository}:${request.tag}-${request.platform}`}
    })
  }

  async run(image: BuiltImage, request: RunImageRequest, options?: CallOptions): Promise<string> {
    return record(this.log, {label: this.label, kind: 'run', target: image.ref}, this.delayMs, () => {
      throwIfAborted('docker run', options)
      this.runs.push({image, request})
      return this.specOutputs[request.env?.DEPLOYMENT_MODE ?? 'OSS'] ?? ''
    })
  }

  async push(primary: BuiltImage, ref: string, variants: readonly BuiltImage[], options?: CallOptions): Promise<string> {
    return record(this.log, {label: this.label, kind: 'push', target: ref}, this.delayMs, () => {
      throwIfAborted('docker push', options)
      this.pushes.push({primary, ref, variants})
      if (this.pushError) {
        throw this.pushError
      }

      return ref
    })
  }
}

export function manifestList(platforms: Array<{os: string; architecture: string}>): string {
  return JSON.stringify({
    schemaVersion: 2,
    mediaType: 'application/vnd.docker.distribution.manifest.list.v2+json',
    manifests: platforms.map((platform, i) => ({
      digest: `sha256:${String(i).repeat(8)}`,
      platform
    }))
  }, null, 2)
}

export const missingManifest: CommandResult = {exitCode: 1, stdout: '', stderr: `no such manifest: ${imageRef}`}

export const publishedManifest: CommandResult = {
  exitCode: 0,
  stdout: manifestList([{os: 'linux', architecture: 'amd64'}, {os: 'linux', architecture: 'arm64'}]),
  stderr: ''
}

export class FakeInspector implements ManifestInspector {
  readonly inspected: string[] = []

  constructor(
    public response: CommandResult = missingManifest,
    private readonly log: RecordedCall[] = [],
    private readonly label = 'default',
    private readonly delayMs = 0
  ) {}

  async inspect(ref: string, options?: CallOptions): Promise<CommandResult> {
    return record(this.log, {label: this.label, kind: 'inspect', target: ref}, this.delayMs, () => {
      throwIfAborted('docker manifest', options)
      this.inspected.push(ref)
      return this.response
    })
  }
}

export class FakeStorage implements ObjectStorage {
  readonly uploads: Array<UploadRequest & {content: string}> = []
  readonly failures = new Map<string, CommandResult>()

  constructor(private readonly log: RecordedCall[] = [], private readonly label = 'default', private readonly delayMs = 0) {}

  async upload(request: UploadRequest, options?: CallOptions): Promise<CommandResult> {
    const content = await readFile(request.file, 'utf8')
    return record(this.log, {label: this.label, kind: 'upload', target: request.key}, this.delayMs, () => {
      throwIfAborted('upload', options)
      this.uploads.push({...request, content})
      return this.failures.get(request.key) ?? {exitCode: 0, stdout: `Copied ${request.key}`, stderr: ''}
    })
  }
}

export type TestContext = {
  context: PublishContext;
  backend: FakeBackend;
  inspector: FakeInspector;
  storage: FakeStorage;
  events: PublishEvent[];
}

/**
 * Builds a publish context wired to in-process fakes, for a connector
 * directory created on the fly unless one is given.
 */
export async function createTestContext(options?: Partial<PublishContextOptions> & {
  backend?: FakeBackend;
  inspector?: FakeInspector;
  storage?: FakeStorage;
}): Promise<TestContext> {
  const backend = options?.backend ?? new FakeBackend()
  const inspector = options?.inspector ?? new FakeInspector()
  const storage = options?.storage ?? new FakeStorage()
  const {reporter, events} = recordingReporter()
  const connectorDir = options?.connectorDir ?? await createConnectorDir()

  const context = new PublishContext({
    connector: 'source-test',
    metadata: {dockerRepository: repository, dockerImageTag: tag},
    specCacheBucket: 'spec-cache',
    metadataBucket: 'metadata-store',
    reporter,
    logger: createLogger({level: 'silent'}),
    ...options,
    connectorDir,
    backend,
    inspector,
    storage
  })

  return {context, backend, inspector, storage, events}
}
