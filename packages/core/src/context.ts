import {randomUUID} from 'node:crypto'
import {mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {ContainerBackend, ManifestInspector, ObjectStorage} from './engine/index.js'
import {HoistError} from './errors.js'
import {createLogger, type Logger} from './logger.js'
import {ConsoleReporter, type JobContext, type Reporter} from './reporter.js'
import {defaultPlatforms, type ConnectorMetadata, type Platform} from './types.js'

export type PublishContextOptions = {
  /** Connector name, used to label events and logs */
  connector: string;
  connectorDir: string;
  metadata: ConnectorMetadata;
  /** Defaults to `metadata.yaml` in the connector directory */
  metadataPath?: string;
  /** Registry host prefixed to image references (default: docker.io) */
  registry?: string;
  platforms?: readonly Platform[];
  preRelease?: boolean;
  specCacheBucket: string;
  metadataBucket: string;
  specCacheCredentials?: string;
  metadataCredentials?: string;
  /** Max platform builds in flight (default: all platforms) */
  buildConcurrency?: number;
  backend: ContainerBackend;
  inspector: ManifestInspector;
  storage: ObjectStorage;
  reporter?: Reporter;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Everything one connector publish needs. Each workflow invocation owns its
 * context; the temporary directory exists between `open()` and `close()`.
 */
export class PublishContext {
  readonly connector: string
  readonly connectorDir: string
  readonly metadata: ConnectorMetadata
  readonly metadataPath: string
  readonly registry: string
  readonly platforms: readonly Platform[]
  readonly preRelease: boolean
  readonly specCacheBucket: string
  readonly metadataBucket: string
  readonly specCacheCredentials?: string
  readonly metadataCredentials?: string
  readonly buildConcurrency: number
  readonly backend: ContainerBackend
  readonly inspector: ManifestInspector
  readonly storage: ObjectStorage
  readonly reporter: Reporter
  readonly logger: Logger
  readonly signal?: AbortSignal
  readonly job: JobContext

  private workDir?: string

  constructor(options: PublishContextOptions) {
    this.connector = options.connector
    this.connectorDir = options.connectorDir
    this.metadata = options.metadata
    this.metadataPath = options.metadataPath ?? join(options.connectorDir, 'metadata.yaml')
    this.registry = options.registry ?? 'docker.io'
    this.platforms = options.platforms ?? defaultPlatforms
    this.preRelease = options.preRelease ?? false
    this.specCacheBucket = options.specCacheBucket
    this.metadataBucket = options.metadataBucket
    this.specCacheCredentials = options.specCacheCredentials
    this.metadataCredentials = options.metadataCredentials
    this.buildConcurrency = options.buildConcurrency ?? this.platforms.length
    this.backend = options.backend
    this.inspector = options.inspector
    this.storage = options.storage
    this.signal = options.signal
    this.job = {connector: options.connector, jobId: randomUUID()}
    this.logger = (options.logger ?? createLogger()).child({connector: options.connector})
    this.reporter = options.reporter ?? new ConsoleReporter(this.logger)
  }

  get imageRepository(): string {
    return this.metadata.dockerRepository
  }

  get imageTag(): string {
    return this.metadata.dockerImageTag
  }

  /** `repository:tag`, without registry host */
  get imageName(): string {
    return `${this.imageRepository}:${this.imageTag}`
  }

  get imageRef(): string {
    return `${this.registry}/${this.imageName}`
  }

  get latestImageRef(): string {
    return `${this.registry}/${this.imageRepository}:latest`
  }

  get tempDir(): string {
    if (!this.workDir) {
      throw new HoistError('CONTEXT_NOT_OPEN', `Publish context for ${this.connector} is not open`)
    }

    return this.workDir
  }

  async open(): Promise<void> {
    this.workDir ??= await mkdtemp(join(tmpdir(), `hoist-${this.connector}-`))
  }

  async close(): Promise<void> {
    if (this.workDir) {
      await rm(this.workDir, {recursive: true, force: true})
      this.workDir = undefined
    }
  }
}
