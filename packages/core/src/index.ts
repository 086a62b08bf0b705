// Engine layer
export {
  ContainerBackend,
  DockerCliBackend,
  DockerManifestInspector,
  GcloudStorage,
  platformTag
} from './engine/index.js'
export type {BuildRequest, RunImageRequest, ManifestInspector, ObjectStorage, UploadRequest} from './engine/index.js'

// Workflow
export {runPublishPipeline, invalidMetadataReport, PublishWorkflow, stage, reportName} from './workflow.js'
export type {WorkflowState, PublishStage} from './workflow.js'
export {PublishContext, type PublishContextOptions} from './context.js'
export {WorkflowReport, type ReportStatus} from './report.js'
export {Semaphore} from './semaphore.js'

// Steps
export {Step} from './step.js'
export {success, skipped, failure, isSuccess} from './step-result.js'
export {CheckImageDoesNotExist, publishedPlatforms} from './steps/check-image.js'
export {BuildForPublish, BuildPlatform} from './steps/build.js'
export {UploadSpecToCache, parseSpecOutput, specKeyPrefix, type DeploymentMode} from './steps/upload-spec.js'
export {PushImageToRegistry} from './steps/push-image.js'
export {
  MetadataValidation,
  MetadataUpload,
  metadataFileName,
  metadataValidationStep,
  parseMetadata,
  readMetadataFile,
  readConnectorMetadata
} from './metadata.js'

// Reporting
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  JobContext,
  PublishEvent,
  PublishStartEvent,
  StepStartingEvent,
  StepFinishedEvent,
  StepSkippedEvent,
  StepFailedEvent,
  PublishFinishedEvent,
  PublishFailedEvent
} from './reporter.js'
export {createLogger, type Logger} from './logger.js'

// Utilities
export {formatDuration, isPlatform, withConcurrency, errorMessage} from './utils.js'

// Domain types
export {defaultPlatforms} from './types.js'
export type {
  Platform,
  BuiltImage,
  PlatformArtifactSet,
  CommandResult,
  CallOptions,
  StepRef,
  StepStatus,
  StepResult,
  SuccessResult,
  SkippedResult,
  FailureResult,
  ConnectorMetadata
} from './types.js'

// Errors
export {
  HoistError,
  CommandError,
  OperationCancelledError,
  PushError,
  ManifestParseError,
  InvalidSpecOutputError,
  MetadataError,
  EmptyArtifactSetError
} from './errors.js'
