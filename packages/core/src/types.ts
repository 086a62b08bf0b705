/**
 * Target platform as `{os}/{architecture}`, e.g. `linux/amd64`.
 * Platforms are compared as exact strings.
 */
export type Platform = `${string}/${string}`

export const defaultPlatforms: readonly Platform[] = ['linux/amd64', 'linux/arm64']

/**
 * A runnable image built for one platform.
 */
export type BuiltImage = {
  platform: Platform;
  /** Local reference the backend can run or push */
  ref: string;
}

/**
 * Per-platform images of one release, in the order the platforms were requested.
 * The first image is the primary: it anchors the push, the others are attached as variants.
 */
export type PlatformArtifactSet = readonly [primary: BuiltImage, ...variants: BuiltImage[]]

/**
 * Outcome of an external command that reports through its exit code.
 */
export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Options passed to every suspendable external call.
 */
export type CallOptions = {
  signal?: AbortSignal;
}

/** Reference to a step for display and keying purposes. */
export type StepRef = {
  id: string;
  title: string;
}

export type StepStatus = 'success' | 'skipped' | 'failure'

type BaseResult = {
  readonly step: StepRef;
  readonly stdout?: string;
}

export type SuccessResult<T> = BaseResult & {
  readonly status: 'success';
  readonly stderr?: string;
  readonly output: T;
}

export type SkippedResult = BaseResult & {
  readonly status: 'skipped';
  readonly stderr?: string;
}

export type FailureResult = BaseResult & {
  readonly status: 'failure';
  readonly stderr: string;
  /** Code of the error the failure was converted from, if any */
  readonly code?: string;
}

export type StepResult<T = undefined> = SuccessResult<T> | SkippedResult | FailureResult

/**
 * Fields of a connector's `metadata.yaml` the publish workflow relies on.
 */
export type ConnectorMetadata = {
  dockerRepository: string;
  dockerImageTag: string;
  [key: string]: unknown;
}
