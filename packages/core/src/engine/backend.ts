import type {BuiltImage, CallOptions, CommandResult, Platform} from '../types.js'

/**
 * Run configuration for a built image.
 */
export type RunImageRequest = {
  /** Command passed to the image entrypoint (e.g. `['spec']`) */
  cmd: string[];
  env?: Record<string, string>;
}

/**
 * Build source for a connector image.
 */
export type BuildRequest = {
  platform: Platform;
  /** Directory holding the connector's Dockerfile */
  contextDir: string;
  /** Repository name used to tag local builds */
  repository: string;
  tag: string;
}

/**
 * Abstract interface over the container build engine.
 *
 * Implementations:
 * - `DockerCliBackend`: Uses Docker CLI with buildx
 *
 * Every method throws a `HoistError` for operational failures
 * (non-zero exit, cancellation); the calling step turns those into results.
 */
export abstract class ContainerBackend {
  /**
   * Builds the image for one platform.
   * @returns A handle the backend can later run or push
   */
  abstract build(request: BuildRequest, options?: CallOptions): Promise<BuiltImage>

  /**
   * Runs a built image to completion.
   * @returns Captured stdout
   */
  abstract run(image: BuiltImage, request: RunImageRequest, options?: CallOptions): Promise<string>

  /**
   * Publishes `primary` under `ref` with `variants` attached as other platforms
   * of the same multi-platform image. One call publishes the whole set.
   * @returns The published reference
   */
  abstract push(primary: BuiltImage, ref: string, variants: readonly BuiltImage[], options?: CallOptions): Promise<string>
}

/**
 * Registry manifest lookup. A missing manifest is reported through stderr
 * (containing `no such manifest`), never by throwing.
 */
export type ManifestInspector = {
  inspect(ref: string, options?: CallOptions): Promise<CommandResult>;
}

export type UploadRequest = {
  /** Local file to upload */
  file: string;
  /** Object key in the bucket */
  key: string;
  bucket: string;
  /** Path to a credentials file, when the storage client needs one */
  credentials?: string;
}

/**
 * Object storage upload primitive. Failures are reported through the exit code.
 */
export type ObjectStorage = {
  upload(request: UploadRequest, options?: CallOptions): Promise<CommandResult>;
}
