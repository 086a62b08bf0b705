export class HoistError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'HoistError'
  }

  /**
   * Expected errors are operational failures (a remote call exiting non-zero,
   * output that does not parse). Steps turn them into failure results; anything
   * else propagates and aborts the workflow.
   */
  get expected(): boolean {
    return false
  }
}

// -- Command errors ----------------------------------------------------------

export class CommandError extends HoistError {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stdout: string,
    readonly stderr: string,
    options?: {cause?: unknown}
  ) {
    super('COMMAND_FAILED', `${command} failed with exit code ${exitCode}${stderr ? `: ${stderr.trim()}` : ''}`, options)
    this.name = 'CommandError'
  }

  override get expected(): boolean {
    return true
  }
}

export class OperationCancelledError extends HoistError {
  constructor(command: string, options?: {cause?: unknown}) {
    super('OPERATION_CANCELLED', `${command} was cancelled`, options)
    this.name = 'OperationCancelledError'
  }

  override get expected(): boolean {
    return true
  }
}

export class PushError extends HoistError {
  constructor(ref: string, options?: {cause?: unknown}) {
    super('PUSH_FAILED', `Failed to push "${ref}"${causeSuffix(options?.cause)}`, options)
    this.name = 'PushError'
  }

  override get expected(): boolean {
    return true
  }
}

// -- Output errors -----------------------------------------------------------

export class ManifestParseError extends HoistError {
  constructor(ref: string, options?: {cause?: unknown}) {
    super('MANIFEST_PARSE_ERROR', `Could not parse the manifest of ${ref}`, options)
    this.name = 'ManifestParseError'
  }

  override get expected(): boolean {
    return true
  }
}

export class InvalidSpecOutputError extends HoistError {
  constructor(options?: {cause?: unknown}) {
    super('INVALID_SPEC_OUTPUT', 'Could not parse the output of the spec command.', options)
    this.name = 'InvalidSpecOutputError'
  }

  override get expected(): boolean {
    return true
  }
}

export class MetadataError extends HoistError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_METADATA', message, options)
    this.name = 'MetadataError'
  }

  override get expected(): boolean {
    return true
  }
}

// -- Defects -----------------------------------------------------------------

export class EmptyArtifactSetError extends HoistError {
  constructor(options?: {cause?: unknown}) {
    super('EMPTY_ARTIFACT_SET', 'Build produced no platform artifacts', options)
    this.name = 'EmptyArtifactSetError'
  }
}

function causeSuffix(cause: unknown): string {
  if (cause instanceof Error) {
    return `: ${cause.message}`
  }

  return ''
}
