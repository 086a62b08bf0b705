import {ManifestParseError} from '../errors.js'
import {Step} from '../step.js'
import type {StepResult} from '../types.js'

const missingManifestMarker = 'no such manifest'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Platforms (`os/architecture`) listed by a manifest list document.
 * A document without a `manifests` list publishes no platforms.
 * @throws ManifestParseError when the payload is not a manifest document
 */
export function publishedPlatforms(ref: string, payload: string): Set<string> {
  let parsed: unknown
  try {
    parsed = JSON.parse(payload.replaceAll('\n', ''))
  } catch (error) {
    throw new ManifestParseError(ref, {cause: error})
  }

  if (!isRecord(parsed)) {
    throw new ManifestParseError(ref)
  }

  const manifests = parsed.manifests ?? []
  if (!Array.isArray(manifests)) {
    throw new ManifestParseError(ref)
  }

  const platforms = new Set<string>()
  for (const manifest of manifests) {
    const platform = isRecord(manifest) ? manifest.platform : undefined
    if (!isRecord(platform) || typeof platform.os !== 'string' || typeof platform.architecture !== 'string') {
      throw new ManifestParseError(ref)
    }

    platforms.add(`${platform.os}/${platform.architecture}`)
  }

  return platforms
}

/**
 * Gate that stops the workflow when the versioned image is already published
 * for every required platform. A partially published image is rebuilt.
 */
export class CheckImageDoesNotExist extends Step {
  readonly id = 'check-image'
  readonly title = 'Check if the connector docker image does not exist on the registry.'

  protected async run(): Promise<StepResult> {
    const {inspector, imageRef, platforms, signal} = this.context
    const {stdout, stderr} = await inspector.inspect(imageRef, {signal})

    if (stderr.includes(missingManifestMarker)) {
      return this.success(undefined, {stdout: `No manifest found for ${imageRef}.`})
    }

    let published: Set<string>
    try {
      published = publishedPlatforms(imageRef, stdout)
    } catch (error) {
      if (error instanceof ManifestParseError) {
        return this.failure({stdout, stderr: stderr || error.message, code: error.code})
      }

      throw error
    }

    if (platforms.every(platform => published.has(platform))) {
      return this.skipped({stdout: `${imageRef} already exists.`})
    }

    return this.success(undefined, {stdout: `Not all platforms found for ${imageRef}.`})
  }
}
