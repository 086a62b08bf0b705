import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {InvalidSpecOutputError} from '../errors.js'
import {Step} from '../step.js'
import type {BuiltImage, StepResult} from '../types.js'

export type DeploymentMode = 'OSS' | 'CLOUD'

function isSpecMessage(value: unknown): value is {type: 'SPEC'} {
  return typeof value === 'object' && value !== null && 'type' in value && value.type === 'SPEC'
}

/**
 * Extracts the spec from the line-oriented output of a connector's `spec`
 * command: the first line holding a JSON message of type `SPEC`, re-serialized.
 * Other lines (logs, traces, malformed JSON) are ignored.
 * @throws InvalidSpecOutputError when no line is a SPEC message
 */
export function parseSpecOutput(output: string): string {
  for (const line of output.split('\n')) {
    let parsed: unknown
    try {
      parsed = JSON.parse(line)
    } catch {
      continue
    }

    if (isSpecMessage(parsed)) {
      return JSON.stringify(parsed)
    }
  }

  throw new InvalidSpecOutputError()
}

export function specKeyPrefix(repository: string, tag: string): string {
  return `specs/${repository}/${tag}`
}

/**
 * Uploads the OSS spec, and the CLOUD spec when it differs, to the spec cache bucket.
 */
export class UploadSpecToCache extends Step<BuiltImage> {
  readonly id = 'upload-spec'
  readonly title = 'Upload connector spec to spec cache bucket'

  protected async run(connector: BuiltImage): Promise<StepResult> {
    const {imageRepository, imageTag, specCacheBucket, specCacheCredentials, storage, tempDir, signal} = this.context
    const ossSpec = await this.getSpec(connector, 'OSS')
    const cloudSpec = await this.getSpec(connector, 'CLOUD')

    const prefix = specKeyPrefix(imageRepository, imageTag)
    const uploads = [{key: `${prefix}/spec.json`, file: join(tempDir, 'spec_to_cache.json'), spec: ossSpec}]
    if (cloudSpec !== ossSpec) {
      uploads.push({key: `${prefix}/spec.cloud.json`, file: join(tempDir, 'cloud_spec_to_cache.json'), spec: cloudSpec})
    }

    for (const {key, file, spec} of uploads) {
      await writeFile(file, spec, 'utf8')
      const {exitCode, stdout, stderr} = await storage.upload({
        file,
        key,
        bucket: specCacheBucket,
        credentials: specCacheCredentials
      }, {signal})

      if (exitCode !== 0) {
        return this.failure({stdout, stderr: stderr || `Upload of ${key} exited with code ${exitCode}`})
      }
    }

    return this.success(undefined, {stdout: `Uploaded ${uploads.map(upload => upload.key).join(', ')}`})
  }

  private async getSpec(connector: BuiltImage, mode: DeploymentMode): Promise<string> {
    const output = await this.context.backend.run(connector, {
      cmd: ['spec'],
      env: {DEPLOYMENT_MODE: mode}
    }, {signal: this.context.signal})
    return parseSpecOutput(output)
  }
}
