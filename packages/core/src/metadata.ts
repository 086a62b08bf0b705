import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import type {PublishContext} from './context.js'
import {MetadataError} from './errors.js'
import {Step} from './step.js'
import type {ConnectorMetadata, StepRef, StepResult} from './types.js'

export const metadataFileName = 'metadata.yaml'

export const metadataValidationStep: StepRef = {id: 'metadata-validation', title: 'Validate metadata file'}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Reads the `data` section of a connector metadata document.
 * Only the fields the publish workflow depends on are checked.
 */
export function parseMetadata(content: string, source = metadataFileName): ConnectorMetadata {
  let document: unknown
  try {
    document = parseYaml(content)
  } catch (error) {
    throw new MetadataError(`${source} is not valid YAML`, {cause: error})
  }

  const data = isRecord(document) ? document.data : undefined
  if (!isRecord(data)) {
    throw new MetadataError(`${source} has no "data" section`)
  }

  const {dockerRepository, dockerImageTag} = data
  if (typeof dockerRepository !== 'string' || dockerRepository === '') {
    throw new MetadataError(`${source}: "data.dockerRepository" must be a non-empty string`)
  }

  if (typeof dockerImageTag !== 'string' || dockerImageTag === '') {
    throw new MetadataError(`${source}: "data.dockerImageTag" must be a non-empty string`)
  }

  return {...data, dockerRepository, dockerImageTag}
}

export async function readMetadataFile(path: string): Promise<ConnectorMetadata> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    throw new MetadataError(`Could not read ${path}`, {cause: error})
  }

  return parseMetadata(content, path)
}

/**
 * Loads `metadata.yaml` from a connector directory.
 */
export async function readConnectorMetadata(connectorDir: string): Promise<ConnectorMetadata> {
  return readMetadataFile(join(connectorDir, metadataFileName))
}

export class MetadataValidation extends Step {
  readonly id = metadataValidationStep.id
  readonly title = metadataValidationStep.title

  constructor(context: PublishContext, private readonly metadataPath: string) {
    super(context)
  }

  protected async run(): Promise<StepResult> {
    const metadata = await readMetadataFile(this.metadataPath)
    const expected = this.context.imageName
    const declared = `${metadata.dockerRepository}:${metadata.dockerImageTag}`
    if (declared !== expected) {
      return this.failure({stderr: `${this.metadataPath} declares ${declared} but ${expected} is being published`})
    }

    return this.success(undefined, {stdout: `${this.metadataPath} is valid`})
  }
}

/**
 * Uploads the metadata file to the metadata bucket under the versioned key,
 * and under `latest` unless the release is a pre-release.
 */
export class MetadataUpload extends Step {
  readonly id = 'metadata-upload'
  readonly title = 'Upload metadata file to metadata service bucket'

  protected async run(): Promise<StepResult> {
    const {storage, metadataPath, metadataBucket, metadataCredentials, imageRepository, imageTag, preRelease, signal} = this.context
    const keys = [`metadata/${imageRepository}/${imageTag}/${metadataFileName}`]
    if (!preRelease) {
      keys.push(`metadata/${imageRepository}/latest/${metadataFileName}`)
    }

    for (const key of keys) {
      const {exitCode, stdout, stderr} = await storage.upload({
        file: metadataPath,
        key,
        bucket: metadataBucket,
        credentials: metadataCredentials
      }, {signal})

      if (exitCode !== 0) {
        return this.failure({stdout, stderr: stderr || `Upload of ${key} exited with code ${exitCode}`})
      }
    }

    return this.success(undefined, {stdout: `Uploaded ${keys.join(', ')}`})
  }
}
