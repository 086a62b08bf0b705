import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'

/**
 * Project-level settings read from `.hoist.yml`. Every key is optional;
 * command-line flags take precedence.
 */
export type HoistConfig = {
  concurrency?: number;
  buildConcurrency?: number;
  registry?: string;
  platforms?: string[];
  specCacheBucket?: string;
  metadataBucket?: string;
  specCacheCredentials?: string;
  metadataCredentials?: string;
}

export const configFileName = '.hoist.yml'

/**
 * Loads the project-level `.hoist.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<HoistConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFileName), 'utf8')
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed = parseYaml(content) as unknown
  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`${configFileName} must contain a mapping`)
  }

  return parsed as HoistConfig
}
