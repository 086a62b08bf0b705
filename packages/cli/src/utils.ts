import {access, stat} from 'node:fs/promises'
import {basename, join, resolve} from 'node:path'
import type {Command} from 'commander'
import {metadataFileName} from '@hoist/core'

export type GlobalOptions = {
  json?: boolean;
  color: boolean;
  logLevel?: string;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Resolves a connector directory argument and checks it holds a metadata file.
 */
export async function resolveConnectorDir(pathOrDir: string): Promise<{name: string; dir: string}> {
  const dir = resolve(pathOrDir)

  try {
    const stats = await stat(dir)
    if (!stats.isDirectory()) {
      throw new Error(`Not a directory: ${dir}`)
    }
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Path does not exist: ${dir}`)
    }

    throw error
  }

  try {
    await access(join(dir, metadataFileName))
  } catch {
    throw new Error(`No ${metadataFileName} found in ${dir}`)
  }

  return {name: basename(dir), dir}
}
