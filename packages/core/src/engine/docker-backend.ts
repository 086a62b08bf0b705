import process from 'node:process'
import {execa} from 'execa'
import {CommandError, OperationCancelledError, PushError} from '../errors.js'
import type {BuiltImage, CallOptions, CommandResult} from '../types.js'
import {ContainerBackend, type BuildRequest, type ManifestInspector, type RunImageRequest} from './backend.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept so that host secrets never reach
 * the Docker CLI, even through a `-e KEY` without value.
 */
function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

async function docker(env: Record<string, string>, args: string[], options?: CallOptions): Promise<CommandResult> {
  const result = await execa('docker', args, {
    env,
    extendEnv: false,
    reject: false,
    cancelSignal: options?.signal
  })

  if (result.isCanceled) {
    throw new OperationCancelledError(`docker ${args[0]}`)
  }

  return {exitCode: result.exitCode ?? 1, stdout: result.stdout, stderr: result.stderr}
}

async function dockerOrThrow(env: Record<string, string>, args: string[], options?: CallOptions): Promise<CommandResult> {
  const result = await docker(env, args, options)
  if (result.exitCode !== 0) {
    throw new CommandError(`docker ${args.slice(0, 2).join(' ')}`, result.exitCode, result.stdout, result.stderr)
  }

  return result
}

/**
 * Local tag of a per-platform build: `repo:tag-os-arch`.
 */
export function platformTag(ref: string, platform: string): string {
  return `${ref}-${platform.replaceAll('/', '-')}`
}

export class DockerCliBackend extends ContainerBackend {
  private readonly env = dockerCliEnv()

  async build(request: BuildRequest, options?: CallOptions): Promise<BuiltImage> {
    const ref = platformTag(`${request.repository}:${request.tag}`, request.platform)
    await dockerOrThrow(this.env, [
      'buildx', 'build',
      '--platform', request.platform,
      '--load',
      '--tag', ref,
      request.contextDir
    ], options)

    return {platform: request.platform, ref}
  }

  async run(image: BuiltImage, request: RunImageRequest, options?: CallOptions): Promise<string> {
    const args = ['run', '--rm', '--platform', image.platform]
    if (request.env) {
      for (const [key, value] of Object.entries(request.env)) {
        args.push('-e', `${key}=${value}`)
      }
    }

    args.push(image.ref, ...request.cmd)
    const {stdout} = await dockerOrThrow(this.env, args, options)
    return stdout
  }

  /**
   * Pushes each platform image under a platform-suffixed tag, then publishes
   * a manifest list under `ref` referencing all of them.
   */
  async push(primary: BuiltImage, ref: string, variants: readonly BuiltImage[], options?: CallOptions): Promise<string> {
    const platformRefs: string[] = []
    try {
      for (const image of [primary, ...variants]) {
        const platformRef = platformTag(ref, image.platform)
        await dockerOrThrow(this.env, ['tag', image.ref, platformRef], options)
        await dockerOrThrow(this.env, ['push', platformRef], options)
        platformRefs.push(platformRef)
      }

      await dockerOrThrow(this.env, ['manifest', 'create', '--amend', ref, ...platformRefs], options)
      await dockerOrThrow(this.env, ['manifest', 'push', '--purge', ref], options)
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error
      }

      throw new PushError(ref, {cause: error})
    }

    return ref
  }
}

/**
 * Inspects remote manifests with `docker manifest inspect`.
 * The command's exit code is not interpreted: callers read the streams.
 */
export class DockerManifestInspector implements ManifestInspector {
  private readonly env = dockerCliEnv()

  async inspect(ref: string, options?: CallOptions): Promise<CommandResult> {
    return docker(this.env, ['manifest', 'inspect', ref], options)
  }
}
