import {defaultPlatforms, isPlatform, type Platform} from '@hoist/core'
import type {HoistConfig} from './config.js'

export type PublishOptions = {
  concurrency?: number;
  buildConcurrency?: number;
  preRelease?: boolean;
  registry?: string;
  platform?: string[];
  specCacheBucket?: string;
  metadataBucket?: string;
  specCacheCredentials?: string;
  metadataCredentials?: string;
  verbose?: boolean;
}

export type PublishSettings = {
  concurrency: number;
  buildConcurrency?: number;
  preRelease: boolean;
  registry: string;
  platforms: Platform[];
  specCacheBucket: string;
  metadataBucket: string;
  specCacheCredentials?: string;
  metadataCredentials?: string;
}

function positiveInteger(name: string, value: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined
  }

  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${value}`)
  }

  return value
}

function required(name: string, flag: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`Missing ${name}: pass ${flag} or set it in .hoist.yml`)
  }

  return value
}

/**
 * Merges command-line flags, `.hoist.yml` and `HOIST_*` environment variables,
 * in that order of precedence.
 */
export function resolvePublishSettings(
  options: PublishOptions,
  config: HoistConfig,
  env: Record<string, string | undefined>
): PublishSettings {
  const envConcurrency = env.HOIST_CONCURRENCY ? Number(env.HOIST_CONCURRENCY) : undefined
  const requested: unknown = options.platform ?? config.platforms ?? [...defaultPlatforms]
  const candidates: unknown[] = Array.isArray(requested) ? requested : [requested]
  const platforms: Platform[] = []
  const invalid: string[] = []
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && isPlatform(candidate) && Array.isArray(requested)) {
      platforms.push(candidate)
    } else {
      invalid.push(String(candidate))
    }
  }

  if (invalid.length > 0) {
    throw new Error(`Invalid platform(s): ${invalid.join(', ')}. Expected os/architecture`)
  }

  return {
    concurrency: positiveInteger('concurrency', options.concurrency ?? config.concurrency ?? envConcurrency) ?? 1,
    buildConcurrency: positiveInteger('build concurrency', options.buildConcurrency ?? config.buildConcurrency),
    preRelease: options.preRelease ?? false,
    registry: options.registry ?? config.registry ?? env.HOIST_REGISTRY ?? 'docker.io',
    platforms,
    specCacheBucket: required('spec cache bucket', '--spec-cache-bucket', options.specCacheBucket ?? config.specCacheBucket ?? env.HOIST_SPEC_CACHE_BUCKET),
    metadataBucket: required('metadata bucket', '--metadata-bucket', options.metadataBucket ?? config.metadataBucket ?? env.HOIST_METADATA_BUCKET),
    specCacheCredentials: options.specCacheCredentials ?? config.specCacheCredentials ?? env.HOIST_SPEC_CACHE_CREDENTIALS,
    metadataCredentials: options.metadataCredentials ?? config.metadataCredentials ?? env.HOIST_METADATA_CREDENTIALS
  }
}
