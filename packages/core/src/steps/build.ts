import type {PublishContext} from '../context.js'
import {EmptyArtifactSetError} from '../errors.js'
import {Step} from '../step.js'
import type {BuiltImage, Platform, PlatformArtifactSet, StepResult} from '../types.js'
import {withConcurrency} from '../utils.js'

export class BuildPlatform extends Step<void, BuiltImage> {
  readonly id: string
  readonly title: string

  constructor(context: PublishContext, readonly platform: Platform) {
    super(context)
    this.id = `build-${platform.replaceAll('/', '-')}`
    this.title = `Build connector image for ${platform}`
  }

  protected async run(): Promise<StepResult<BuiltImage>> {
    const {backend, connectorDir, imageRepository, imageTag, signal} = this.context
    const image = await backend.build({
      platform: this.platform,
      contextDir: connectorDir,
      repository: imageRepository,
      tag: imageTag
    }, {signal})

    return this.success(image, {stdout: `Built ${image.ref}`})
  }
}

/**
 * Builds every required platform and reduces the per-platform results.
 *
 * A defect in any build is rethrown first. Then results are read in request
 * order: the first one that did not succeed is returned as is. Otherwise the
 * output lists the images in request order.
 */
export class BuildForPublish extends Step<void, PlatformArtifactSet> {
  readonly id = 'build'
  readonly title = 'Build connector for publish'

  protected async run(): Promise<StepResult<PlatformArtifactSet>> {
    const {platforms, buildConcurrency} = this.context
    const builds = platforms.map(platform => new BuildPlatform(this.context, platform))
    const settled = await withConcurrency(builds.map(build => async () => build.execute()), buildConcurrency)

    const results: Array<StepResult<BuiltImage>> = []
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason
      }

      results.push(outcome.value)
    }

    const images: BuiltImage[] = []
    for (const result of results) {
      if (result.status !== 'success') {
        return result
      }

      images.push(result.output)
    }

    const [primary, ...variants] = images
    if (!primary) {
      throw new EmptyArtifactSetError()
    }

    const artifacts: PlatformArtifactSet = [primary, ...variants]
    return this.success(artifacts, {stdout: `Built ${artifacts.map(image => image.platform).join(', ')}`})
  }
}
