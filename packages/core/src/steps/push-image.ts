import {Step} from '../step.js'
import type {PlatformArtifactSet, StepResult} from '../types.js'

/**
 * Publishes the platform images as one multi-platform image under the
 * versioned reference, then under `latest` unless the release is a pre-release.
 */
export class PushImageToRegistry extends Step<PlatformArtifactSet, string[]> {
  readonly id = 'push-image'
  readonly title = 'Push connector image to registry'

  protected async run(artifacts: PlatformArtifactSet): Promise<StepResult<string[]>> {
    const {backend, imageRef, latestImageRef, preRelease, signal} = this.context
    const [primary, ...variants] = artifacts
    const refs = [imageRef]
    if (!preRelease) {
      refs.push(latestImageRef)
    }

    const published: string[] = []
    for (const ref of refs) {
      published.push(await backend.push(primary, ref, variants, {signal}))
    }

    return this.success(published, {stdout: `Published ${published.join(', ')}`})
  }
}
