import {execa} from 'execa'
import {OperationCancelledError} from '../errors.js'
import type {CallOptions, CommandResult} from '../types.js'
import type {ObjectStorage, UploadRequest} from './backend.js'

/**
 * Uploads objects to Google Cloud Storage with `gcloud storage cp`.
 * A credentials file, when given, overrides the ambient gcloud account.
 */
export class GcloudStorage implements ObjectStorage {
  async upload(request: UploadRequest, options?: CallOptions): Promise<CommandResult> {
    const env: Record<string, string> = {}
    if (request.credentials) {
      env.CLOUDSDK_AUTH_CREDENTIAL_FILE_OVERRIDE = request.credentials
    }

    const result = await execa('gcloud', ['storage', 'cp', request.file, `gs://${request.bucket}/${request.key}`], {
      env,
      reject: false,
      cancelSignal: options?.signal
    })

    if (result.isCanceled) {
      throw new OperationCancelledError(`upload of ${request.key}`)
    }

    return {exitCode: result.exitCode ?? 1, stdout: result.stdout, stderr: result.stderr}
  }
}
