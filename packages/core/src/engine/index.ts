export {ContainerBackend, type BuildRequest, type RunImageRequest, type ManifestInspector, type ObjectStorage, type UploadRequest} from './backend.js'
export {DockerCliBackend, DockerManifestInspector, platformTag} from './docker-backend.js'
export {GcloudStorage} from './gcloud-storage.js'
