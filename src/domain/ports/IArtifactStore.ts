import { VideoArtifactRef } from '../entities/VideoArtifact';

/**
 * IArtifactStore - Port for caching generated videos locally.
 */
export interface IArtifactStore {
    /**
     * Stores the artifact (downloading it if needed) and returns the local path.
     * Calling it again for the same job returns the cached path.
     */
    save(artifact: VideoArtifactRef): Promise<string>;

    /**
     * Public URL path a browser can load the cached file from.
     */
    publicUrlFor(localPath: string): string;
}
