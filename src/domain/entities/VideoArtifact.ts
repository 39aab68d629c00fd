/**
 * Reference to a generated video.
 */
export interface VideoArtifactRef {
    jobId: string;
    /** Result reference reported by the remote service (URL or path) */
    uri: string;
    /** Cached local copy, once downloaded */
    localPath?: string;
}
