import axios from 'axios';
import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { VideoArtifactRef } from '../../domain/entities/VideoArtifact';
import { IArtifactStore } from '../../domain/ports/IArtifactStore';

/**
 * Caches generated videos in the output directory as `<job id>.mp4`.
 */
export class LocalArtifactStore implements IArtifactStore {
    private readonly outputDir: string;
    private readonly publicPrefix: string;
    private readonly timeoutMs: number;

    constructor(outputDir: string, publicPrefix: string = '/videos', timeoutMs: number = 300000) {
        this.outputDir = path.resolve(outputDir);
        this.publicPrefix = publicPrefix.replace(/\/+$/, '');
        this.timeoutMs = timeoutMs;
    }

    async save(artifact: VideoArtifactRef): Promise<string> {
        const target = this.pathFor(artifact.jobId);
        if (fs.existsSync(target)) {
            return target;
        }

        await fs.promises.mkdir(this.outputDir, { recursive: true });
        const tempPath = `${target}.part`;

        try {
            const data = await this.read(artifact.uri);
            await fs.promises.writeFile(tempPath, data);
            await fs.promises.rename(tempPath, target);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true });
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to store video for job ${artifact.jobId}: ${message}`);
        }

        console.log(`[ArtifactStore] Video saved to: ${target}`);
        return target;
    }

    publicUrlFor(localPath: string): string {
        return `${this.publicPrefix}/${encodeURIComponent(path.basename(localPath))}`;
    }

    /**
     * File name for a job. Remote ids may contain ':' or '/', which are replaced;
     * a replaced id also gets a short hash of the raw id so distinct ids never share a file.
     */
    pathFor(jobId: string): string {
        const safe = jobId.replace(/[^A-Za-z0-9_-]/g, '_');
        if (safe === jobId) {
            return path.join(this.outputDir, `${safe}.mp4`);
        }
        const hash = crypto.createHash('sha256').update(jobId).digest('hex').slice(0, 8);
        return path.join(this.outputDir, `${safe}.${hash}.mp4`);
    }

    private async read(uri: string): Promise<Buffer> {
        if (uri.startsWith('http://') || uri.startsWith('https://')) {
            const response = await axios.get<ArrayBuffer>(uri, {
                responseType: 'arraybuffer',
                timeout: this.timeoutMs,
            });
            return Buffer.from(response.data);
        }

        if (uri.startsWith('data:')) {
            const matches = uri.match(/^data:([A-Za-z0-9-+/]+);base64,(.+)$/);
            if (!matches) {
                throw new Error('Invalid data URL');
            }
            return Buffer.from(matches[2], 'base64');
        }

        throw new Error(`Unsupported artifact reference: ${uri}`);
    }
}
