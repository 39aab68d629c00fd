import fs from 'fs';
import path from 'path';
import { ImageCatalog } from '../../application/ImageCatalog';

const MIME_TYPES: Record<string, string> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.webp': 'image/webp',
};

/**
 * Turns catalog image references into something a remote model can read:
 * a public URL when the app is reachable from outside, otherwise an inline data URI.
 */
export class ImageSource implements RemoteImageResolver {
    private readonly catalog: ImageCatalog;
    private readonly publicBaseUrl?: string;

    constructor(catalog: ImageCatalog, publicBaseUrl?: string) {
        this.catalog = catalog;
        this.publicBaseUrl = publicBaseUrl ? publicBaseUrl.replace(/\/+$/, '') : undefined;
    }

    async toRemoteInput(imageRef: string): Promise<string> {
        if (this.publicBaseUrl) {
            const encoded = imageRef.split('/').map(encodeURIComponent).join('/');
            return `${this.publicBaseUrl}/images/${encoded}`;
        }

        const filePath = this.catalog.resolvePath(imageRef);
        try {
            const buffer = await fs.promises.readFile(filePath);
            return `data:${mimeTypeFor(filePath)};base64,${buffer.toString('base64')}`;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to encode image ${imageRef}: ${message}`);
        }
    }
}

export function mimeTypeFor(filePath: string): string {
    return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * What the video clients need from an image source.
 */
export interface RemoteImageResolver {
    toRemoteInput(imageRef: string): Promise<string>;
}
