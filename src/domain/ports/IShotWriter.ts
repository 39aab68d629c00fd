import { Shot } from '../entities/Shot';
import { StyleTemplate } from '../entities/StyleTemplate';

export interface ShotWritingRequest {
    /** Ordered image references (catalog-relative paths) */
    images: string[];
    style: StyleTemplate;
    category?: string;
}

/**
 * IShotWriter - Port for services that look at the selected images and describe one shot per image.
 * Implementations: GptVisionShotWriter
 *
 * Implementations throw when they cannot produce exactly one shot per image;
 * callers fall back to ShotPlanner.
 */
export interface IShotWriter {
    writeShots(request: ShotWritingRequest): Promise<Shot[]>;
}
