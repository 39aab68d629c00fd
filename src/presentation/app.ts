import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import path from 'path';
import { Config } from '../config';
import { ImageCatalog } from '../application/ImageCatalog';
import { JobPoller } from '../application/JobPoller';
import { JobTracker } from '../application/JobTracker';
import { StyleResolver } from '../application/StyleResolver';
import { IShotWriter } from '../domain/ports/IShotWriter';
import { IVideoGenerationClient } from '../domain/ports/IVideoGenerationClient';

// Infrastructure imports
import { ImageSource } from '../infrastructure/images/ImageSource';
import { GptVisionShotWriter } from '../infrastructure/llm/GptVisionShotWriter';
import { LocalArtifactStore } from '../infrastructure/storage/LocalArtifactStore';
import { HttpVideoGenerationClient } from '../infrastructure/video/HttpVideoGenerationClient';
import { MockVideoGenerationClient } from '../infrastructure/video/MockVideoGenerationClient';
import { ReplicateVideoGenerationClient } from '../infrastructure/video/ReplicateVideoGenerationClient';

// Route imports
import { createCatalogRoutes } from './routes/catalogRoutes';
import { createJobRoutes } from './routes/jobRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

const PUBLIC_DIR = path.resolve(process.cwd(), 'public');

export interface AppDependencies {
    tracker: JobTracker;
    poller: JobPoller;
    catalog: ImageCatalog;
    styleResolver: StyleResolver;
    artifactStore: LocalArtifactStore;
}

/**
 * Creates and configures the Express application.
 * Dependencies are built from the config unless passed in.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();
    const { tracker, poller, catalog, styleResolver, artifactStore } = deps;

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            provider: config.videoProvider,
            activeJobs: tracker.activeJobs().length,
        });
    });

    // Static files
    app.use(express.static(PUBLIC_DIR));
    app.use('/images', express.static(catalog.root));
    app.use('/videos', express.static(path.resolve(config.outputDir)));

    // Routes
    app.use('/api', createCatalogRoutes(styleResolver, catalog));
    app.use('/api', createJobRoutes({
        tracker,
        poller,
        catalog,
        artifactStore,
        defaultParams: { fps: config.videoFps, dimension: config.videoDimension },
    }));

    // Unknown API routes get a JSON 404 instead of the static handler's HTML
    app.use('/api', (req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`Route not found: ${req.method} ${req.originalUrl}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): AppDependencies {
    const styleResolver = StyleResolver.fromFile(config.stylesPath);
    const catalog = new ImageCatalog(config.imagesDir);
    const artifactStore = new LocalArtifactStore(config.outputDir);
    const images = new ImageSource(catalog, config.publicBaseUrl);
    const client = createVideoClient(config, images);

    const tracker = new JobTracker({
        client,
        styleResolver,
        shotWriter: createShotWriter(config, images),
        persistencePath: path.join(config.outputDir, 'jobs.json'),
    });
    const poller = new JobPoller(tracker, {
        intervalMs: config.pollIntervalMs,
        artifactStore,
    });

    return { tracker, poller, catalog, styleResolver, artifactStore };
}

// --- Helper Functions ---

export function createVideoClient(config: Config, images: ImageSource): IVideoGenerationClient {
    switch (config.videoProvider) {
        case 'http':
            console.log(`✅ Video generation: HTTP task API (${config.videoApiBaseUrl}, model ${config.videoModel})`);
            return new HttpVideoGenerationClient(
                config.videoApiKey,
                images,
                config.videoApiBaseUrl,
                config.videoModel,
                config.videoRequestTimeoutMs
            );
        case 'replicate':
            console.log(`✅ Video generation: Replicate (${config.replicateModel})`);
            return new ReplicateVideoGenerationClient(config.replicateApiToken, images, config.replicateModel);
        case 'mock':
            console.log('⚠️  Video generation: Mock only (no provider configured)');
            return new MockVideoGenerationClient();
    }
}

export function createShotWriter(config: Config, images: ImageSource): IShotWriter | undefined {
    if (!config.openaiApiKey) {
        console.log('⚠️  Shot descriptions: style templates (no OPENAI_API_KEY)');
        return undefined;
    }
    console.log(`✅ Shot descriptions: GPT vision (${config.openaiModel})`);
    return new GptVisionShotWriter(config.openaiApiKey, images, config.openaiModel);
}
