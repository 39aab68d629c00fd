import { createApp, createDependencies } from './presentation/app';
import { loadConfig, validateConfig } from './config';

const BANNER = [
    '🎬 Multi-Shot Video Studio',
    '   - Pick 1 to 8 preset images, in the order the shots should play',
    '   - Choose a visual style',
    '   - Jobs are polled in the background every few seconds',
    '   - Finished videos are cached locally and served under /videos',
].join('\n');

async function main(): Promise<void> {
    console.log(BANNER);

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = loadConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Build dependencies, then start polling and serving
        console.log('🚀 Initializing application components...');
        const deps = createDependencies(config);
        const app = createApp(config, deps);
        const pollerHandle = deps.poller.start();

        const server = app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Provider: ${config.videoProvider}`);
        });

        const shutdown = (signal: string): void => {
            console.log(`🛑 ${signal} received, shutting down...`);
            pollerHandle.stop();
            server.close(() => process.exit(0));
        };
        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
