// src/index.ts

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config';
import { createLogger } from './utils/logger';
import { createApp, createServices } from './app';

async function main(): Promise<void> {
    const config = loadConfig(process.env);
    const logger = createLogger('pdf-viewer', config.LOG_LEVEL);

    const services = createServices(config, logger);
    await services.fileStore.init();

    const app = createApp(config, services, logger);
    const server = app.listen(config.PORT, config.HOST, () => {
        logger.info('PDF viewer listening', {
            url: `http://localhost:${config.PORT}`,
            uploadDir: config.UPLOAD_DIR,
            chatEnabled: Boolean(config.GROQ_API_KEY),
        });
    });

    const shutdown = (signal: string) => {
        logger.info('Shutting down', { signal });
        server.close(() => process.exit(0));
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    console.error('Failed to start server', error);
    process.exit(1);
});
