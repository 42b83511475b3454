// src/app.ts

import express from 'express';
import path from 'path';
import type { AppConfig } from './config';
import type { Logger } from './services/base/types';
import { FileStore } from './services/file-store.service';
import { UploadService } from './services/upload.service';
import { ChatProxyService } from './services/chat/chat-proxy.service';
import { GroqCompletionClient, type CompletionClient } from './services/groq.service';
import { createFilesRouter } from './routes/files';
import { createChatRouter } from './routes/chat';
import { createErrorHandler } from './middleware/error-handler';

export interface AppServices {
    fileStore: FileStore;
    uploadService: UploadService;
    chatProxy: ChatProxyService;
}

/**
 * Wires the services from an explicit config. `completionClient` overrides the Groq client,
 * which is otherwise only created when GROQ_API_KEY is set.
 */
export function createServices(config: AppConfig, logger: Logger, completionClient?: CompletionClient | null): AppServices {
    const fileStore = new FileStore({ logger, rootDir: config.UPLOAD_DIR, maxBytes: config.MAX_UPLOAD_BYTES });
    const uploadService = new UploadService({
        logger,
        fileStore,
        maxBytes: config.MAX_UPLOAD_BYTES,
        allowedExtensions: config.ALLOWED_EXTENSIONS,
    });

    const client =
        completionClient !== undefined
            ? completionClient
            : config.GROQ_API_KEY
              ? new GroqCompletionClient({
                    apiKey: config.GROQ_API_KEY,
                    model: config.MODEL_NAME,
                    maxTokens: config.MAX_TOKENS,
                    temperature: config.TEMPERATURE,
                })
              : null;
    const chatProxy = new ChatProxyService({ logger, client });

    return { fileStore, uploadService, chatProxy };
}

function resolvePdfjsDir(logger: Logger): string | null {
    try {
        return path.dirname(require.resolve('pdfjs-dist/package.json'));
    } catch (error) {
        logger.warn('pdfjs-dist not found; the viewer worker will not be served', {
            error: error instanceof Error ? error.message : String(error),
        });
        return null;
    }
}

export function createApp(config: AppConfig, services: AppServices, logger: Logger): express.Express {
    const app = express();

    app.use(express.json({ limit: '1mb' }));
    app.use('/static', express.static(path.resolve(__dirname, '../public')));

    const pdfjsDir = resolvePdfjsDir(logger);
    if (pdfjsDir) {
        app.use('/vendor/pdfjs', express.static(pdfjsDir));
    }

    // Health check
    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    app.use('/chat', createChatRouter({ chatProxy: services.chatProxy, logger }));
    app.use(
        '/',
        createFilesRouter({
            fileStore: services.fileStore,
            uploadService: services.uploadService,
            logger,
            recentFilesLimit: config.RECENT_FILES_LIMIT,
        }),
    );

    app.use(createErrorHandler(logger));

    return app;
}
