// src/routes/files.ts

import express, { Request, Response } from 'express';
import multer from 'multer';
import { pipeline } from 'stream/promises';
import type { FileStore } from '../services/file-store.service';
import type { UploadService } from '../services/upload.service';
import type { Logger } from '../services/base/types';
import { AppError, InvalidKeyError, NotFoundError, TooLargeError, UnsupportedTypeError, errorMessage } from '../errors';
import { renderUploadPage, renderViewerPage } from '../views/render';

export interface FilesRouterDeps {
    fileStore: FileStore;
    uploadService: UploadService;
    logger: Logger;
    recentFilesLimit: number;
}

const GENERIC_UPLOAD_ERROR = 'Error uploading file. Please try again.';

function redirectWithError(res: Response, message: string): void {
    res.redirect(`/?error=${encodeURIComponent(message)}`);
}

export function createFilesRouter({ fileStore, uploadService, logger, recentFilesLimit }: FilesRouterDeps): express.Router {
    const router = express.Router();

    // Memory storage keeps rejected uploads off the disk; fileSize aborts the read early.
    const receiveFile = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: uploadService.maxUploadBytes, files: 1 },
        fileFilter: (_req, file, callback) => {
            if (!uploadService.isAllowedName(file.originalname)) {
                callback(new UnsupportedTypeError(file.originalname));
                return;
            }
            callback(null, true);
        },
    }).single('file');

    const receive = (req: Request, res: Response) =>
        new Promise<void>((resolve, reject) => {
            receiveFile(req, res, (error: unknown) => (error ? reject(error) : resolve()));
        });

    router.get('/', async (req: Request, res: Response) => {
        try {
            const recentFiles = await fileStore.listRecent(recentFilesLimit);
            const error = typeof req.query.error === 'string' ? req.query.error : undefined;

            res.type('html').send(
                renderUploadPage({
                    recentFiles: recentFiles.map((file) => ({
                        key: file.key,
                        displayName: file.displayName,
                        modifiedAt: file.uploadedAt,
                        sizeBytes: file.sizeBytes,
                    })),
                    error,
                    maxUploadBytes: uploadService.maxUploadBytes,
                }),
            );
        } catch (error) {
            logger.error('Failed to render upload page', { error: errorMessage(error) });
            res.status(500).send('Failed to list uploaded files');
        }
    });

    router.post('/', async (req: Request, res: Response) => {
        try {
            await receive(req, res);
            const stored = await uploadService.handleUpload({
                fileName: req.file?.originalname,
                mimeType: req.file?.mimetype,
                bytes: req.file?.buffer,
            });
            res.redirect(`/view/${encodeURIComponent(stored.key)}`);
        } catch (error) {
            if (error instanceof multer.MulterError && error.code === 'LIMIT_FILE_SIZE') {
                redirectWithError(res, new TooLargeError(uploadService.maxUploadBytes).userMessage);
                return;
            }
            if (error instanceof AppError) {
                redirectWithError(res, error.userMessage);
                return;
            }
            logger.error('Upload failed', { error: errorMessage(error) });
            redirectWithError(res, GENERIC_UPLOAD_ERROR);
        }
    });

    router.get('/view/:fileKey', async (req: Request, res: Response) => {
        const { fileKey } = req.params;
        try {
            const file = await fileStore.get(fileKey);
            res.type('html').send(
                renderViewerPage({
                    fileKey: file.key,
                    displayName: file.displayName,
                    pdfUrl: `/pdf/${encodeURIComponent(file.key)}`,
                }),
            );
        } catch (error) {
            if (error instanceof NotFoundError || error instanceof InvalidKeyError) {
                redirectWithError(res, error.userMessage);
                return;
            }
            logger.error('Failed to open viewer', { fileKey, error: errorMessage(error) });
            redirectWithError(res, 'Could not open file');
        }
    });

    router.get('/pdf/:fileKey', async (req: Request, res: Response) => {
        const { fileKey } = req.params;
        try {
            const stream = await fileStore.read(fileKey);
            res.type('application/pdf');
            logger.info('Serving PDF', { fileKey });
            await pipeline(stream, res);
        } catch (error) {
            if (error instanceof NotFoundError || error instanceof InvalidKeyError) {
                logger.warn('PDF not served', { fileKey, reason: error.code });
                res.status(error.status).send('PDF file not found');
                return;
            }
            logger.error('Error serving PDF', { fileKey, error: errorMessage(error) });
            if (!res.headersSent) {
                res.status(500).send('Error serving PDF');
            }
        }
    });

    return router;
}
