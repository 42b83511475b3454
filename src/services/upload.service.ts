// src/services/upload.service.ts

import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import type { FileStore } from './file-store.service';
import type { StoredFile } from '../models/stored-file.model';
import { AppError, EmptyUploadError, StorageError, TooLargeError, UnsupportedTypeError, errorMessage } from '../errors';
import { extensionOf } from '../utils/filename';

export interface IncomingUpload {
    fileName?: string;
    mimeType?: string;
    bytes?: Uint8Array;
}

export interface UploadServiceConfig extends ServiceConfig {
    fileStore: FileStore;
    maxBytes: number;
    allowedExtensions: string[];
}

export class UploadService extends BaseService {
    private readonly fileStore: FileStore;
    private readonly maxBytes: number;
    private readonly allowedExtensions: Set<string>;

    constructor(config: UploadServiceConfig) {
        super(config);
        this.fileStore = config.fileStore;
        this.maxBytes = config.maxBytes;
        this.allowedExtensions = new Set(config.allowedExtensions.map((ext) => ext.toLowerCase()));
    }

    public get maxUploadBytes(): number {
        return this.maxBytes;
    }

    public isAllowedName(fileName: string): boolean {
        return this.allowedExtensions.has(extensionOf(fileName));
    }

    /**
     * Validates one incoming file and commits it to the store.
     * Every rejection is an `UploadError` or `StorageError` whose `userMessage` can be shown as is.
     */
    public async handleUpload(upload: IncomingUpload): Promise<StoredFile> {
        const { fileName, mimeType, bytes } = upload;

        if (!fileName || !bytes || bytes.length === 0) {
            throw new EmptyUploadError();
        }
        if (!this.isAllowedName(fileName)) {
            this.logger.warn('Rejected upload with unsupported type', { fileName, mimeType });
            throw new UnsupportedTypeError(fileName);
        }
        if (bytes.length > this.maxBytes) {
            this.logger.warn('Rejected oversized upload', { fileName, sizeBytes: bytes.length, maxBytes: this.maxBytes });
            throw new TooLargeError(this.maxBytes);
        }

        let stored: StoredFile;
        try {
            stored = await this.fileStore.store(bytes, fileName);
        } catch (error) {
            if (error instanceof AppError) throw error;
            throw new StorageError(`Unexpected failure storing ${fileName}: ${errorMessage(error)}`, { cause: error });
        }

        this.logger.info('Upload ready for viewing', { key: stored.key, sizeBytes: stored.sizeBytes, mimeType });
        return stored;
    }
}
