// src/services/file-store.service.ts

import fs from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import type { StoredFile } from '../models/stored-file.model';
import { InvalidKeyError, NotFoundError, StorageError, errorMessage } from '../errors';
import { extensionOf, parseFileKey, sanitizeFilename } from '../utils/filename';

export interface FileStat {
    isFile(): boolean;
    mtime: Date;
    size: number;
}

/** The slice of `fs` the store touches; swapped for a failing variant in tests. */
export interface FileSystem {
    mkdir(dir: string, options: { recursive: true }): Promise<unknown>;
    writeFile(file: string, data: Uint8Array, options: { flag: string }): Promise<void>;
    rename(from: string, to: string): Promise<void>;
    unlink(file: string): Promise<void>;
    readdir(dir: string): Promise<string[]>;
    stat(file: string): Promise<FileStat>;
    createReadStream(file: string): Readable;
}

export const nodeFileSystem: FileSystem = {
    mkdir: (dir, options) => fs.promises.mkdir(dir, options),
    writeFile: (file, data, options) => fs.promises.writeFile(file, data, options),
    rename: (from, to) => fs.promises.rename(from, to),
    unlink: (file) => fs.promises.unlink(file),
    readdir: (dir) => fs.promises.readdir(dir),
    stat: (file) => fs.promises.stat(file),
    createReadStream: (file) => fs.createReadStream(file),
};

export interface FileStoreConfig extends ServiceConfig {
    rootDir: string;
    maxBytes: number;
    fileSystem?: FileSystem;
}

const PARTIAL_SUFFIX = '.part';

export class FileStore extends BaseService {
    private readonly rootDir: string;
    private readonly maxBytes: number;
    private readonly fs: FileSystem;

    constructor(config: FileStoreConfig) {
        super(config);
        this.rootDir = path.resolve(config.rootDir);
        this.maxBytes = config.maxBytes;
        this.fs = config.fileSystem ?? nodeFileSystem;
    }

    public async init(): Promise<void> {
        await this.fs.mkdir(this.rootDir, { recursive: true });
        this.logger.info('File store ready', { rootDir: this.rootDir });
    }

    /**
     * Persists `bytes` under a fresh `{uuid}_{sanitizedName}` key. The bytes land in a
     * `.part` file first and are renamed into place, so a failed write never leaves a
     * listable file behind.
     */
    public async store(bytes: Uint8Array, originalName: string): Promise<StoredFile> {
        if (bytes.length > this.maxBytes) {
            throw new StorageError(`Refusing to store ${bytes.length} bytes; limit is ${this.maxBytes}`);
        }

        const id = uuidv4();
        const sanitizedName = sanitizeFilename(originalName);
        const key = `${id}_${sanitizedName}`;
        const storagePath = path.join(this.rootDir, key);
        const partialPath = `${storagePath}${PARTIAL_SUFFIX}`;

        try {
            await this.fs.writeFile(partialPath, bytes, { flag: 'wx' });
            await this.fs.rename(partialPath, storagePath);
        } catch (error) {
            await this.discard(partialPath);
            this.logger.error('Failed to write uploaded file', { key, error: errorMessage(error) });
            throw new StorageError(`Failed to write ${key}: ${errorMessage(error)}`, { cause: error });
        }

        this.logger.info('Stored file', { key, sizeBytes: bytes.length });
        return {
            id,
            key,
            originalName: sanitizedName,
            displayName: sanitizedName,
            storagePath,
            uploadedAt: new Date(),
            sizeBytes: bytes.length,
        };
    }

    public async exists(fileKey: string): Promise<boolean> {
        const storagePath = this.resolveKey(fileKey);
        const stat = await this.statOrNull(storagePath);
        return stat !== null && stat.isFile();
    }

    public async get(fileKey: string): Promise<StoredFile> {
        const storagePath = this.resolveKey(fileKey);
        const stat = await this.statOrNull(storagePath);
        if (!stat || !stat.isFile()) {
            throw new NotFoundError(fileKey);
        }
        return this.describe(fileKey, storagePath, stat);
    }

    /** Up to `limit` stored PDFs, newest modification time first. */
    public async listRecent(limit: number): Promise<StoredFile[]> {
        let entries: string[];
        try {
            entries = await this.fs.readdir(this.rootDir);
        } catch (error) {
            if (isMissingFileError(error)) return [];
            throw new StorageError(`Failed to list ${this.rootDir}: ${errorMessage(error)}`, { cause: error });
        }

        const files: StoredFile[] = [];
        for (const entry of entries) {
            if (extensionOf(entry) !== '.pdf') continue;
            const storagePath = path.join(this.rootDir, entry);
            const stat = await this.statOrNull(storagePath);
            if (stat && stat.isFile()) {
                files.push(this.describe(entry, storagePath, stat));
            }
        }

        return files
            .sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime())
            .slice(0, Math.max(0, limit));
    }

    public async read(fileKey: string): Promise<Readable> {
        const storagePath = this.resolveKey(fileKey);
        const stat = await this.statOrNull(storagePath);
        if (!stat || !stat.isFile()) {
            throw new NotFoundError(fileKey);
        }
        return this.fs.createReadStream(storagePath);
    }

    private resolveKey(fileKey: string): string {
        if (
            !fileKey ||
            fileKey.includes('/') ||
            fileKey.includes('\\') ||
            fileKey.includes('\0') ||
            fileKey === '.' ||
            fileKey === '..' ||
            fileKey.endsWith(PARTIAL_SUFFIX)
        ) {
            throw new InvalidKeyError(fileKey);
        }

        const storagePath = path.join(this.rootDir, fileKey);
        if (path.dirname(storagePath) !== this.rootDir) {
            throw new InvalidKeyError(fileKey);
        }
        return storagePath;
    }

    private describe(key: string, storagePath: string, stat: FileStat): StoredFile {
        const { id, displayName } = parseFileKey(key);
        return {
            id,
            key,
            originalName: displayName,
            displayName,
            storagePath,
            uploadedAt: stat.mtime,
            sizeBytes: stat.size,
        };
    }

    private async statOrNull(storagePath: string): Promise<FileStat | null> {
        try {
            return await this.fs.stat(storagePath);
        } catch (error) {
            if (isMissingFileError(error)) return null;
            throw new StorageError(`Failed to stat ${storagePath}: ${errorMessage(error)}`, { cause: error });
        }
    }

    private async discard(partialPath: string): Promise<void> {
        try {
            await this.fs.unlink(partialPath);
        } catch (error) {
            if (!isMissingFileError(error)) {
                this.logger.warn('Could not remove partial upload', { partialPath, error: errorMessage(error) });
            }
        }
    }
}

function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
