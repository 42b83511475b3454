import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileStore, nodeFileSystem } from './file-store.service';
import { UploadService } from './upload.service';
import { EmptyUploadError, StorageError, TooLargeError, UnsupportedTypeError } from '../errors';
import { createSilentLogger } from '../utils/logger';

const MAX_BYTES = 64;

describe('UploadService', () => {
    let rootDir: string;
    let fileStore: FileStore;
    let uploads: UploadService;

    const storedCount = async () => (await fs.promises.readdir(rootDir)).length;

    beforeEach(async () => {
        rootDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'uploads-'));
        fileStore = new FileStore({ logger: createSilentLogger(), rootDir, maxBytes: MAX_BYTES });
        await fileStore.init();
        uploads = new UploadService({
            logger: createSilentLogger(),
            fileStore,
            maxBytes: MAX_BYTES,
            allowedExtensions: ['.pdf'],
        });
    });

    afterEach(async () => {
        await fs.promises.rm(rootDir, { recursive: true, force: true });
    });

    it('stores a valid PDF', async () => {
        const stored = await uploads.handleUpload({
            fileName: 'Slides.PDF',
            mimeType: 'application/pdf',
            bytes: Buffer.from('%PDF-1.7'),
        });

        expect(stored.displayName).toBe('Slides.PDF');
        expect(await fileStore.exists(stored.key)).toBe(true);
    });

    it('rejects a missing file', async () => {
        await expect(uploads.handleUpload({})).rejects.toBeInstanceOf(EmptyUploadError);
        await expect(uploads.handleUpload({ fileName: '', bytes: Buffer.from('x') })).rejects.toBeInstanceOf(EmptyUploadError);
        await expect(uploads.handleUpload({ fileName: 'a.pdf', bytes: Buffer.alloc(0) })).rejects.toBeInstanceOf(EmptyUploadError);
    });

    it('rejects non-PDF extensions without touching the store', async () => {
        const before = await storedCount();

        for (const fileName of ['notes.txt', 'image.png', 'pdf', 'archive.pdf.zip']) {
            await expect(uploads.handleUpload({ fileName, bytes: Buffer.from('data') })).rejects.toBeInstanceOf(UnsupportedTypeError);
        }

        expect(await storedCount()).toBe(before);
    });

    it('rejects oversized uploads and persists nothing', async () => {
        const error = await uploads
            .handleUpload({ fileName: 'big.pdf', bytes: Buffer.alloc(MAX_BYTES + 1) })
            .catch((reason: unknown) => reason);

        expect(error).toBeInstanceOf(TooLargeError);
        expect(await storedCount()).toBe(0);
    });

    it('gives the user a readable message for each rejection', async () => {
        const unsupported = await uploads.handleUpload({ fileName: 'a.doc', bytes: Buffer.from('x') }).catch((reason: unknown) => reason);
        const empty = await uploads.handleUpload({}).catch((reason: unknown) => reason);

        expect(unsupported).toBeInstanceOf(UnsupportedTypeError);
        expect(empty).toBeInstanceOf(EmptyUploadError);
        if (unsupported instanceof UnsupportedTypeError && empty instanceof EmptyUploadError) {
            expect(unsupported.userMessage).toBe('Invalid file type. Please upload a PDF file.');
            expect(empty.userMessage).toBe('No file selected');
        }
    });

    it('surfaces storage failures as StorageError', async () => {
        const brokenStore = new FileStore({
            logger: createSilentLogger(),
            rootDir,
            maxBytes: MAX_BYTES,
            fileSystem: {
                ...nodeFileSystem,
                writeFile: async () => {
                    throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
                },
            },
        });
        const brokenUploads = new UploadService({
            logger: createSilentLogger(),
            fileStore: brokenStore,
            maxBytes: MAX_BYTES,
            allowedExtensions: ['.pdf'],
        });

        const error = await brokenUploads.handleUpload({ fileName: 'a.pdf', bytes: Buffer.from('%PDF') }).catch((reason: unknown) => reason);

        expect(error).toBeInstanceOf(StorageError);
        if (error instanceof StorageError) {
            expect(error.userMessage).toBe('Error uploading file. Please try again.');
        }
        expect(await storedCount()).toBe(0);
    });
});
