import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import type express from 'express';
import { createApp, createServices, type AppServices } from './app';
import { loadConfig } from './config';
import { MISSING_CREDENTIALS_MESSAGE } from './services/chat/chat-proxy.service';
import type { CompletionClient, CompletionMessage } from './services/groq.service';
import { createSilentLogger } from './utils/logger';

const PDF_BYTES = Buffer.from('%PDF-1.4\n1 0 obj\n<<>>\nendobj\n%%EOF\n');

describe('HTTP surface', () => {
    let uploadDir: string;
    let services: AppServices;
    let app: express.Express;
    let sentMessages: CompletionMessage[][];

    const build = (client: CompletionClient | null) => {
        const config = loadConfig({ UPLOAD_DIR: uploadDir, MAX_UPLOAD_BYTES: '256' });
        const logger = createSilentLogger();
        services = createServices(config, logger, client);
        app = createApp(config, services, logger);
    };

    const storedFiles = () => fs.promises.readdir(uploadDir);

    beforeEach(async () => {
        uploadDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'pdf-viewer-app-'));
        sentMessages = [];
        build({
            complete: async (messages) => {
                sentMessages.push(messages);
                return 'Page 2 lists the quarterly totals.';
            },
        });
        await services.fileStore.init();
    });

    afterEach(async () => {
        await fs.promises.rm(uploadDir, { recursive: true, force: true });
    });

    it('reports health', async () => {
        const res = await request(app).get('/health');

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('ok');
    });

    describe('uploads', () => {
        it('redirects to the viewer after a successful upload', async () => {
            const res = await request(app).post('/').attach('file', PDF_BYTES, 'report.pdf');

            expect(res.status).toBe(302);
            expect(res.headers.location).toMatch(/^\/view\/[0-9a-f-]{36}_report\.pdf$/);
            const key = decodeURIComponent(res.headers.location.slice('/view/'.length));
            expect(await storedFiles()).toEqual([key]);
        });

        it('rejects non-PDF files with a flash message', async () => {
            const res = await request(app).post('/').attach('file', Buffer.from('hello'), 'notes.txt');

            expect(res.status).toBe(302);
            expect(res.headers.location).toBe(`/?error=${encodeURIComponent('Invalid file type. Please upload a PDF file.')}`);
            expect(await storedFiles()).toEqual([]);
        });

        it('rejects files above the size limit while reading', async () => {
            const res = await request(app).post('/').attach('file', Buffer.alloc(300, 1), 'big.pdf');

            expect(res.status).toBe(302);
            expect(res.headers.location).toBe(`/?error=${encodeURIComponent('File is too large. Maximum size is 256 Bytes.')}`);
            expect(await storedFiles()).toEqual([]);
        });

        it('asks for a file when none was sent', async () => {
            const res = await request(app).post('/').field('note', 'no file here');

            expect(res.status).toBe(302);
            expect(res.headers.location).toBe('/?error=No%20file%20selected');
        });
    });

    describe('pages', () => {
        it('lists recent uploads and shows the flash message', async () => {
            const stored = await services.fileStore.store(PDF_BYTES, 'minutes.pdf');

            const res = await request(app).get('/').query({ error: 'No file selected' });

            expect(res.status).toBe(200);
            expect(res.headers['content-type']).toContain('text/html');
            expect(res.text).toContain(`<a href="/view/${stored.key}">minutes.pdf</a>`);
            expect(res.text).toContain('role="alert">No file selected</div>');
        });

        it('renders the viewer for a stored file', async () => {
            const stored = await services.fileStore.store(PDF_BYTES, 'minutes.pdf');

            const res = await request(app).get(`/view/${stored.key}`);

            expect(res.status).toBe(200);
            expect(res.text).toContain(`data-file-key="${stored.key}"`);
            expect(res.text).toContain('<h1 class="document-title">minutes.pdf</h1>');
        });

        it('redirects home for unknown files', async () => {
            const res = await request(app).get('/view/missing.pdf');

            expect(res.status).toBe(302);
            expect(res.headers.location).toBe('/?error=File%20not%20found');
        });
    });

    describe('raw PDF', () => {
        it('serves stored bytes as application/pdf', async () => {
            const stored = await services.fileStore.store(PDF_BYTES, 'minutes.pdf');

            const res = await request(app).get(`/pdf/${stored.key}`).responseType('blob');

            expect(res.status).toBe(200);
            expect(res.headers['content-type']).toBe('application/pdf');
            expect(Buffer.compare(res.body, PDF_BYTES)).toBe(0);
        });

        it('returns 404 for unknown files', async () => {
            const res = await request(app).get('/pdf/missing.pdf');

            expect(res.status).toBe(404);
            expect(res.text).toBe('PDF file not found');
        });

        it('rejects traversal attempts', async () => {
            const res = await request(app).get('/pdf/..%2Fsecret.pdf');

            expect(res.status).toBe(400);
        });
    });

    describe('chat', () => {
        const body = {
            message: 'What is on this page?',
            history: [],
            context: { filename: 'abc_report.pdf', currentPage: 2, totalPages: 9, selectedText: '' },
        };

        it('returns the completion', async () => {
            const res = await request(app).post('/chat').send(body);

            expect(res.status).toBe(200);
            expect(res.body).toEqual({ response: 'Page 2 lists the quarterly totals.' });
            expect(sentMessages[0][0].content).toContain('- Current Page: 2 of 9');
        });

        it('forwards only the last 10 history entries', async () => {
            const history = Array.from({ length: 15 }, (_, index) => ({
                role: index % 2 === 0 ? 'user' : 'assistant',
                content: `turn ${index}`,
            }));

            await request(app).post('/chat').send({ ...body, history });

            expect(sentMessages[0]).toHaveLength(12);
            expect(sentMessages[0][1].content).toBe('turn 5');
        });

        it('answers with the credentials warning when no key is configured', async () => {
            build(null);

            const res = await request(app).post('/chat').send(body);

            expect(res.body).toEqual({ response: MISSING_CREDENTIALS_MESSAGE });
        });

        it('rejects a request without a message', async () => {
            const res = await request(app).post('/chat').send({ history: [] });

            expect(res.status).toBe(400);
            expect(res.body.error).toMatch(/^message: /);
        });

        it('rejects malformed JSON', async () => {
            const res = await request(app).post('/chat').set('Content-Type', 'application/json').send('{"message":');

            expect(res.status).toBe(400);
            expect(res.body).toEqual({ error: 'Malformed request body' });
        });

        it('answers 413 for a body over the size limit', async () => {
            const res = await request(app)
                .post('/chat')
                .set('Content-Type', 'application/json')
                .send(JSON.stringify({ message: 'x'.repeat(1024 * 1024 + 1) }));

            expect(res.status).toBe(413);
            expect(res.body).toEqual({ error: 'Request body too large' });
        });

        it('turns unexpected failures into a 500', async () => {
            vi.spyOn(services.chatProxy, 'complete').mockRejectedValue(new Error('boom'));

            const res = await request(app).post('/chat').send(body);

            expect(res.status).toBe(500);
            expect(res.body).toEqual({ error: 'Failed to process chat request' });
        });
    });
});
