// src/errors/index.ts

import { formatBytes } from '../utils/format';

/**
 * Base class for every failure the application knows how to describe to a user.
 * `userMessage` is safe to render; `message` may carry internal detail for logs.
 */
export abstract class AppError extends Error {
    public abstract readonly code: string;
    public readonly status: number;
    public readonly userMessage: string;

    constructor(userMessage: string, status: number, detail?: string, options?: { cause?: unknown }) {
        super(detail ?? userMessage, options);
        this.name = new.target.name;
        this.status = status;
        this.userMessage = userMessage;
    }
}

// --- Upload validation ---

export abstract class UploadError extends AppError {}

export class EmptyUploadError extends UploadError {
    public readonly code = 'EMPTY_UPLOAD';

    constructor() {
        super('No file selected', 400);
    }
}

export class UnsupportedTypeError extends UploadError {
    public readonly code = 'UNSUPPORTED_TYPE';

    constructor(fileName?: string) {
        super('Invalid file type. Please upload a PDF file.', 415, fileName ? `Rejected non-PDF upload: ${fileName}` : undefined);
    }
}

export class TooLargeError extends UploadError {
    public readonly code = 'TOO_LARGE';

    constructor(maxBytes: number) {
        super(`File is too large. Maximum size is ${formatBytes(maxBytes)}.`, 413);
    }
}

// --- Storage ---

export class StorageError extends AppError {
    public readonly code = 'STORAGE';

    constructor(detail: string, options?: { cause?: unknown }) {
        super('Error uploading file. Please try again.', 500, detail, options);
    }
}

export class NotFoundError extends AppError {
    public readonly code = 'NOT_FOUND';

    constructor(fileKey: string) {
        super('File not found', 404, `No stored file for key ${fileKey}`);
    }
}

export class InvalidKeyError extends AppError {
    public readonly code = 'INVALID_KEY';

    constructor(fileKey: string) {
        super('File not found', 400, `Rejected file key ${JSON.stringify(fileKey)}`);
    }
}

// --- Chat upstream ---

export abstract class ChatError extends AppError {}

export class ChatAuthError extends ChatError {
    public readonly code = 'CHAT_AUTH';

    constructor(detail?: string, options?: { cause?: unknown }) {
        super('🔑 Invalid Groq API key. Please check your GROQ_API_KEY in the .env file.', 502, detail, options);
    }
}

export class ChatRateLimitError extends ChatError {
    public readonly code = 'CHAT_RATE_LIMIT';

    constructor(detail?: string, options?: { cause?: unknown }) {
        super('⏱️ Groq API rate limit exceeded. Please try again in a moment.', 429, detail, options);
    }
}

export class ChatNetworkError extends ChatError {
    public readonly code = 'CHAT_NETWORK';

    constructor(detail?: string, options?: { cause?: unknown }) {
        super('🌐 Network connection issue. Please check your internet connection and try again.', 503, detail, options);
    }
}

export class ChatUnknownError extends ChatError {
    public readonly code = 'CHAT_UNKNOWN';

    constructor(detail?: string, options?: { cause?: unknown }) {
        super('The assistant is temporarily unavailable.', 502, detail, options);
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return typeof error === 'string' ? error : 'Unknown error';
}
