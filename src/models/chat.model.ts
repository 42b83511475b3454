// src/models/chat.model.ts

import { z } from 'zod';

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
    role: ChatRole;
    content: string;
}

/** Snapshot of the viewer attached to each outgoing chat request. */
export interface ChatContext {
    fileId: string;
    currentPage: number;
    totalPages: number | null;
    selectedText: string;
}

export const chatMessageSchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
});

export const chatRequestSchema = z.object({
    message: z.string().trim().min(1, 'message is required'),
    history: z.array(chatMessageSchema).default([]),
    context: z
        .object({
            filename: z.string().default(''),
            currentPage: z.number().int().min(1).default(1),
            totalPages: z.number().int().min(0).nullable().default(null),
            selectedText: z.string().default(''),
        })
        .default({}),
});

/** Body the browser posts to `/chat`. */
export type ChatRequestBody = z.input<typeof chatRequestSchema>;
export type ChatRequest = z.output<typeof chatRequestSchema>;

export type ChatResponseBody = { response: string } | { error: string };

export function toChatContext(request: ChatRequest): ChatContext {
    return {
        fileId: request.context.filename,
        currentPage: request.context.currentPage,
        // pdf.js reports 0 pages until the document has loaded
        totalPages: request.context.totalPages ? request.context.totalPages : null,
        selectedText: request.context.selectedText,
    };
}
