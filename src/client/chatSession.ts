// src/client/chatSession.ts

import type { ChatMessage, ChatRequestBody, ChatResponseBody } from '../models/chat.model';
import { CHAT_HISTORY_LIMIT } from '../models/chat.constants';

export const CHAT_FAILURE_MESSAGE = 'Sorry, I encountered an error. Please try again.';

export interface ChatContextSnapshot {
    filename: string;
    currentPage: number;
    totalPages: number;
    selectedText: string;
}

export type ChatTransport = (body: ChatRequestBody) => Promise<ChatResponseBody>;

export type ChatEntryKind = 'user' | 'assistant' | 'system';

export interface ChatSessionEvents {
    onEntry?: (kind: ChatEntryKind, content: string) => void;
    onPendingChange?: (pending: boolean) => void;
}

export function fetchTransport(endpoint: string = '/chat'): ChatTransport {
    return async (body) => {
        const response = await fetch(endpoint, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
        });
        const data: unknown = await response.json();
        if (typeof data === 'object' && data !== null) {
            if ('response' in data && typeof data.response === 'string') return { response: data.response };
            if ('error' in data && typeof data.error === 'string') return { error: data.error };
        }
        return { error: `Unexpected chat response (${response.status})` };
    };
}

/** Conversation held in the browser for one open document; never persisted. */
export class ChatSession {
    private history: ChatMessage[] = [];
    private pending = false;

    constructor(
        private readonly transport: ChatTransport,
        private readonly events: ChatSessionEvents = {},
    ) {}

    public get entries(): readonly ChatMessage[] {
        return this.history;
    }

    public get isPending(): boolean {
        return this.pending;
    }

    /**
     * Sends one message. Returns the assistant reply, or null when nothing was sent or the
     * request failed (the failure is reported through `onEntry` as a system message).
     */
    public async send(rawMessage: string, context: ChatContextSnapshot): Promise<string | null> {
        const message = rawMessage.trim();
        if (!message || this.pending) return null;

        const priorHistory = this.history.slice(-CHAT_HISTORY_LIMIT);
        this.history.push({ role: 'user', content: message });
        this.events.onEntry?.('user', message);
        this.setPending(true);

        try {
            const result = await this.transport({ message, history: priorHistory, context });
            if ('response' in result) {
                this.history.push({ role: 'assistant', content: result.response });
                this.events.onEntry?.('assistant', result.response);
                return result.response;
            }
            this.events.onEntry?.('system', CHAT_FAILURE_MESSAGE);
            return null;
        } catch (error) {
            console.error('Chat error:', error);
            this.events.onEntry?.('system', CHAT_FAILURE_MESSAGE);
            return null;
        } finally {
            this.setPending(false);
        }
    }

    public reset(): void {
        this.history = [];
    }

    private setPending(pending: boolean): void {
        this.pending = pending;
        this.events.onPendingChange?.(pending);
    }
}
