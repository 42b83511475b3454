// src/services/chat/chat-proxy.service.ts

import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { CompletionClient, CompletionMessage } from '../groq.service';
import type { ChatContext, ChatMessage } from '../../models/chat.model';
import {
    ChatAuthError,
    ChatError,
    ChatNetworkError,
    ChatRateLimitError,
    ChatUnknownError,
    errorMessage,
} from '../../errors';
import { CHAT_HISTORY_LIMIT } from '../../models/chat.constants';
import { displayNameFor } from '../../utils/filename';
import { PDF_ASSISTANT_SYSTEM_PROMPT_TEMPLATE } from './prompts/pdfAssistantPrompt';

export const SELECTION_QUOTE_LIMIT = 200;
export const MISSING_CREDENTIALS_MESSAGE =
    '⚠️ Groq API key not found. Please set GROQ_API_KEY in your .env file to enable AI chat.';

const UNAVAILABLE_NOTE = '(Note: AI chat temporarily unavailable)';

export interface ChatProxyConfig extends ServiceConfig {
    /** `null` when no credentials are configured. */
    client: CompletionClient | null;
}

export class ChatProxyService extends BaseService {
    private readonly client: CompletionClient | null;

    constructor(config: ChatProxyConfig) {
        super(config);
        this.client = config.client;
    }

    /**
     * Turns a user message into an assistant reply. Never rejects: upstream failures come
     * back as a displayable string.
     */
    public async complete(message: string, history: ChatMessage[], context: ChatContext): Promise<string> {
        if (!this.client) {
            this.logger.warn('Chat requested without GROQ_API_KEY configured');
            return MISSING_CREDENTIALS_MESSAGE;
        }

        const messages = this.buildMessages(message, history, context);

        try {
            const content = await this.client.complete(messages);
            const reply = content?.trim();
            if (!reply) {
                throw new ChatUnknownError('Completion returned no content');
            }
            return reply;
        } catch (error) {
            const classified = classifyChatError(error);
            this.logger.error('Chat completion failed', { code: classified.code, error: classified.message });
            if (classified instanceof ChatUnknownError) {
                return cannedReply(message, context);
            }
            return classified.userMessage;
        }
    }

    public buildMessages(message: string, history: ChatMessage[], context: ChatContext): CompletionMessage[] {
        return [
            { role: 'system', content: buildSystemPrompt(context) },
            ...history.slice(-CHAT_HISTORY_LIMIT).map((entry) => ({ role: entry.role, content: entry.content })),
            { role: 'user', content: message },
        ];
    }
}

export function buildSystemPrompt(context: ChatContext): string {
    return PDF_ASSISTANT_SYSTEM_PROMPT_TEMPLATE
        .replace('{{FILENAME}}', () => (context.fileId ? displayNameFor(context.fileId) : 'Unknown'))
        .replace('{{CURRENT_PAGE}}', () => String(context.currentPage))
        .replace('{{TOTAL_PAGES}}', () => (context.totalPages === null ? 'Unknown' : String(context.totalPages)))
        .replace('{{SELECTED_TEXT}}', () => context.selectedText || 'None');
}

const AUTH_PATTERN = /authentication|api key|unauthorized|invalid_api_key/;
const RATE_LIMIT_PATTERN = /rate limit|quota|too many requests/;
const NETWORK_PATTERN = /connection|network|timed out|timeout|econnrefused|econnreset|enotfound|eai_again|socket hang up/;

function statusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

/** Maps an upstream failure onto the chat error taxonomy by HTTP status, then by message. */
export function classifyChatError(error: unknown): ChatError {
    if (error instanceof ChatError) return error;

    const detail = errorMessage(error);
    const status = statusOf(error);
    const text = detail.toLowerCase();

    if (status === 401 || status === 403 || AUTH_PATTERN.test(text)) {
        return new ChatAuthError(detail, { cause: error });
    }
    if (status === 429 || RATE_LIMIT_PATTERN.test(text)) {
        return new ChatRateLimitError(detail, { cause: error });
    }
    if (NETWORK_PATTERN.test(text)) {
        return new ChatNetworkError(detail, { cause: error });
    }
    return new ChatUnknownError(detail, { cause: error });
}

/** Deterministic reply used when the completion API fails for an unrecognised reason. */
export function cannedReply(message: string, context: ChatContext): string {
    const lowered = message.toLowerCase();

    if (context.selectedText) {
        const characters = Array.from(context.selectedText);
        const quote = characters.slice(0, SELECTION_QUOTE_LIMIT).join('');
        const ellipsis = characters.length > SELECTION_QUOTE_LIMIT ? '...' : '';
        return `I can see you've selected: "${quote}${ellipsis}"\n\nWhat would you like me to explain about this selection? ${UNAVAILABLE_NOTE}`;
    }
    if (lowered.includes('summary')) {
        return `I'd be happy to provide a summary of page ${context.currentPage} of this document. What specific section interests you? ${UNAVAILABLE_NOTE}`;
    }
    if (lowered.includes('explain')) {
        return `I can help explain concepts from this PDF. Could you point me to the specific section or concept you'd like me to clarify? ${UNAVAILABLE_NOTE}`;
    }
    const total = context.totalPages === null ? '?' : String(context.totalPages);
    return `I'm here to help you understand this PDF document. Currently viewing page ${context.currentPage} of ${total}. What would you like to know? ${UNAVAILABLE_NOTE}`;
}
