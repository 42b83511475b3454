// src/models/chat.constants.ts

/** Most recent history entries forwarded with each chat request. */
export const CHAT_HISTORY_LIMIT = 10;

export const CHAT_GREETING =
    'Hi! I can help you understand this PDF. Ask me questions about the content, request summaries, or discuss specific sections.';
