// src/services/groq.service.ts

import Groq from 'groq-sdk';

export type CompletionRole = 'system' | 'user' | 'assistant';

export interface CompletionMessage {
    role: CompletionRole;
    content: string;
}

/** Anything that can turn a message list into the text of the top completion. */
export interface CompletionClient {
    complete(messages: CompletionMessage[]): Promise<string | null>;
}

export interface GroqCompletionOptions {
    apiKey: string;
    model: string;
    maxTokens: number;
    temperature: number;
}

type GroqMessage = Groq.Chat.Completions.ChatCompletionMessageParam;

function toGroqMessage(message: CompletionMessage): GroqMessage {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
        case 'user':
            return { role: 'user', content: message.content };
    }
}

export class GroqCompletionClient implements CompletionClient {
    private client: Groq;

    constructor(private readonly options: GroqCompletionOptions) {
        this.client = new Groq({ apiKey: options.apiKey });
    }

    public async complete(messages: CompletionMessage[]): Promise<string | null> {
        const response = await this.client.chat.completions.create({
            model: this.options.model,
            messages: messages.map(toGroqMessage),
            max_tokens: this.options.maxTokens,
            temperature: this.options.temperature,
            stream: false,
        });

        return response.choices[0]?.message?.content ?? null;
    }
}
