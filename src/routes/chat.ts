// src/routes/chat.ts

import express, { Request, Response } from 'express';
import type { ChatProxyService } from '../services/chat/chat-proxy.service';
import type { Logger } from '../services/base/types';
import { chatRequestSchema, toChatContext, type ChatResponseBody } from '../models/chat.model';
import { errorMessage } from '../errors';

export interface ChatRouterDeps {
    chatProxy: ChatProxyService;
    logger: Logger;
}

export function createChatRouter({ chatProxy, logger }: ChatRouterDeps): express.Router {
    const router = express.Router();

    router.post('/', async (req: Request, res: Response) => {
        const parsed = chatRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const body: ChatResponseBody = {
                error: issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid chat request',
            };
            res.status(400).json(body);
            return;
        }

        try {
            const { message, history } = parsed.data;
            const response = await chatProxy.complete(message, history, toChatContext(parsed.data));
            const body: ChatResponseBody = { response };
            res.json(body);
        } catch (error) {
            logger.error('Chat error', { error: errorMessage(error) });
            const body: ChatResponseBody = { error: 'Failed to process chat request' };
            res.status(500).json(body);
        }
    });

    return router;
}
