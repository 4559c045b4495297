import type { Request, Response, NextFunction } from 'express';
import { InvalidRequestError } from '../lib/errors/app-errors.js';
import type { ChatPipeline } from '../services/chat/chat-pipeline.service.js';
import { ChatRequestSchema } from './schemas.js';
import { requestAttributes } from './request-attributes.js';

export function createChatController(pipeline: ChatPipeline) {
    return async function postChat(req: Request, res: Response, next: NextFunction): Promise<void> {
        const parsedBody = ChatRequestSchema.safeParse(req.body ?? {});
        if (!parsedBody.success) {
            next(new InvalidRequestError(parsedBody.error.issues.map(i => i.message).join('; ')));
            return;
        }

        // client went away before we answered: abandon the backend call
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableEnded) controller.abort();
        });

        try {
            const result = await pipeline.handleTurn({
                message: parsedBody.data.message,
                sessionId: parsedBody.data.session_id,
                request: requestAttributes(req),
                signal: controller.signal
            });

            req.log.info(
                { event: 'chat_turn', responder: result.responder, recommendations: result.recommendations.length },
                '[Chat] Turn answered'
            );

            res.json({
                success: true,
                response: result.response,
                recommendations: result.recommendations,
                tenant: result.tenant
            });
        } catch (error) {
            next(error);
        }
    };
}
