import { z } from 'zod';

/**
 * Chat turn body. A missing message is treated as blank so the pipeline
 * answers "Empty message"; a non-string message is an invalid request.
 */
export const ChatRequestSchema = z.object({
    message: z.string().optional().default(''),
    session_id: z.string().max(200).optional(),
    restaurant_id: z.string().optional()
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export const TenantIdParamsSchema = z.object({
    tenantId: z.string().uuid()
});
