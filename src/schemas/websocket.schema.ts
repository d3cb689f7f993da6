// ============================================
// VALLEY ECONOMY - WebSocket Message Schemas
// ============================================

import { z } from 'zod';
import { gameEventNameSchema } from './common.schema.js';

export const wsClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('subscribe'), events: z.array(gameEventNameSchema).min(1) }),
  z.object({ type: z.literal('unsubscribe') }),
]);

export type WsClientMessage = z.infer<typeof wsClientMessageSchema>;
