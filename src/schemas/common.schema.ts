// ============================================
// VALLEY ECONOMY - Common Schemas
// ============================================

import { z } from 'zod';
import { GAME_EVENT_NAMES } from '../simulation/events.js';

// Risk levels
export const riskLevelSchema = z.enum(['low', 'medium', 'high']);

// Lot owners
export const ownerSchema = z.enum(['unowned', 'player', 'rival']);

// Bus topic names
export const gameEventNameSchema = z.string().refine(
  name => GAME_EVENT_NAMES.some(event => event === name),
  { message: `Unknown event; expected one of ${GAME_EVENT_NAMES.join(', ')}` }
);

// Money amount supplied by a player
export const amountSchema = z.number().finite().positive();
