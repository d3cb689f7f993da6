// ============================================
// VALLEY ECONOMY - Game Event Bus
// ============================================
// Session-owned publish/subscribe channel. Every component receives the
// bus through its constructor; there is no process-wide instance.

import { EventEmitter } from 'events';
import type { Buyer, GameOutcome, GameSpeed, Position, SellRecord } from '../models/types.js';

export interface GameEventMap {
  tick: { tick: number };
  balance_changed: { newBalance: number; delta: number };
  income_generated: { amount: number; sourceTag: string };
  ownership_changed: { lotId: string; newOwner: Buyer; tick: number };
  rival_warning: { ticksRemaining: number; targetLotId: string | null };
  game_ended: { outcome: GameOutcome; tick: number };
  game_started: { startingBalance: number };
  restaurant_upgraded: { level: number; cost: number };
  investment_opened: { position: Position };
  investment_compounded: { position: Position; multiplier: number };
  investment_sold: { sale: SellRecord };
  speed_changed: { speed: GameSpeed };
}

export type GameEventName = keyof GameEventMap;
export type GameEventListener<K extends GameEventName> = (payload: GameEventMap[K]) => void;

export const GAME_EVENT_NAMES: readonly GameEventName[] = [
  'tick',
  'balance_changed',
  'income_generated',
  'ownership_changed',
  'rival_warning',
  'game_ended',
  'game_started',
  'restaurant_upgraded',
  'investment_opened',
  'investment_compounded',
  'investment_sold',
  'speed_changed',
];

export class GameEventBus {
  private emitter = new EventEmitter();

  constructor() {
    // One listener per topic per WebSocket client
    this.emitter.setMaxListeners(0);
  }

  /**
   * Subscribe to a topic. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(event: K, listener: GameEventListener<K>): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    this.emitter.emit(event, payload);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
