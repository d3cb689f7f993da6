// ============================================
// VALLEY ECONOMY - Simulation Engine Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { SimulationEngine } from '../simulation/engine.js';
import { GAME_EVENT_NAMES } from '../simulation/events.js';
import { GameService } from '../services/game.service.js';
import type { GameConfig } from '../models/types.js';

declare module 'fastify' {
  interface FastifyInstance {
    simulationEngine: SimulationEngine;
    gameService: GameService;
  }
}

export interface SimulationPluginOptions {
  config: GameConfig;
  seed?: number;
  tickIntervalMs?: number;
  /** Begin a game and its real-time loop as soon as the server is ready. */
  autoStart?: boolean;
}

const simulationPluginImpl: FastifyPluginAsync<SimulationPluginOptions> = async (fastify, options) => {
  const engine = new SimulationEngine({
    config: options.config,
    seed: options.seed,
    tickIntervalMs: options.tickIntervalMs,
  });
  fastify.decorate('simulationEngine', engine);
  fastify.decorate('gameService', new GameService(engine));

  // Wire simulation activity logger to the server log
  engine.setActivityLogger((type, message, metadata) => {
    fastify.log.debug({ type, ...metadata }, message);
  });

  // Forward every bus topic to WebSocket clients
  for (const event of GAME_EVENT_NAMES) {
    engine.bus.on(event, (data) => {
      fastify.broadcast(event, data);
    });
  }

  engine.bus.on('game_ended', ({ outcome, tick }) => {
    fastify.log.info(`Game ${outcome} at tick ${tick}`);
  });

  engine.on('started', () => {
    fastify.broadcast('simulation_started', { tick: engine.getCurrentTick() });
    fastify.log.info('Simulation engine started');
  });

  engine.on('stopped', () => {
    fastify.broadcast('simulation_stopped', { tick: engine.getCurrentTick() });
    fastify.log.info('Simulation engine stopped');
  });

  // Auto-start if configured
  if (options.autoStart) {
    fastify.addHook('onReady', async () => {
      engine.newGame();
      engine.start();
    });
  }

  // Cleanup on server close
  fastify.addHook('onClose', async () => {
    engine.stop();
    engine.bus.removeAllListeners();
  });
};

// Wrap with fastify-plugin to share decorators across encapsulation boundaries
export const simulationPlugin = fp(simulationPluginImpl, {
  name: 'valley-simulation',
  dependencies: ['valley-websocket'],
});
