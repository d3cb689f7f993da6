// ============================================
// VALLEY ECONOMY - Simulation Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { advanceSchema, newGameSchema, speedSchema } from '../schemas/simulation.schema.js';

export const simulationController: FastifyPluginAsync = async (fastify) => {
  const gameService = fastify.gameService;

  // Get simulation status
  fastify.get('/api/simulation/status', async () => {
    return gameService.getStatus();
  });

  // Start a new game
  fastify.post('/api/simulation/new-game', async (request, reply) => {
    const body = newGameSchema.parse(request.body ?? {});
    const status = gameService.newGame(body);
    reply.status(201);
    return { success: true, status };
  });

  // Start (or resume) the real-time loop
  fastify.post('/api/simulation/start', async () => {
    if (fastify.simulationEngine.isRunning()) {
      return { success: true, message: 'Simulation already running', status: gameService.getStatus() };
    }
    const status = gameService.start();
    return { success: true, message: 'Simulation started', status };
  });

  // Pause the real-time loop
  fastify.post('/api/simulation/stop', async () => {
    const status = gameService.stop();
    return { success: true, message: 'Simulation stopped', status };
  });

  // Game speed
  fastify.post('/api/simulation/speed', async (request) => {
    const body = speedSchema.parse(request.body);
    return { success: true, status: gameService.setSpeed(body.speed) };
  });

  // Manual stepping
  fastify.post('/api/simulation/advance', async (request) => {
    const body = advanceSchema.parse(request.body ?? {});
    return { success: true, ...gameService.advance(body.ticks) };
  });

  // Back to the pre-game state
  fastify.post('/api/simulation/reset', async () => {
    return { success: true, status: gameService.reset() };
  });
};
