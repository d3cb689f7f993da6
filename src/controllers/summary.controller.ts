// ============================================
// VALLEY ECONOMY - Rival & Summary Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';

export const summaryController: FastifyPluginAsync = async (fastify) => {
  const gameService = fastify.gameService;

  // Rival standing
  fastify.get('/api/rival', async () => {
    return gameService.getRival();
  });

  // End-of-game summary (409 while the game is still going)
  fastify.get('/api/summary', async () => {
    return gameService.getSummary();
  });
};
