// ============================================
// VALLEY ECONOMY - Economy Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';

export const economyController: FastifyPluginAsync = async (fastify) => {
  const gameService = fastify.gameService;

  // GET /api/economy - Balance, restaurant and lot income
  fastify.get('/api/economy', async () => {
    return gameService.getEconomy();
  });

  // POST /api/economy/restaurant/upgrade - Buy the next restaurant level
  fastify.post('/api/economy/restaurant/upgrade', async () => {
    return { success: true, ...gameService.upgradeRestaurant() };
  });
};
