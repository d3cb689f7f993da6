// ============================================
// VALLEY ECONOMY - Lots Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { lotIdParamSchema, lotsQuerySchema } from '../schemas/lots.schema.js';

export const lotsController: FastifyPluginAsync = async (fastify) => {
  const gameService = fastify.gameService;

  // List lots with their owners
  fastify.get('/api/lots', async (request) => {
    const query = lotsQuerySchema.parse(request.query);
    return { lots: gameService.getLots(query.owner) };
  });

  // Player purchase
  fastify.post('/api/lots/:lotId/purchase', async (request) => {
    const params = lotIdParamSchema.parse(request.params);
    return { success: true, ...gameService.buyLot(params.lotId) };
  });
};
