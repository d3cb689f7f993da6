// ============================================
// VALLEY ECONOMY - Investments Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { openInvestmentSchema, positionIdParamSchema, projectionQuerySchema } from '../schemas/investments.schema.js';

export const investmentsController: FastifyPluginAsync = async (fastify) => {
  const gameService = fastify.gameService;

  // Investment catalog
  fastify.get('/api/investments/definitions', async () => {
    return { definitions: gameService.getInvestmentDefinitions() };
  });

  // Open positions and portfolio accounting
  fastify.get('/api/investments', async () => {
    return gameService.getPortfolio();
  });

  // Deterministic projection (volatility ignored)
  fastify.get('/api/investments/projection', async (request) => {
    const query = projectionQuerySchema.parse(request.query);
    return gameService.project(query);
  });

  // Portfolio wealth samples
  fastify.get('/api/investments/history', async () => {
    return { samples: gameService.getHistory() };
  });

  // Closed positions
  fastify.get('/api/investments/sales', async () => {
    return { sales: gameService.getSales() };
  });

  // Open a position
  fastify.post('/api/investments', async (request, reply) => {
    const body = openInvestmentSchema.parse(request.body);
    const position = gameService.openInvestment(body.definitionId, body.amount);
    reply.status(201);
    return { success: true, position };
  });

  // Sell a position
  fastify.post('/api/investments/:positionId/sell', async (request) => {
    const params = positionIdParamSchema.parse(request.params);
    const sale = gameService.sellInvestment(params.positionId);
    return { success: true, sale };
  });
};
