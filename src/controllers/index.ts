// ============================================
// VALLEY ECONOMY - Controllers Barrel Export & Registration
// ============================================

import { FastifyInstance } from 'fastify';
import { simulationController } from './simulation.controller.js';
import { economyController } from './economy.controller.js';
import { investmentsController } from './investments.controller.js';
import { lotsController } from './lots.controller.js';
import { summaryController } from './summary.controller.js';

export async function registerControllers(fastify: FastifyInstance): Promise<void> {
  // Register all controllers
  await fastify.register(simulationController);
  await fastify.register(economyController);
  await fastify.register(investmentsController);
  await fastify.register(lotsController);
  await fastify.register(summaryController);
}

// Export individual controllers for testing
export {
  simulationController,
  economyController,
  investmentsController,
  lotsController,
  summaryController,
};
