// ============================================
// VALLEY ECONOMY - CORS Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import cors from '@fastify/cors';
import { isProduction } from '../config/env.js';

const corsPluginImpl: FastifyPluginAsync = async (fastify) => {
  await fastify.register(cors, {
    origin: !isProduction(), // Same-origin only in production
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });
};

export const corsPlugin = fp(corsPluginImpl, {
  name: 'valley-cors',
});
