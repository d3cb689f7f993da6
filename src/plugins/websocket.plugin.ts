// ============================================
// VALLEY ECONOMY - WebSocket Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import websocket from '@fastify/websocket';
import type { WebSocket } from 'ws';
import { wsClientMessageSchema } from '../schemas/websocket.schema.js';

declare module 'fastify' {
  interface FastifyInstance {
    wsClients: Set<WebSocket>;
    broadcast: (event: string, data: unknown) => void;
    clientTopics: Map<WebSocket, Set<string>>;
  }
}

const websocketPluginImpl: FastifyPluginAsync = async (fastify) => {
  // Register WebSocket support
  await fastify.register(websocket, {
    options: {
      clientTracking: true,
    },
  });

  // Track all connected WebSocket clients
  const wsClients = new Set<WebSocket>();
  fastify.decorate('wsClients', wsClients);

  // Topic filter per client; clients without one receive everything
  const clientTopics = new Map<WebSocket, Set<string>>();
  fastify.decorate('clientTopics', clientTopics);

  fastify.decorate('broadcast', (event: string, data: unknown) => {
    const message = JSON.stringify({ event, data });
    for (const client of wsClients) {
      if (client.readyState !== 1) continue; // WebSocket.OPEN
      const topics = clientTopics.get(client);
      if (topics && !topics.has(event)) continue;
      client.send(message);
    }
  });

  const forget = (socket: WebSocket) => {
    wsClients.delete(socket);
    clientTopics.delete(socket);
  };

  // WebSocket endpoint
  fastify.get('/ws', { websocket: true }, (socket) => {
    wsClients.add(socket);
    fastify.log.info(`WebSocket client connected. Total: ${wsClients.size}`);

    socket.on('close', () => {
      forget(socket);
      fastify.log.info(`WebSocket client disconnected. Total: ${wsClients.size}`);
    });

    socket.on('error', (err) => {
      fastify.log.error({ err }, 'WebSocket error');
      forget(socket);
    });

    // Handle incoming messages
    socket.on('message', (message) => {
      let payload: unknown;
      try {
        payload = JSON.parse(message.toString());
      } catch {
        fastify.log.warn('Invalid WebSocket message received');
        return;
      }

      const parsed = wsClientMessageSchema.safeParse(payload);
      if (!parsed.success) {
        fastify.log.warn('Unsupported WebSocket message received');
        return;
      }

      const data = parsed.data;
      if (data.type === 'ping') {
        socket.send(JSON.stringify({ type: 'pong' }));
        return;
      }

      if (data.type === 'subscribe') {
        clientTopics.set(socket, new Set(data.events));
      } else {
        clientTopics.delete(socket);
      }
      socket.send(JSON.stringify({
        event: 'subscribed',
        data: { events: data.type === 'subscribe' ? data.events : 'all' },
      }));
    });

    // Send welcome message
    socket.send(JSON.stringify({
      event: 'connected',
      data: { message: 'Connected to the Valley Economy event stream' },
    }));
  });
};

// Export with fastify-plugin to share decorators across encapsulation boundaries
export const websocketPlugin = fp(websocketPluginImpl, {
  name: 'valley-websocket',
});
