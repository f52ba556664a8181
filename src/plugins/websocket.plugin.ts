// ============================================
// DEADZONE - WebSocket Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import websocket from '@fastify/websocket';
import type { WebSocket } from 'ws';
import { z } from 'zod';
import { env } from '../config/env.js';
import { verifyToken } from './auth.plugin.js';

declare module 'fastify' {
  interface FastifyInstance {
    wsClients: Set<WebSocket>;
    broadcast: (event: string, data: unknown) => void;
    sendToPlayers: (playerIds: readonly string[], event: string, data: unknown) => void;
  }
}

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('subscribe'), token: z.string() }),
]);

export interface WebsocketPluginOptions {
  jwtSecret?: string;
}

const websocketPluginImpl: FastifyPluginAsync<WebsocketPluginOptions> = async (fastify, options) => {
  const secret = options.jwtSecret ?? env.JWT_SECRET;

  // Register WebSocket support
  await fastify.register(websocket, {
    options: {
      clientTracking: true,
    },
  });

  // Track all connected WebSocket clients
  const wsClients = new Set<WebSocket>();
  fastify.decorate('wsClients', wsClients);

  // Which player each subscribed socket belongs to
  const clientPlayers = new Map<WebSocket, string>();

  // Broadcast to ALL clients (world events)
  fastify.decorate('broadcast', (event: string, data: unknown) => {
    const message = JSON.stringify({ event, data });
    for (const client of wsClients) {
      if (client.readyState === 1) { // WebSocket.OPEN
        client.send(message);
      }
    }
  });

  // Send to the sockets of specific players
  fastify.decorate('sendToPlayers', (playerIds: readonly string[], event: string, data: unknown) => {
    if (playerIds.length === 0) return;
    const message = JSON.stringify({ event, data });
    for (const client of wsClients) {
      const playerId = clientPlayers.get(client);
      if (client.readyState === 1 && playerId !== undefined && playerIds.includes(playerId)) {
        client.send(message);
      }
    }
  });

  // WebSocket endpoint
  fastify.get('/ws', { websocket: true }, (socket) => {
    wsClients.add(socket);
    fastify.log.info(`WebSocket client connected. Total: ${wsClients.size}`);

    socket.on('close', () => {
      wsClients.delete(socket);
      clientPlayers.delete(socket);
      fastify.log.info(`WebSocket client disconnected. Total: ${wsClients.size}`);
    });

    socket.on('error', (err) => {
      fastify.log.error({ err }, 'WebSocket error');
      wsClients.delete(socket);
      clientPlayers.delete(socket);
    });

    // Handle incoming messages
    socket.on('message', (raw) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw.toString());
      } catch {
        fastify.log.warn('Invalid WebSocket message received');
        return;
      }

      const message = clientMessageSchema.safeParse(parsed);
      if (!message.success) {
        socket.send(JSON.stringify({ event: 'error', data: { message: 'Unknown message' } }));
        return;
      }

      // Keepalive
      if (message.data.type === 'ping') {
        socket.send(JSON.stringify({ event: 'pong' }));
        return;
      }

      // Player subscription
      try {
        const payload = verifyToken(message.data.token, secret);
        clientPlayers.set(socket, payload.playerId);
        socket.send(JSON.stringify({ event: 'subscribed', data: { playerId: payload.playerId } }));
      } catch (err) {
        fastify.log.debug({ err }, 'WebSocket subscription rejected');
        socket.send(JSON.stringify({ event: 'error', data: { message: 'Invalid token' } }));
      }
    });

    // Send welcome message
    socket.send(JSON.stringify({
      event: 'connected',
      data: { message: 'Connected to the Deadzone world feed' },
    }));
  });
};

// Export with fastify-plugin to share decorators across encapsulation boundaries
export const websocketPlugin = fp(websocketPluginImpl, {
  name: 'deadzone-websocket',
});
