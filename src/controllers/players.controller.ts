// ============================================
// DEADZONE - Players Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { PlayerService } from '../services/player.service.js';
import { createPlayerSchema } from '../schemas/players.schema.js';
import { paginationSchema } from '../schemas/common.schema.js';
import { currentPlayerId } from '../plugins/auth.plugin.js';

export interface PlayersControllerOptions {
  jwtSecret?: string;
}

export const playersController: FastifyPluginAsync<PlayersControllerOptions> = async (fastify, options) => {
  const playerService = new PlayerService(fastify.engine, options.jwtSecret);

  // Create a character
  fastify.post('/api/players', async (request, reply) => {
    const body = createPlayerSchema.parse(request.body);
    const { player, token } = await playerService.create(body.name, body.playerClass);

    reply.status(201);
    return { success: true, player, token };
  });

  // Own profile
  fastify.get('/api/players/me', { preHandler: [fastify.authenticate] }, async (request) => {
    return playerService.getProfile(currentPlayerId(request));
  });

  // Recent encounters, newest first
  fastify.get('/api/players/me/encounters', { preHandler: [fastify.authenticate] }, async (request) => {
    const { limit } = paginationSchema.parse(request.query);
    const encounters = await playerService.listEncounters(currentPlayerId(request), limit);
    return { encounters };
  });

  // Delete own character
  fastify.delete('/api/players/me', { preHandler: [fastify.authenticate] }, async (request) => {
    await playerService.delete(currentPlayerId(request));
    return { success: true };
  });
};
