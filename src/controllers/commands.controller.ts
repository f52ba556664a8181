// ============================================
// DEADZONE - Commands Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { CommandService } from '../services/command.service.js';
import { commandBodySchema } from '../schemas/commands.schema.js';
import { currentPlayerId } from '../plugins/auth.plugin.js';

export const commandsController: FastifyPluginAsync = async (fastify) => {
  const commandService = new CommandService(fastify.engine);

  // Run a player command
  fastify.post('/api/commands', { preHandler: [fastify.authenticate] }, async (request, reply) => {
    const body = commandBodySchema.parse(request.body);
    const result = await commandService.dispatch({
      playerId: currentPlayerId(request),
      verb: body.verb,
      args: body.args,
    });

    if (!result.ok) {
      reply.status(result.statusCode);
    }
    return result;
  });
};
