// ============================================
// DEADZONE - World Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { WorldService } from '../services/world.service.js';
import { idParamSchema } from '../schemas/common.schema.js';

export const worldController: FastifyPluginAsync = async (fastify) => {
  const worldService = new WorldService(fastify.engine, fastify.db, fastify.worldDefinition);

  // Clock status and region overview
  fastify.get('/api/world', async () => {
    return worldService.getOverview();
  });

  // One region with its buildings and who is there
  fastify.get('/api/world/regions/:id', async (request) => {
    const params = idParamSchema.parse(request.params);
    return worldService.getRegion(params.id);
  });
};
