// ============================================
// DEADZONE - Admin Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { WorldService } from '../services/world.service.js';

export const adminController: FastifyPluginAsync = async (fastify) => {
  const worldService = new WorldService(fastify.engine, fastify.db, fastify.worldDefinition);
  const { clock } = fastify.engine;

  fastify.addHook('onRequest', fastify.requireAdmin);

  // Pause the world clock (persists across restarts)
  fastify.post('/api/admin/pause', async () => {
    await clock.pause();
    return { success: true, status: await clock.getStatus() };
  });

  // Resume the world clock
  fastify.post('/api/admin/resume', async () => {
    await clock.resume();
    return { success: true, status: await clock.getStatus() };
  });

  // Run a single tick now, even while paused
  fastify.post('/api/admin/tick', async () => {
    const report = await clock.advance(undefined, { force: true });
    return { success: report !== null, report };
  });

  // Wipe players and restart the world
  fastify.post('/api/admin/reset', async () => {
    await worldService.reset();
    return { success: true, status: await clock.getStatus() };
  });
};
