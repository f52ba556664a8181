// ============================================
// DEADZONE - Controllers Barrel Export & Registration
// ============================================

import { FastifyInstance } from 'fastify';
import { playersController } from './players.controller.js';
import { commandsController } from './commands.controller.js';
import { worldController } from './world.controller.js';
import { adminController } from './admin.controller.js';

export interface ControllerOptions {
  jwtSecret?: string;
}

export async function registerControllers(fastify: FastifyInstance, options: ControllerOptions = {}): Promise<void> {
  await fastify.register(playersController, { jwtSecret: options.jwtSecret });
  await fastify.register(commandsController);
  await fastify.register(worldController);
  await fastify.register(adminController);
}

export { playersController, commandsController, worldController, adminController };
