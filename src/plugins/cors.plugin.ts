// ============================================
// DEADZONE - CORS Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import cors from '@fastify/cors';
import { env, isDevelopment } from '../config/env.js';

export const corsPlugin: FastifyPluginAsync = async (fastify) => {
  await fastify.register(cors, {
    origin: isDevelopment() || env.CORS_ORIGINS.length === 0
      ? true // Allow all origins in development
      : env.CORS_ORIGINS,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Admin-Key'],
    credentials: true,
  });
};
