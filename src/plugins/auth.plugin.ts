// ============================================
// DEADZONE - Auth Plugin
// ============================================

import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import jwt from 'jsonwebtoken';
import { timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { env } from '../config/env.js';
import { ForbiddenError, UnauthorizedError } from './error-handler.plugin.js';

const jwtPayloadSchema = z.object({
  playerId: z.string(),
  name: z.string(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

declare module 'fastify' {
  interface FastifyRequest {
    user?: JwtPayload;
  }
  interface FastifyInstance {
    authenticate: (request: FastifyRequest) => Promise<void>;
    requireAdmin: (request: FastifyRequest) => Promise<void>;
  }
}

export function signToken(payload: Omit<JwtPayload, 'iat' | 'exp'>, secret: string = env.JWT_SECRET): string {
  return jwt.sign(payload, secret, { expiresIn: toSeconds(env.JWT_EXPIRES_IN) });
}

export function verifyToken(token: string, secret: string = env.JWT_SECRET): JwtPayload {
  const decoded = jwt.verify(token, secret);
  const payload = jwtPayloadSchema.safeParse(decoded);
  if (!payload.success) {
    throw new UnauthorizedError('Invalid token payload');
  }
  return payload.data;
}

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400, w: 604800, y: 31557600 };

// JWT_EXPIRES_IN is written like 30d, 12h or 3600
export function toSeconds(value: string): number {
  const match = /^(\d+)\s*([smhdwy]?)$/i.exec(value.trim());
  if (!match) {
    throw new Error(`Unreadable token lifetime '${value}'`);
  }
  return Number(match[1]) * (UNIT_SECONDS[match[2].toLowerCase() || 's'] ?? 1);
}

function bearerToken(request: FastifyRequest): string {
  const authHeader = request.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    throw new UnauthorizedError('Missing or invalid authorization header');
  }
  return authHeader.substring(7);
}

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export interface AuthPluginOptions {
  jwtSecret?: string;
  adminKey?: string;
}

const authPluginImpl: FastifyPluginAsync<AuthPluginOptions> = async (fastify, options) => {
  const secret = options.jwtSecret ?? env.JWT_SECRET;
  const adminKey = options.adminKey ?? env.ADMIN_KEY;

  // Require a player token
  fastify.decorate('authenticate', async (request: FastifyRequest) => {
    const token = bearerToken(request);
    try {
      request.user = verifyToken(token, secret);
    } catch (err) {
      if (err instanceof UnauthorizedError) {
        throw err;
      }
      throw new UnauthorizedError('Invalid or expired token');
    }
  });

  // Admin routes take the shared key in x-admin-key
  fastify.decorate('requireAdmin', async (request: FastifyRequest) => {
    const header = request.headers['x-admin-key'];
    const given = Array.isArray(header) ? header[0] : header;
    if (!given) {
      throw new UnauthorizedError('Missing admin key');
    }
    if (!sameKey(given, adminKey)) {
      throw new ForbiddenError('Invalid admin key');
    }
  });
};

// Wrap with fastify-plugin to share decorators across encapsulation boundaries
export const authPlugin = fp(authPluginImpl, {
  name: 'deadzone-auth',
});

/**
 * Player id of an authenticated request. Routes must run `authenticate` first.
 */
export function currentPlayerId(request: FastifyRequest): string {
  if (!request.user) {
    throw new UnauthorizedError();
  }
  return request.user.playerId;
}
