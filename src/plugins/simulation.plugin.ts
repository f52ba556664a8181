// ============================================
// DEADZONE - World Simulation Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import type { WorldEvent } from '../models/types.js';
import type { WorldEngine } from '../simulation/engine.js';
import type { TickReport } from '../simulation/world-clock.js';
import type { WorldEventBus } from '../simulation/world-state.js';

declare module 'fastify' {
  interface FastifyInstance {
    engine: WorldEngine;
  }
}

export interface SimulationPluginOptions {
  engine: WorldEngine;
  events: WorldEventBus;
  autoStart?: boolean;
}

/**
 * Who should hear about an event. Null means everyone.
 */
export function eventAudience(event: WorldEvent): string[] | null {
  switch (event.type) {
    case 'DayPhaseChanged':
    case 'ZombiesSpawned':
      return null;
    case 'RadioMessage':
      return event.recipients;
    case 'OfflineModeResolved':
      return event.targetId ? [event.playerId, event.targetId] : [event.playerId];
    case 'PlayerDown':
      return event.byPlayerId ? [event.playerId, event.byPlayerId] : [event.playerId];
    case 'PendingActionFailed':
      return [];
    default:
      return [event.playerId];
  }
}

const simulationPluginImpl: FastifyPluginAsync<SimulationPluginOptions> = async (fastify, options) => {
  const { engine, events } = options;
  fastify.decorate('engine', engine);

  // Connect world events to WebSocket clients
  const onEvent = (event: WorldEvent) => {
    const audience = eventAudience(event);
    if (audience === null) {
      fastify.broadcast(event.type, event);
    } else {
      fastify.sendToPlayers(audience, event.type, event);
    }
  };
  events.on('event', onEvent);

  engine.clock.on('tick', (report: TickReport) => {
    fastify.log.debug({ ...report }, 'world tick');
    if (report.phaseChanged) {
      fastify.log.info(`Day ${report.day}: ${report.phase} has fallen`);
    }
  });

  engine.clock.on('started', () => {
    fastify.broadcast('clock_started', {});
  });

  engine.clock.on('stopped', () => {
    fastify.broadcast('clock_stopped', {});
  });

  // Auto-start if configured
  if (options.autoStart) {
    await engine.clock.start();
  }

  // Cleanup on server close
  fastify.addHook('onClose', async () => {
    await engine.clock.stop();
    events.off('event', onEvent);
  });
};

// Wrap with fastify-plugin to share decorators across encapsulation boundaries
export const simulationPlugin = fp(simulationPluginImpl, {
  name: 'deadzone-simulation',
  dependencies: ['deadzone-websocket'],
});
