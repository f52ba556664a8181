// ============================================
// DEADZONE - Construction Simulator
// ============================================

import { MIN_DANGER_LEVEL, NOISE, STRUCTURES, scaledMs } from '../config/game.js';
import type { ConstructionProject, PendingAction, StructureType, Vehicle } from '../models/types.js';
import {
  ConflictError,
  ForbiddenError,
  InvariantViolation,
  NotFoundError,
  ValidationError,
} from '../plugins/error-handler.plugin.js';
import { playerLock, regionLock, type LockKey } from './locks.js';
import type { PendingActionQueue } from './pending-action.queue.js';
import type { WorldState } from './world-state.js';

export interface ConstructionResult {
  project: ConstructionProject;
  vehicle: Vehicle | null;
}

export class ConstructionSimulator {
  constructor(
    private world: WorldState,
    private queue: PendingActionQueue
  ) {}

  /**
   * Start building in the player's current region. Resources are consumed up
   * front; one project per player at a time. Caller holds the player and
   * region locks.
   */
  async startProject(playerId: string, structureType: StructureType): Promise<ConstructionProject> {
    const { repos, config } = this.world;
    const spec = STRUCTURES[structureType];

    const player = await repos.players.getPlayer(playerId);
    if (!player) {
      throw new NotFoundError('Player', playerId);
    }
    if (player.stats.intelligence < spec.intelligenceRequired) {
      throw new ForbiddenError(
        `${spec.name} needs intelligence ${spec.intelligenceRequired} (you have ${player.stats.intelligence})`
      );
    }

    const running = await repos.construction.listInProgressForOwner(playerId);
    if (running.length > 0) {
      throw new ConflictError('You are already building something', 'CONSTRUCTION_IN_PROGRESS');
    }

    const missing = await repos.players.removeItems(playerId, spec.resources);
    if (Object.keys(missing).length > 0) {
      throw new ValidationError(`Not enough resources for ${spec.name}`, { missing });
    }

    const now = this.world.now();
    const workSeconds = spec.durationDays * config.dayLengthSeconds;
    const dueAt = now + scaledMs(config, workSeconds);
    const regionId = player.position.regionId;

    const project = await repos.construction.createProject({
      ownerId: playerId,
      regionId,
      structureType,
      workSeconds,
      startedAt: now,
      dueAt,
    });
    const action = await this.queue.schedule({ type: 'player', id: playerId }, dueAt, {
      kind: 'ConstructionComplete',
      projectId: project.id,
    });
    await repos.construction.updateProject(project.id, { pendingActionId: action.id });
    await repos.regions.addNoise(regionId, NOISE.BUILD);

    this.world.logger.info({ playerId, projectId: project.id, structureType, dueAt }, 'construction started');
    return { ...project, pendingActionId: action.id };
  }

  async lockKeys(action: PendingAction): Promise<LockKey[]> {
    const keys = [playerLock(action.ownerId)];
    if (action.payload.kind === 'ConstructionComplete') {
      const project = await this.world.repos.construction.getProject(action.payload.projectId);
      if (project) keys.push(regionLock(project.regionId));
    }
    return keys;
  }

  /**
   * ConstructionComplete resolver.
   */
  async complete(action: PendingAction): Promise<ConstructionResult | null> {
    if (action.payload.kind !== 'ConstructionComplete') {
      throw new InvariantViolation(`Construction cannot resolve ${action.payload.kind}`);
    }
    const { repos } = this.world;

    const project = await repos.construction.getProject(action.payload.projectId);
    if (!project || project.status !== 'in_progress') return null;

    const spec = STRUCTURES[project.structureType];
    let vehicle: Vehicle | null = null;

    if (spec.vehicle) {
      vehicle = await repos.vehicles.createVehicle(project.ownerId, spec.vehicle, project.regionId);
    } else {
      const region = await repos.regions.getRegion(project.regionId);
      if (!region) {
        throw new InvariantViolation(`Project ${project.id} is in missing region ${project.regionId}`);
      }
      await repos.regions.updateRegion(region.id, {
        structures: [...region.structures, project.structureType],
        dangerLevel: Math.max(MIN_DANGER_LEVEL, region.dangerLevel + spec.dangerDelta),
        pressureDirty: true,
      });
    }

    await repos.construction.updateProject(project.id, { status: 'completed', pendingActionId: null });

    this.world.logger.info({ projectId: project.id, structureType: project.structureType }, 'construction completed');
    this.world.events.publish({
      type: 'ConstructionCompleted',
      playerId: project.ownerId,
      projectId: project.id,
      structureType: project.structureType,
      regionId: project.regionId,
    });

    return { project: { ...project, status: 'completed', pendingActionId: null }, vehicle };
  }

  async hasStructureAnywhere(structureType: StructureType): Promise<boolean> {
    const regions = await this.world.repos.regions.listRegions();
    return regions.some(region => region.structures.includes(structureType));
  }
}
