// ============================================
// DEADZONE - Pending Action Queue
// ============================================

import type { PendingAction, PendingActionOwner, PendingActionPayload } from '../models/types.js';
import type { PendingActionRow } from '../db/schema/pending-actions.js';
import type { WorldState } from './world-state.js';

export interface ActionOwner {
  type: PendingActionOwner;
  id: string;
}

/**
 * Durable store of every future event. Nothing in the engine keeps an
 * in-memory timer; the world clock drains this queue.
 */
export class PendingActionQueue {
  constructor(private world: WorldState) {}

  async schedule<P extends PendingActionPayload>(owner: ActionOwner, dueAt: number, payload: P): Promise<PendingAction<P>> {
    const action = await this.world.repos.pendingActions.insert({
      ownerType: owner.type,
      ownerId: owner.id,
      dueAt,
      createdAt: this.world.now(),
      payload,
    });
    this.world.logger.debug({ actionId: action.id, kind: action.kind, ownerId: owner.id, dueAt }, 'pending action scheduled');
    return action;
  }

  /**
   * Remove a scheduled action. Cancelling an action that already ran
   * (or never existed) is a no-op and returns false.
   */
  async cancel(id: number | null | undefined): Promise<boolean> {
    if (id === null || id === undefined) return false;
    const removed = await this.world.repos.pendingActions.take(id);
    if (removed) {
      this.world.logger.debug({ actionId: id, kind: removed.kind }, 'pending action cancelled');
    }
    return removed !== null;
  }

  async cancelForOwner(owner: ActionOwner): Promise<number> {
    return this.world.repos.pendingActions.deleteForOwner(owner.type, owner.id);
  }

  /**
   * Atomically remove the action and hand it to the caller. Null means a
   * command cancelled it first. A malformed payload throws, and the row
   * is gone either way.
   */
  async claim(id: number): Promise<PendingAction | null> {
    const row = await this.world.repos.pendingActions.take(id);
    return row ? this.world.repos.pendingActions.rowToAction(row) : null;
  }

  parse(row: PendingActionRow): PendingAction {
    return this.world.repos.pendingActions.rowToAction(row);
  }

  async due(now: number): Promise<PendingActionRow[]> {
    return this.world.repos.pendingActions.listDue(now);
  }

  async list(): Promise<PendingActionRow[]> {
    return this.world.repos.pendingActions.listAll();
  }

  async size(): Promise<number> {
    return this.world.repos.pendingActions.count();
  }
}
