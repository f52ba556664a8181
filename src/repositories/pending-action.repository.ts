// ============================================
// DEADZONE - Pending Action Repository
// ============================================

import { and, asc, eq, lte } from 'drizzle-orm';
import { z } from 'zod';
import { BaseRepository } from './base.repository.js';
import { pendingActions, type PendingActionRow } from '../db/schema/pending-actions.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { PendingAction, PendingActionOwner, PendingActionPayload } from '../models/types.js';
import { InvariantViolation } from '../plugins/error-handler.plugin.js';

const payloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('DecisionExpiry'), encounterId: z.string() }),
  z.object({ kind: z.literal('OfflineResolution'), mode: z.enum(['ambush', 'scavenge']), modeSetAt: z.number() }),
  z.object({ kind: z.literal('ConstructionComplete'), projectId: z.string() }),
  z.object({
    kind: z.literal('VehicleArrival'),
    vehicleId: z.string(),
    destinationRegionId: z.string(),
    driverId: z.string(),
  }),
]);

export interface EnqueueInput<P extends PendingActionPayload = PendingActionPayload> {
  ownerType: PendingActionOwner;
  ownerId: string;
  dueAt: number;
  createdAt: number;
  payload: P;
}

export class PendingActionRepository extends BaseRepository<typeof pendingActions> {
  constructor(db: DrizzleDb) {
    super(db, pendingActions);
  }

  async insert<P extends PendingActionPayload>(input: EnqueueInput<P>): Promise<PendingAction<P>> {
    const [row] = await this.write(() => this.db
      .insert(pendingActions)
      .values({
        kind: input.payload.kind,
        ownerType: input.ownerType,
        ownerId: input.ownerId,
        dueAt: input.dueAt,
        createdAt: input.createdAt,
        payload: JSON.stringify(input.payload),
      })
      .returning({ id: pendingActions.id }));

    return {
      id: row.id,
      kind: input.payload.kind,
      ownerType: input.ownerType,
      ownerId: input.ownerId,
      dueAt: input.dueAt,
      createdAt: input.createdAt,
      payload: input.payload,
    };
  }

  async getAction(id: number): Promise<PendingAction | null> {
    const results = await this.db.select().from(pendingActions).where(eq(pendingActions.id, id)).limit(1);
    return results.length > 0 ? this.rowToAction(results[0]) : null;
  }

  /**
   * Due rows in drain order: ascending due time, then insertion order.
   * Rows stay raw so one malformed payload cannot block the rest.
   */
  async listDue(now: number): Promise<PendingActionRow[]> {
    return this.db
      .select()
      .from(pendingActions)
      .where(lte(pendingActions.dueAt, now))
      .orderBy(asc(pendingActions.dueAt), asc(pendingActions.id));
  }

  async listAll(): Promise<PendingActionRow[]> {
    return this.db
      .select()
      .from(pendingActions)
      .orderBy(asc(pendingActions.dueAt), asc(pendingActions.id));
  }

  async listForOwner(ownerType: PendingActionOwner, ownerId: string): Promise<PendingAction[]> {
    const results = await this.db
      .select()
      .from(pendingActions)
      .where(and(eq(pendingActions.ownerType, ownerType), eq(pendingActions.ownerId, ownerId)))
      .orderBy(asc(pendingActions.dueAt), asc(pendingActions.id));
    return results.map(row => this.rowToAction(row));
  }

  /**
   * Atomically delete and return the action. Null when it was already
   * claimed or cancelled.
   */
  async take(id: number): Promise<PendingActionRow | null> {
    const results = await this.write(() => this.db
      .delete(pendingActions)
      .where(eq(pendingActions.id, id))
      .returning());
    return results[0] ?? null;
  }

  async deleteForOwner(ownerType: PendingActionOwner, ownerId: string): Promise<number> {
    const results = await this.write(() => this.db
      .delete(pendingActions)
      .where(and(eq(pendingActions.ownerType, ownerType), eq(pendingActions.ownerId, ownerId)))
      .returning({ id: pendingActions.id }));
    return results.length;
  }

  rowToAction(row: PendingActionRow): PendingAction {
    const parsed = payloadSchema.safeParse(JSON.parse(row.payload));
    if (!parsed.success || parsed.data.kind !== row.kind) {
      throw new InvariantViolation(`Pending action ${row.id} has a malformed ${row.kind} payload`);
    }
    return {
      id: row.id,
      kind: parsed.data.kind,
      ownerType: row.ownerType,
      ownerId: row.ownerId,
      dueAt: row.dueAt,
      createdAt: row.createdAt,
      payload: parsed.data,
    };
  }
}
