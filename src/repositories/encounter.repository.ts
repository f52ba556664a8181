// ============================================
// DEADZONE - Encounter Repository
// ============================================

import { and, desc, eq, inArray } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { encounters, type EncounterRow, type EncounterInsert } from '../db/schema/encounters.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { Encounter, EncounterState } from '../models/types.js';

export const NON_TERMINAL_STATES: readonly EncounterState[] = ['Presented', 'SneakResolved', 'AttackResolved', 'Expired'];

export type NewEncounter = Omit<Encounter, 'id' | 'state' | 'decision' | 'alerted' | 'resolvedAt' | 'summary' | 'pendingActionId'>;
export type EncounterChanges = Partial<Omit<EncounterInsert, 'id' | 'playerId'>>;

export class EncounterRepository extends BaseRepository<typeof encounters> {
  constructor(db: DrizzleDb) {
    super(db, encounters);
  }

  async createEncounter(input: NewEncounter): Promise<Encounter> {
    const id = this.generateId();
    const [row] = await this.write(() => this.db
      .insert(encounters)
      .values({ id, ...input, state: 'Presented' })
      .returning());
    return this.rowToEncounter(row);
  }

  async getEncounter(id: string): Promise<Encounter | null> {
    const results = await this.db.select().from(encounters).where(eq(encounters.id, id)).limit(1);
    return results.length > 0 ? this.rowToEncounter(results[0]) : null;
  }

  async getOpenForPlayer(playerId: string): Promise<Encounter | null> {
    const results = await this.db
      .select()
      .from(encounters)
      .where(and(eq(encounters.playerId, playerId), inArray(encounters.state, [...NON_TERMINAL_STATES])))
      .limit(1);
    return results.length > 0 ? this.rowToEncounter(results[0]) : null;
  }

  async listForPlayer(playerId: string, limit = 20): Promise<Encounter[]> {
    const results = await this.db
      .select()
      .from(encounters)
      .where(eq(encounters.playerId, playerId))
      .orderBy(desc(encounters.enteredAt))
      .limit(limit);
    return results.map(row => this.rowToEncounter(row));
  }

  /**
   * Compare-and-set on the state column. Returns the updated encounter,
   * or null when the stored state was not `from`.
   */
  async transition(id: string, from: EncounterState, changes: EncounterChanges & { state: EncounterState }): Promise<Encounter | null> {
    const results = await this.write(() => this.db
      .update(encounters)
      .set(changes)
      .where(and(eq(encounters.id, id), eq(encounters.state, from)))
      .returning());
    return results.length > 0 ? this.rowToEncounter(results[0]) : null;
  }

  async setPendingAction(id: string, pendingActionId: number | null): Promise<void> {
    await this.write(() => this.db.update(encounters).set({ pendingActionId }).where(eq(encounters.id, id)));
  }

  async deleteForPlayer(playerId: string): Promise<void> {
    await this.write(() => this.db.delete(encounters).where(eq(encounters.playerId, playerId)));
  }

  private rowToEncounter(row: EncounterRow): Encounter {
    return {
      id: row.id,
      playerId: row.playerId,
      buildingId: row.buildingId,
      floorIndex: row.floorIndex,
      enteredAt: row.enteredAt,
      difficulty: row.difficulty,
      zombie: row.zombie,
      deadline: row.deadline,
      pendingActionId: row.pendingActionId,
      state: row.state,
      decision: row.decision,
      alerted: row.alerted,
      resolvedAt: row.resolvedAt,
      summary: row.summary,
    };
  }
}
