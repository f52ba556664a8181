// ============================================
// DEADZONE - World Meta Repository
// ============================================

import { eq, sql } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { worldMeta } from '../db/schema/world.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { DayPhase, WorldMeta } from '../models/types.js';
import { InvariantViolation } from '../plugins/error-handler.plugin.js';

const META_ID = 1;

export class WorldRepository extends BaseRepository<typeof worldMeta> {
  constructor(db: DrizzleDb) {
    super(db, worldMeta);
  }

  async getMeta(): Promise<WorldMeta> {
    const results = await this.db.select().from(worldMeta).where(eq(worldMeta.id, META_ID)).limit(1);
    if (results.length === 0) {
      throw new InvariantViolation('World has not been seeded');
    }
    const row = results[0];
    return { epoch: row.epoch, tick: row.tick, phase: row.phase, paused: row.paused };
  }

  async incrementTick(): Promise<number> {
    const [row] = await this.write(() => this.db
      .update(worldMeta)
      .set({ tick: sql`${worldMeta.tick} + 1` })
      .where(eq(worldMeta.id, META_ID))
      .returning({ tick: worldMeta.tick }));
    if (!row) {
      throw new InvariantViolation('World has not been seeded');
    }
    return row.tick;
  }

  async setPhase(phase: DayPhase): Promise<void> {
    await this.write(() => this.db.update(worldMeta).set({ phase }).where(eq(worldMeta.id, META_ID)));
  }

  async setPaused(paused: boolean): Promise<void> {
    await this.write(() => this.db.update(worldMeta).set({ paused }).where(eq(worldMeta.id, META_ID)));
  }

  async restart(epoch: number): Promise<void> {
    await this.write(() => this.db
      .update(worldMeta)
      .set({ epoch, tick: 0, phase: 'day', paused: false })
      .where(eq(worldMeta.id, META_ID)));
  }
}
