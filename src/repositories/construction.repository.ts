// ============================================
// DEADZONE - Construction Repository
// ============================================

import { and, eq } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { constructionProjects, type ConstructionRow, type ConstructionInsert } from '../db/schema/construction.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { ConstructionProject } from '../models/types.js';

export type NewConstructionProject = Omit<ConstructionProject, 'id' | 'status' | 'pendingActionId'>;
export type ConstructionChanges = Partial<Omit<ConstructionInsert, 'id' | 'ownerId'>>;

export class ConstructionRepository extends BaseRepository<typeof constructionProjects> {
  constructor(db: DrizzleDb) {
    super(db, constructionProjects);
  }

  async createProject(input: NewConstructionProject): Promise<ConstructionProject> {
    const [row] = await this.write(() => this.db
      .insert(constructionProjects)
      .values({ id: this.generateId(), ...input })
      .returning());
    return this.rowToProject(row);
  }

  async getProject(id: string): Promise<ConstructionProject | null> {
    const results = await this.db
      .select()
      .from(constructionProjects)
      .where(eq(constructionProjects.id, id))
      .limit(1);
    return results.length > 0 ? this.rowToProject(results[0]) : null;
  }

  async listInProgressForOwner(ownerId: string): Promise<ConstructionProject[]> {
    const results = await this.db
      .select()
      .from(constructionProjects)
      .where(and(eq(constructionProjects.ownerId, ownerId), eq(constructionProjects.status, 'in_progress')))
      .orderBy(constructionProjects.dueAt);
    return results.map(row => this.rowToProject(row));
  }

  async updateProject(id: string, changes: ConstructionChanges): Promise<void> {
    if (Object.keys(changes).length === 0) return;
    await this.write(() => this.db.update(constructionProjects).set(changes).where(eq(constructionProjects.id, id)));
  }

  async cancelForOwner(ownerId: string): Promise<number> {
    const results = await this.write(() => this.db
      .update(constructionProjects)
      .set({ status: 'cancelled', pendingActionId: null })
      .where(and(eq(constructionProjects.ownerId, ownerId), eq(constructionProjects.status, 'in_progress')))
      .returning({ id: constructionProjects.id }));
    return results.length;
  }

  private rowToProject(row: ConstructionRow): ConstructionProject {
    return {
      id: row.id,
      ownerId: row.ownerId,
      regionId: row.regionId,
      structureType: row.structureType,
      workSeconds: row.workSeconds,
      startedAt: row.startedAt,
      dueAt: row.dueAt,
      status: row.status,
      pendingActionId: row.pendingActionId,
    };
  }
}
