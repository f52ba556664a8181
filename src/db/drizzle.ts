// ============================================
// DEADZONE - Drizzle Instance
// ============================================

import { getDatabase, openDatabase, closeDatabaseConnection } from '../config/database.js';
import type { DrizzleDb, DatabaseHandle } from '../config/database.js';

export { getDatabase, openDatabase, closeDatabaseConnection };
export type { DrizzleDb, DatabaseHandle };

// Re-export schema for convenience
export * as schema from './schema/index.js';
