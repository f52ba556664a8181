// ============================================
// DEADZONE - Schema Index
// ============================================

export * from './players.js';
export * from './regions.js';
export * from './encounters.js';
export * from './pending-actions.js';
export * from './vehicles.js';
export * from './construction.js';
export * from './world.js';
