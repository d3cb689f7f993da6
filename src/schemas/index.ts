// ============================================
// VALLEY ECONOMY - Schemas Barrel Export
// ============================================

export * from './common.schema.js';
export * from './config.schema.js';
export * from './simulation.schema.js';
export * from './investments.schema.js';
export * from './lots.schema.js';
export * from './websocket.schema.js';
