// ============================================
// VALLEY ECONOMY - Plugins Barrel Export
// ============================================

export { corsPlugin } from './cors.plugin.js';
export { websocketPlugin } from './websocket.plugin.js';
export { errorHandlerPlugin, AppError, NotFoundError, ValidationError, ConflictError, InsufficientFundsError, ConfigValidationError } from './error-handler.plugin.js';
export { simulationPlugin, type SimulationPluginOptions } from './simulation.plugin.js';
