// ============================================
// DEADZONE - Plugins Barrel Export
// ============================================

export { corsPlugin } from './cors.plugin.js';
export { websocketPlugin, type WebsocketPluginOptions } from './websocket.plugin.js';
export {
  errorHandlerPlugin,
  toErrorResponse,
  AppError,
  NotFoundError,
  ValidationError,
  UnauthorizedError,
  ForbiddenError,
  ConflictError,
  TransientStoreError,
  InvariantViolation,
} from './error-handler.plugin.js';
export { authPlugin, signToken, verifyToken, currentPlayerId, type JwtPayload, type AuthPluginOptions } from './auth.plugin.js';
export { simulationPlugin, eventAudience, type SimulationPluginOptions } from './simulation.plugin.js';
