export { PolicyValidationServer, type ServerOptions } from './server.js';
export {
  type ServerConfig,
  type ServerConfigInput,
  type CorsConfig,
  resolveConfig,
  DEFAULT_BODY_LIMIT
} from './config.js';
export { errorHandler, type ApiError } from './middleware/error-handler.js';
export type { ValidatePolicyResponse } from './routes/policies.js';
export type { HealthResponse } from './routes/health.js';
