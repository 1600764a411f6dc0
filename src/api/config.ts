import type { FastifyServerOptions } from 'fastify';
import type { ValidatorOptions } from '../validation/policy-validator.js';

/**
 * CORS configuration for the API server.
 *
 * Supports the standard CORS headers:
 * - Access-Control-Allow-Origin
 * - Access-Control-Allow-Methods
 * - Access-Control-Allow-Headers
 * - Access-Control-Allow-Credentials
 * - Access-Control-Expose-Headers
 * - Access-Control-Max-Age
 */
export interface CorsConfig {
  /**
   * Allowed origins.
   *
   * - `true` - allow every origin (Access-Control-Allow-Origin: *)
   * - `false` - CORS disabled
   * - `string` - a single origin (e.g. 'https://example.com')
   * - `string[]` - a list of origins
   * - `RegExp` - a pattern matched against the origin
   * - `(origin: string | undefined) => boolean` - decided per request
   *
   * Default: true
   */
  origin?: boolean | string | string[] | RegExp | ((origin: string | undefined) => boolean);

  /** Default: ['GET', 'HEAD', 'POST'] */
  methods?: string[];

  /** Default: ['Content-Type', 'Authorization', 'X-Requested-With'] */
  allowedHeaders?: string[];

  /** Default: ['X-Request-Id'] */
  exposedHeaders?: string[];

  /**
   * Allow credentials (cookies, authorization headers).
   *
   * When true, origin must not be '*'.
   * Default: false
   */
  credentials?: boolean;

  /** Preflight cache lifetime in seconds. Default: 86400 */
  maxAge?: number;

  /** Default: false */
  preflightContinue?: boolean;

  /** Default: 204 */
  optionsSuccessStatus?: number;
}

export interface ServerConfig {
  /** Listening port (default: 3000) */
  port: number;

  /** Host address (default: '0.0.0.0') */
  host: string;

  /** Prefix for API endpoints (default: '/api/v1') */
  apiPrefix: string;

  /**
   * CORS configuration.
   *
   * - `true` - enable CORS with the defaults
   * - `false` - disable CORS
   * - `CorsConfig` - detailed configuration
   *
   * Default: true
   */
  cors: boolean | CorsConfig;

  /** Enable request logging (default: true) */
  logger: boolean;

  /** Maximum request body size in bytes (default: 1 MiB) */
  bodyLimit: number;

  /** Validator defaults; `strictActions` on a request overrides `validateActions`. */
  validation: ValidatorOptions;

  /** Extra Fastify options */
  fastifyOptions: Omit<FastifyServerOptions, 'logger' | 'bodyLimit'> | undefined;
}

export type ServerConfigInput = Partial<ServerConfig>;

export const DEFAULT_BODY_LIMIT = 1024 * 1024;

const DEFAULT_CORS_CONFIG: Required<CorsConfig> = {
  origin: true,
  methods: ['GET', 'HEAD', 'POST'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
  exposedHeaders: ['X-Request-Id'],
  credentials: false,
  maxAge: 86400,
  preflightContinue: false,
  optionsSuccessStatus: 204
};

/**
 * Resolves the CORS configuration into the shape @fastify/cors takes.
 */
export function resolveCorsConfig(
  input: boolean | CorsConfig | undefined
): false | Required<CorsConfig> {
  if (input === false) {
    return false;
  }

  if (input === true || input === undefined) {
    return { ...DEFAULT_CORS_CONFIG };
  }

  return {
    origin: input.origin ?? DEFAULT_CORS_CONFIG.origin,
    methods: input.methods ?? DEFAULT_CORS_CONFIG.methods,
    allowedHeaders: input.allowedHeaders ?? DEFAULT_CORS_CONFIG.allowedHeaders,
    exposedHeaders: input.exposedHeaders ?? DEFAULT_CORS_CONFIG.exposedHeaders,
    credentials: input.credentials ?? DEFAULT_CORS_CONFIG.credentials,
    maxAge: input.maxAge ?? DEFAULT_CORS_CONFIG.maxAge,
    preflightContinue: input.preflightContinue ?? DEFAULT_CORS_CONFIG.preflightContinue,
    optionsSuccessStatus: input.optionsSuccessStatus ?? DEFAULT_CORS_CONFIG.optionsSuccessStatus
  };
}

export function resolveConfig(input: ServerConfigInput = {}): ServerConfig {
  return {
    port: input.port ?? 3000,
    host: input.host ?? '0.0.0.0',
    apiPrefix: input.apiPrefix ?? '/api/v1',
    cors: input.cors ?? true,
    logger: input.logger ?? true,
    bodyLimit: input.bodyLimit ?? DEFAULT_BODY_LIMIT,
    validation: input.validation ?? {},
    fastifyOptions: input.fastifyOptions
  };
}
