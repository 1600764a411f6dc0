import Fastify, { type FastifyInstance, type InjectOptions, type LightMyRequestResponse } from 'fastify';
import cors from '@fastify/cors';
import {
  resolveConfig,
  resolveCorsConfig,
  type ServerConfig,
  type ServerConfigInput
} from './config.js';
import { errorHandler } from './middleware/error-handler.js';
import { registerOrderedJsonParser } from './middleware/ordered-json.js';
import { registerRoutes } from './routes/index.js';

export interface ServerOptions {
  /** HTTP server configuration */
  server?: ServerConfigInput;
}

/**
 * HTTP front end for the policy validator.
 *
 * `create` builds a ready instance without binding a socket, which is what
 * tests drive through `inject`; `start` also listens.
 */
export class PolicyValidationServer {
  private readonly fastify: FastifyInstance;
  private readonly config: ServerConfig;
  private listening = false;

  private constructor(fastify: FastifyInstance, config: ServerConfig) {
    this.fastify = fastify;
    this.config = config;
  }

  static async create(options: ServerOptions = {}): Promise<PolicyValidationServer> {
    const config = resolveConfig(options.server);

    const fastify = Fastify({
      logger: config.logger,
      bodyLimit: config.bodyLimit,
      ajv: {
        customOptions: {
          coerceTypes: false,
          removeAdditional: false,
          useDefaults: true,
          allErrors: true
        }
      },
      ...config.fastifyOptions
    });

    fastify.setErrorHandler(errorHandler);
    registerOrderedJsonParser(fastify);

    const corsConfig = resolveCorsConfig(config.cors);
    if (corsConfig !== false) {
      await fastify.register(cors, {
        origin: corsConfig.origin,
        methods: corsConfig.methods,
        allowedHeaders: corsConfig.allowedHeaders,
        exposedHeaders: corsConfig.exposedHeaders,
        credentials: corsConfig.credentials,
        maxAge: corsConfig.maxAge,
        preflightContinue: corsConfig.preflightContinue,
        optionsSuccessStatus: corsConfig.optionsSuccessStatus
      });
    }

    await fastify.register(
      async (instance) => {
        await registerRoutes(instance, { validation: config.validation });
      },
      { prefix: config.apiPrefix }
    );

    await fastify.ready();

    return new PolicyValidationServer(fastify, config);
  }

  static async start(options: ServerOptions = {}): Promise<PolicyValidationServer> {
    const server = await PolicyValidationServer.create(options);
    await server.fastify.listen({ port: server.config.port, host: server.config.host });
    server.listening = true;
    return server;
  }

  /** Dispatches a request in process, without a socket. */
  inject(options: InjectOptions): Promise<LightMyRequestResponse> {
    return this.fastify.inject(options);
  }

  get address(): string {
    const addr = this.fastify.server.address();
    if (typeof addr === 'string') {
      return addr;
    }
    if (addr) {
      return `http://${addr.address === '::' ? 'localhost' : addr.address}:${addr.port}`;
    }
    return '';
  }

  get port(): number {
    return this.config.port;
  }

  get isListening(): boolean {
    return this.listening;
  }

  get apiPrefix(): string {
    return this.config.apiPrefix;
  }

  async stop(): Promise<void> {
    await this.fastify.close();
    this.listening = false;
  }
}
