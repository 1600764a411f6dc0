/**
 * The `serve` command: runs the HTTP validation API.
 */

import type { GlobalOptions } from '../types.js';
import { PolicyValidationServer } from '../../api/server.js';
import { print, colorize, success, info } from '../utils/output.js';
import { InvalidArgumentsError } from '../utils/errors.js';

export interface ServeOptions extends GlobalOptions {
  port: number;
  host: string;
  noLogger: boolean;
  maxDepth: number;
  validateActions: boolean;
}

/**
 * Starts the server and keeps the process running until SIGINT or SIGTERM.
 */
export async function serveCommand(options: ServeOptions): Promise<void> {
  const { port, host, noLogger } = options;

  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentsError(`Invalid --port: ${port}`);
  }

  if (!Number.isInteger(options.maxDepth) || options.maxDepth < 1) {
    throw new InvalidArgumentsError(`Invalid --max-depth: ${options.maxDepth}`);
  }

  print(info(`Starting server on ${host}:${port}...`));

  const server = await PolicyValidationServer.start({
    server: {
      port,
      host,
      logger: !noLogger,
      validation: {
        maxDepth: options.maxDepth,
        validateActions: options.validateActions
      }
    }
  });

  print(success(`Server running at ${colorize(server.address, 'cyan')}`));
  print(colorize('Press Ctrl+C to stop', 'dim'));

  await waitForShutdown(server);
}

/**
 * Resolves once the server has stopped after SIGINT or SIGTERM. Both signal
 * listeners are removed as soon as either signal arrives.
 */
export function waitForShutdown(server: Pick<PolicyValidationServer, 'stop'>): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onSigint = (): void => shutdown('SIGINT');
    const onSigterm = (): void => shutdown('SIGTERM');

    function shutdown(signal: NodeJS.Signals): void {
      process.off('SIGINT', onSigint);
      process.off('SIGTERM', onSigterm);
      print(info(`Received ${signal}, shutting down...`));
      server.stop().then(() => {
        print(success('Server stopped'));
        resolve();
      }, reject);
    }

    process.once('SIGINT', onSigint);
    process.once('SIGTERM', onSigterm);
  });
}
