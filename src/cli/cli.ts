/**
 * Main CLI setup using CAC.
 */

import { cac } from 'cac';
import { version } from '../version.js';
import type { CliConfig, GlobalOptions } from './types.js';
import { OUTPUT_FORMATS } from './types.js';
import { loadConfig } from './utils/config.js';
import { setOutputOptions, printError, print } from './utils/output.js';
import { getExitCode, formatError, InvalidArgumentsError } from './utils/errors.js';
import { validateCommand, type ValidateOptions } from './commands/validate.js';
import { serveCommand } from './commands/serve.js';

/** CLI instance */
const cli = cac('policy-validator');

/**
 * Promise of the running async action.
 * CAC does not await async action handlers, so run() does it.
 */
let _actionPromise: Promise<void> | undefined;

/** Wraps an async action handler so run() can await its promise. */
function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => void {
  return (...args: T) => {
    _actionPromise = fn(...args);
  };
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  return String(value);
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

/** Resolves global options against the config file */
function processGlobalOptions(options: Record<string, unknown>): { global: GlobalOptions; config: CliConfig } {
  const configPath = stringOption(options, 'config');
  const config = loadConfig(configPath);

  const formatOption = stringOption(options, 'format');
  const format = OUTPUT_FORMATS.find((f) => f === formatOption) ?? config.output.format;
  if (formatOption !== undefined && format !== formatOption) {
    throw new InvalidArgumentsError(
      `Invalid format: ${formatOption}. Valid formats: ${OUTPUT_FORMATS.join(', ')}`
    );
  }

  const quiet = booleanOption(options, 'quiet') ?? false;
  // cac turns --no-color into color: false
  const noColor = options['color'] === false || !config.output.colors;

  setOutputOptions({ format, quiet, noColor });

  return {
    global: { format, quiet, noColor, config: configPath },
    config
  };
}

function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: json, table, pretty')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config file');
}

function registerVersionCommand(): void {
  cli.command('version', 'Show version information').action(() => {
    print(`policy-validator v${version}`);
  });
}

function registerValidateCommand(): void {
  cli
    .command('validate [...files]', 'Validate policy documents (YAML or JSON)')
    .option('--max-depth <depth>', 'Maximum pattern nesting depth')
    .option('--strict-actions', 'Also validate mutate patches and generate sources')
    .action(tracked(async (files: string[], options: Record<string, unknown>) => {
      try {
        const { global, config } = processGlobalOptions(options);
        const maxDepth = stringOption(options, 'maxDepth');
        const validateOptions: ValidateOptions = {
          ...global,
          maxDepth: maxDepth !== undefined ? Number(maxDepth) : config.validation.maxDepth,
          validateActions: booleanOption(options, 'strictActions') ?? config.validation.validateActions
        };
        await validateCommand(files, validateOptions);
      } catch (err) {
        printError(formatError(err));
        process.exitCode = getExitCode(err);
      }
    }));
}

function registerServeCommand(): void {
  cli
    .command('serve', 'Start the HTTP validation API')
    .option('-p, --port <port>', 'Listening port', { default: 3000 })
    .option('-H, --host <host>', 'Host address', { default: '0.0.0.0' })
    .option('--no-logger', 'Disable request logging')
    .option('--max-depth <depth>', 'Maximum pattern nesting depth')
    .option('--strict-actions', 'Also validate mutate patches and generate sources')
    .action(tracked(async (options: Record<string, unknown>) => {
      try {
        const { global, config } = processGlobalOptions(options);
        const maxDepth = stringOption(options, 'maxDepth');
        await serveCommand({
          ...global,
          port: Number(options['port']),
          host: stringOption(options, 'host') ?? '0.0.0.0',
          noLogger: options['logger'] === false,
          maxDepth: maxDepth !== undefined ? Number(maxDepth) : config.validation.maxDepth,
          validateActions: booleanOption(options, 'strictActions') ?? config.validation.validateActions
        });
      } catch (err) {
        printError(formatError(err));
        process.exitCode = getExitCode(err);
      }
    }));
}

/** Initializes and runs the CLI */
export async function run(args: string[] = process.argv): Promise<void> {
  registerGlobalOptions();
  registerVersionCommand();
  registerValidateCommand();
  registerServeCommand();

  cli.help();
  cli.version(version);

  try {
    cli.parse(args);
    if (_actionPromise) {
      await _actionPromise;
    }
  } catch (err) {
    printError(formatError(err));
    process.exitCode = getExitCode(err);
  }
}

export { cli };
