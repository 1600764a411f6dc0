import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { serveCommand, waitForShutdown, type ServeOptions } from '../../../../src/cli/commands/serve.js';
import { InvalidArgumentsError } from '../../../../src/cli/utils/errors.js';

function createOptions(overrides: Partial<ServeOptions> = {}): ServeOptions {
  return {
    format: 'pretty',
    quiet: true,
    noColor: true,
    config: undefined,
    port: 3000,
    host: '127.0.0.1',
    noLogger: true,
    maxDepth: 100,
    validateActions: false,
    ...overrides
  };
}

describe('serveCommand', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it('should reject an invalid port before starting', async () => {
    await expect(serveCommand(createOptions({ port: 70000 }))).rejects.toThrow(
      new InvalidArgumentsError('Invalid --port: 70000')
    );
    await expect(serveCommand(createOptions({ port: Number.NaN }))).rejects.toThrow('Invalid --port: NaN');
  });

  it('should reject an invalid max depth before starting', async () => {
    await expect(serveCommand(createOptions({ maxDepth: -1 }))).rejects.toThrow('Invalid --max-depth: -1');
  });
});

describe('waitForShutdown', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it('should stop the server and drop both signal listeners', async () => {
    const sigtermBefore = process.listeners('SIGTERM');
    const sigintCount = process.listenerCount('SIGINT');
    const stop = vi.fn(() => Promise.resolve());

    const stopped = waitForShutdown({ stop });
    const added = process.listeners('SIGTERM').filter((listener) => !sigtermBefore.includes(listener));
    expect(added).toHaveLength(1);
    expect(process.listenerCount('SIGINT')).toBe(sigintCount + 1);

    added[0]?.('SIGTERM');
    await stopped;

    expect(stop).toHaveBeenCalledTimes(1);
    expect(process.listenerCount('SIGINT')).toBe(sigintCount);
    expect(process.listeners('SIGTERM')).toEqual(sigtermBefore);
  });
});
