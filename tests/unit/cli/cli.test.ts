import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolve } from 'node:path';

const fixturesDir = resolve(__dirname, '../../fixtures');
const configPath = resolve(fixturesDir, 'cli/config.json');

async function runCli(...args: string[]): Promise<void> {
  vi.resetModules();
  const { run } = await import('../../../src/cli/cli.js');
  await run(['node', 'policy-validator', ...args]);
}

function policyFile(name: string): string {
  return resolve(fixturesDir, 'policies', name);
}

describe('CLI', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    process.exitCode = undefined;
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.exitCode = undefined;
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should print the version', async () => {
    await runCli('version');
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringMatching(/^policy-validator v\d+\.\d+\.\d+/));
  });

  it('should exit cleanly for valid files', async () => {
    await runCli('validate', policyFile('valid.yaml'), policyFile('valid.json'), '-c', configPath);
    expect(process.exitCode).toBeUndefined();
    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('should exit with 3 and list issues for invalid files', async () => {
    await runCli('validate', policyFile('invalid.yaml'), '-c', configPath);
    expect(process.exitCode).toBe(3);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^Validation failed with 4 error\(s\)\n  ✗ rule 'containers' validate.pattern/)
    );
  });

  it('should print JSON with --format json', async () => {
    await runCli('validate', policyFile('invalid.yaml'), '--format', 'json', '-c', configPath);
    const output = consoleLogSpy.mock.calls[0]?.[0];
    expect(JSON.parse(String(output))).toMatchObject({ success: false, validation: { errorCount: 4 } });
  });

  it('should stay quiet with --quiet', async () => {
    await runCli('validate', policyFile('valid.yaml'), '--quiet', '-c', configPath);
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it('should exit with 2 without files', async () => {
    await runCli('validate', '-c', configPath);
    expect(process.exitCode).toBe(2);
    expect(consoleErrorSpy).toHaveBeenCalledWith('At least one policy file is required');
  });

  it('should exit with 2 for an unknown format', async () => {
    await runCli('validate', policyFile('valid.yaml'), '-f', 'xml', '-c', configPath);
    expect(process.exitCode).toBe(2);
    expect(consoleErrorSpy).toHaveBeenCalledWith('Invalid format: xml. Valid formats: json, table, pretty');
  });

  it('should exit with 4 for a missing file', async () => {
    await runCli('validate', policyFile('absent.yaml'), '-c', configPath);
    expect(process.exitCode).toBe(4);
  });

  it('should enable action checks with --strict-actions', async () => {
    await runCli('validate', policyFile('actions.yaml'), '-c', configPath);
    expect(process.exitCode).toBeUndefined();

    await runCli('validate', policyFile('actions.yaml'), '--strict-actions', '-c', configPath);
    expect(process.exitCode).toBe(3);
  });

  it('should take action checks from the config file', async () => {
    await runCli('validate', policyFile('actions.yaml'), '-c', resolve(fixturesDir, 'cli/strict-config.json'));
    expect(process.exitCode).toBe(3);
  });

  it('should pass --max-depth to the loader', async () => {
    await runCli('validate', policyFile('valid.yaml'), '--max-depth', '3', '-c', configPath);
    expect(process.exitCode).toBe(3);
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('pattern exceeds maximum depth of 3'));
  });
});
