import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { PolicyValidationServer } from '../../../../src/api/server.js';
import { version } from '../../../../src/version.js';

describe('Health API', () => {
  let server: PolicyValidationServer;

  beforeAll(async () => {
    server = await PolicyValidationServer.create({ server: { logger: false } });
  });

  afterAll(async () => {
    await server.stop();
  });

  it('returns status, uptime and version', async () => {
    const before = Date.now();
    const response = await server.inject({ method: 'GET', url: '/api/v1/health' });
    const body: unknown = response.json();

    expect(response.statusCode).toBe(200);
    expect(body).toEqual({
      status: 'ok',
      timestamp: expect.any(Number),
      uptime: expect.any(Number),
      version
    });
    expect(response.json<{ timestamp: number }>().timestamp).toBeGreaterThanOrEqual(before);
  });
});
