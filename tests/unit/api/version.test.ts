import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { buildApp } from '../../../src/app';
import type { FastifyInstance } from 'fastify';

describe('GET /version', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = buildApp();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('returns the package version, environment and integrations mode', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/version',
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      name: 'stayhost-concierge',
      version: '0.1.0',
      environment: 'test',
      integrations: 'stub',
    });
  });
});
