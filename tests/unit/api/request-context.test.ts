import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '@/app';
import { EventsDal } from '@/dal/events.dal';
import { db } from '@/db/client';
import { issueAdminToken } from '@/services/auth.service';

const eventsDal = new EventsDal(db);

describe('request-context middleware', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = buildApp();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('generates a request id and returns it in a header', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('uses the x-request-id header when provided', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { 'x-request-id': 'test-req-123' },
    });
    expect(res.headers['x-request-id']).toBe('test-req-123');

    const events = await eventsDal.findByRequestId('test-req-123');
    expect(events.map((e) => e.type)).toEqual(['api.request.start', 'api.request.end']);
    expect(JSON.parse(events[1]?.payload ?? '{}')).toEqual({ route: '/health', method: 'GET', statusCode: 200 });
  });

  it('tags request events with the pmcId route param', async () => {
    const token = await issueAdminToken('root@example.com');
    await app.inject({
      method: 'GET',
      url: '/admin/pmcs/pmc-ctx-1/properties',
      headers: { authorization: `Bearer ${token}`, 'x-request-id': 'test-req-456' },
    });

    const events = await eventsDal.findByRequestId('test-req-456');
    expect(events.map((e) => e.pmcId)).toEqual(['pmc-ctx-1', 'pmc-ctx-1']);
  });
});
