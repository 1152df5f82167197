import { describe, it, expect, vi } from 'vitest';
import { EventsDal } from '@/dal/events.dal';
import { db } from '@/db/client';
import { logEvent, logSpan } from '@/services/telemetry.service';
import { createPmc } from '../../helpers/fixtures';

const eventsDal = new EventsDal(db);

// DAL and service together against the in-memory database, no mocks.
describe('telemetry.service', () => {
  it('writes an event and returns its id', async () => {
    const id = await logEvent({ type: 'test.event', payload: { foo: 'bar' } });

    const [event] = await eventsDal.findByType('test.event');
    expect(event?.id).toBe(id);
    expect(event?.pmcId).toBeNull();
    expect(JSON.parse(event?.payload ?? 'null')).toEqual({ foo: 'bar' });
  });

  it('stores the PMC and entity of an event', async () => {
    const pmc = await createPmc();
    await logEvent({ pmcId: pmc.id, type: 'test.tenant_event', entityType: 'property', entityId: 'prop-1' });

    const events = await eventsDal.findByPmc(pmc.id);
    expect(events.map((e) => [e.type, e.entityType, e.entityId])).toEqual([['test.tenant_event', 'property', 'prop-1']]);
  });

  it('records spans under the request id', async () => {
    await logSpan('syncPmc', 42, { requestId: 'req-telemetry-1' });

    const events = await eventsDal.findByRequestId('req-telemetry-1');
    expect(events.map((e) => ({ type: e.type, span: e.span, durationMs: e.durationMs }))).toEqual([
      { type: 'service.span', span: 'syncPmc', durationMs: 42 },
    ]);
  });

  it('returns null instead of throwing when the write fails', async () => {
    const create = vi.spyOn(EventsDal.prototype, 'create').mockRejectedValueOnce(new Error('disk full'));

    expect(await logEvent({ type: 'test.orphan' })).toBeNull();
    create.mockRestore();
  });
});
