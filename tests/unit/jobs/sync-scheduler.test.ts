import { describe, it, expect } from 'vitest';
import { runSyncTick } from '@/jobs/sync-scheduler';
import { connectHostaway, createPmc, useStubIntegrations } from '../../helpers/fixtures';

describe('runSyncTick', () => {
  it('syncs every active PMC and skips overlapping ticks', async () => {
    const stubs = useStubIntegrations();
    const connected = await createPmc();
    await connectHostaway(connected.id);
    const unconnected = await createPmc();
    await createPmc({ active: false });
    stubs.pms.setListings([]);

    const tick = runSyncTick(new Date('2026-07-01T00:00:00Z'));
    const overlapping = runSyncTick(new Date('2026-07-01T00:00:00Z'));

    expect(await overlapping).toBeNull();
    const outcomes = await tick;
    const byPmc = Object.fromEntries((outcomes ?? []).map((o) => [o.pmcId, o.result.success]));
    expect(byPmc).toEqual({ [connected.id]: true, [unconnected.id]: false });

    // Once finished, the next tick runs again.
    expect(await runSyncTick()).toHaveLength(2);
  });
});
