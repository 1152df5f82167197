import { describe, it, expect } from 'vitest';
import { PmcUserDal } from '@/dal/pmc-user.dal';
import { db } from '@/db/client';
import {
  canAccessPmc,
  issueAdminToken,
  issueConnectState,
  issueGuestToken,
  resolveAdminScope,
  verifyAdminToken,
  verifyConnectState,
  verifyGuestToken,
} from '@/services/auth.service';
import { createPmc } from '../../helpers/fixtures';

const pmcUserDal = new PmcUserDal(db);

describe('tokens', () => {
  it('round-trips guest tokens', async () => {
    const token = await issueGuestToken('session-1', 'property-1');
    expect(await verifyGuestToken(token)).toEqual({ sessionId: 'session-1', propertyId: 'property-1' });
  });

  it('normalizes admin emails', async () => {
    const token = await issueAdminToken('  Host@Example.com ');
    expect(await verifyAdminToken(token)).toBe('host@example.com');
  });

  it('round-trips connect state', async () => {
    const state = await issueConnectState('pmc-1', 'host@example.com');
    expect(await verifyConnectState(state)).toEqual({ pmcId: 'pmc-1', email: 'host@example.com' });
  });

  it('does not accept a token minted for another audience', async () => {
    const guestToken = await issueGuestToken('session-1', 'property-1');
    expect(await verifyAdminToken(guestToken)).toBeNull();
    expect(await verifyConnectState(guestToken)).toBeNull();
  });

  it('rejects expired and malformed tokens', async () => {
    expect(await verifyAdminToken(await issueAdminToken('host@example.com', -60))).toBeNull();
    expect(await verifyGuestToken('not-a-token')).toBeNull();
  });
});

describe('resolveAdminScope', () => {
  it('treats configured emails as platform admins', async () => {
    const scope = await resolveAdminScope('ROOT@example.com');
    expect(scope).toEqual({
      email: 'root@example.com',
      role: 'super',
      pmcId: null,
      user: null,
      billingStatus: null,
      needsPayment: false,
    });
    expect(canAccessPmc(scope, 'any-pmc')).toBe(true);
  });

  it('scopes a PMC owner to their PMC', async () => {
    const pmc = await createPmc({ email: 'owner-scope@example.com' });
    const scope = await resolveAdminScope('owner-scope@example.com');

    expect(scope).toMatchObject({ role: 'pmc', pmcId: pmc.id, user: null, needsPayment: false });
    expect(canAccessPmc(scope, pmc.id)).toBe(true);
    expect(canAccessPmc(scope, 'other-pmc')).toBe(false);
  });

  it('scopes team members through their membership', async () => {
    const pmc = await createPmc({ billingStatus: 'pending', active: false });
    const member = await pmcUserDal.create({ pmcId: pmc.id, email: 'Staff-Scope@example.com', role: 'staff' });

    const scope = await resolveAdminScope('staff-scope@example.com');

    expect(scope).toMatchObject({
      role: 'pmc',
      pmcId: pmc.id,
      billingStatus: 'pending',
      needsPayment: true,
    });
    expect(scope.user?.id).toBe(member.id);
  });

  it('promotes superuser members', async () => {
    const pmc = await createPmc();
    await pmcUserDal.create({ pmcId: pmc.id, email: 'super-member@example.com', isSuperuser: true });
    expect((await resolveAdminScope('super-member@example.com')).role).toBe('super');
  });

  it('gives unknown emails no PMC', async () => {
    const scope = await resolveAdminScope('stranger@example.com');
    expect(scope).toMatchObject({ role: 'pmc', pmcId: null });
    expect(canAccessPmc(scope, 'any-pmc')).toBe(false);
  });

  it('ignores deactivated members', async () => {
    const pmc = await createPmc();
    await pmcUserDal.create({ pmcId: pmc.id, email: 'former@example.com', isActive: false });
    expect((await resolveAdminScope('former@example.com')).pmcId).toBeNull();
  });
});
