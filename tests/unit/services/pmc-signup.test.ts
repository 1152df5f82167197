import { describe, it, expect } from 'vitest';
import { PmcUserDal } from '@/dal/pmc-user.dal';
import { db } from '@/db/client';
import { resolveAdminScope } from '@/services/auth.service';
import { signUpPmc } from '@/services/pmc-signup.service';
import { createPmc } from '../../helpers/fixtures';

const pmcUserDal = new PmcUserDal(db);

describe('signUpPmc', () => {
  it('creates a pending PMC with the admin as owner', async () => {
    const result = await signUpPmc(await resolveAdminScope('Lee@Example.com'), {
      pmcName: 'Harborline Rentals',
      adminName: ' Lee Park ',
    });
    if (!result.success) throw new Error(`unexpected ${result.error}`);

    expect(result.created).toBe(true);
    expect(result.pmc).toMatchObject({
      name: 'Harborline Rentals',
      email: 'lee@example.com',
      billingStatus: 'pending',
      active: false,
      syncEnabled: false,
    });
    expect(result.owner).toMatchObject({ email: 'lee@example.com', fullName: 'Lee Park', role: 'owner' });

    const scope = await resolveAdminScope('lee@example.com');
    expect(scope).toMatchObject({ pmcId: result.pmc.id, needsPayment: true });
  });

  it('renames the pending PMC on a repeated signup', async () => {
    const first = await signUpPmc(await resolveAdminScope('sam@example.com'), { pmcName: 'Sam Stays' });
    const again = await signUpPmc(await resolveAdminScope('sam@example.com'), { pmcName: 'Sam Stays Co' });
    if (!first.success || !again.success) throw new Error('signup failed');

    expect(again).toMatchObject({ created: false, pmc: { id: first.pmc.id, name: 'Sam Stays Co' } });
    expect(await pmcUserDal.listByPmc(first.pmc.id)).toHaveLength(1);
  });

  it('refuses an email that already runs an active PMC', async () => {
    const active = await createPmc();
    expect(await signUpPmc(await resolveAdminScope(active.email), { pmcName: 'Second' })).toEqual({
      success: false,
      error: 'already_registered',
      message: 'This email already belongs to a PMC.',
    });
  });

  it('lets only the owner change a pending signup', async () => {
    const started = await signUpPmc(await resolveAdminScope('founder@example.com'), { pmcName: 'Founders' });
    if (!started.success) throw new Error('signup failed');
    await pmcUserDal.create({ pmcId: started.pmc.id, email: 'helper@example.com', role: 'staff' });

    expect(await signUpPmc(await resolveAdminScope('helper@example.com'), { pmcName: 'Hijacked' })).toEqual({
      success: false,
      error: 'forbidden',
      message: 'Only the owner can change the signup.',
    });
  });

  it('refuses platform admins', async () => {
    expect(await signUpPmc(await resolveAdminScope('root@example.com'), { pmcName: 'Platform' })).toEqual({
      success: false,
      error: 'forbidden',
      message: 'Platform admins cannot sign up a PMC.',
    });
  });
});
