import { logger } from '../config/logger';
import { PmcUserDal } from '../dal/pmc-user.dal';
import { PmcDal } from '../dal/pmc.dal';
import { db } from '../db/client';
import type { Pmc, PmcUser } from '../db/schema';
import { fail, type ServiceResult } from '../types/common';
import type { AdminScope } from './auth.service';
import { logEvent } from './telemetry.service';

const pmcDal = new PmcDal(db);
const pmcUserDal = new PmcUserDal(db);

export interface SignupInput {
  pmcName: string;
  adminName?: string | null;
}

export type SignupResult = ServiceResult<
  { pmc: Pmc; owner: PmcUser; created: boolean },
  'forbidden' | 'already_registered' | 'pmc_not_found'
>;

/**
 * Registers the signed-in admin's company. The PMC starts pending, with
 * sync off, until its billing checkout completes. Signing up again before
 * paying renames the pending PMC instead of creating another one.
 */
export async function signUpPmc(scope: AdminScope, input: SignupInput): Promise<SignupResult> {
  if (scope.role === 'super') {
    return fail('forbidden', 'Platform admins cannot sign up a PMC.');
  }
  const name = input.pmcName.trim();
  const fullName = input.adminName?.trim() || null;

  let pmc: Pmc | undefined;
  let created = false;
  if (scope.pmcId) {
    const existing = await pmcDal.findById(scope.pmcId);
    if (!existing) return fail('pmc_not_found');
    if (existing.billingStatus !== 'pending') {
      return fail('already_registered', 'This email already belongs to a PMC.');
    }
    if (scope.user && scope.user.role !== 'owner') {
      return fail('forbidden', 'Only the owner can change the signup.');
    }
    pmc = await pmcDal.update(existing.id, { name });
  } else {
    pmc = await pmcDal.create({
      name,
      email: scope.email,
      active: false,
      syncEnabled: false,
      billingStatus: 'pending',
    });
    created = true;
  }
  if (!pmc) return fail('pmc_not_found');

  const member = await pmcUserDal.findByEmail(pmc.id, scope.email);
  const owner =
    member ??
    (await pmcUserDal.create({ pmcId: pmc.id, email: scope.email, fullName, role: 'owner' }));

  logger.info({ pmcId: pmc.id, created }, 'PMC signup recorded');
  await logEvent({
    pmcId: pmc.id,
    type: created ? 'pmc.signed_up' : 'pmc.signup.updated',
    entityType: 'pmc',
    entityId: pmc.id,
  });
  return { success: true, pmc, owner, created };
}
