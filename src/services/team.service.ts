import { PmcUserDal } from '../dal/pmc-user.dal';
import { db } from '../db/client';
import type { PmcUser, TeamRole } from '../db/schema';
import { fail, type ServiceResult } from '../types/common';
import { logEvent } from './telemetry.service';

const pmcUserDal = new PmcUserDal(db);

export type TeamError = 'member_not_found' | 'email_taken';
type MemberResult = ServiceResult<{ member: PmcUser }, TeamError>;

export async function listMembers(pmcId: string): Promise<PmcUser[]> {
  return pmcUserDal.listByPmc(pmcId);
}

/**
 * Adds a team member, or re-activates a former one with the new role.
 * An email that is already an active member is rejected.
 */
export async function inviteMember(
  pmcId: string,
  input: { email: string; fullName?: string | null; role: TeamRole },
): Promise<MemberResult> {
  const existing = await pmcUserDal.findByEmail(pmcId, input.email);
  if (existing?.isActive) return fail('email_taken', 'This person is already on the team.');

  const member = existing
    ? await pmcUserDal.update(pmcId, existing.id, {
        isActive: true,
        role: input.role,
        fullName: input.fullName ?? existing.fullName,
      })
    : await pmcUserDal.create({
        pmcId,
        email: input.email,
        fullName: input.fullName ?? null,
        role: input.role,
      });
  if (!member) return fail('member_not_found');

  await logEvent({
    pmcId,
    type: existing ? 'team.member.reactivated' : 'team.member.invited',
    entityType: 'pmc_user',
    entityId: member.id,
  });
  return { success: true, member };
}

export async function updateMember(
  pmcId: string,
  userId: string,
  patch: { role?: TeamRole; isActive?: boolean; fullName?: string | null },
): Promise<MemberResult> {
  const member = await pmcUserDal.update(pmcId, userId, patch);
  return member ? { success: true, member } : fail('member_not_found');
}
