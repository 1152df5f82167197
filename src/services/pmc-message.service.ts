import { env } from '../config/env';
import { logger } from '../config/logger';
import { ChatDal } from '../dal/chat.dal';
import { PmcMessageDal, type UpsertPmcMessageInput } from '../dal/pmc-message.dal';
import { PropertyDal } from '../dal/property.dal';
import { UpgradeDal } from '../dal/upgrade.dal';
import { db } from '../db/client';
import type { PmcMessage, UpgradePurchase } from '../db/schema';
import { fail, type ServiceResult } from '../types/common';
import { formatPrice } from './chat.service';

const pmcMessageDal = new PmcMessageDal(db);
const propertyDal = new PropertyDal(db);
const upgradeDal = new UpgradeDal(db);
const chatDal = new ChatDal(db);

export const MAX_INBOX_PAGE = 200;

/** Creates or refreshes the inbox message for a dedupe key; it comes back open and unread. */
export async function upsertPmcMessage(input: UpsertPmcMessageInput): Promise<PmcMessage> {
  const message = await pmcMessageDal.upsert(input);
  logger.debug({ pmcId: input.pmcId, dedupeKey: input.dedupeKey }, 'Inbox message upserted');
  return message;
}

export async function resolvePmcMessage(pmcId: string, dedupeKey: string): Promise<boolean> {
  return (await pmcMessageDal.resolveByDedupeKey(pmcId, dedupeKey)) !== undefined;
}

export function purchaseDedupeKey(purchaseId: string): string {
  return `upgrade_purchase:${purchaseId}`;
}

function chatLink(sessionId: string): string {
  return `${env.APP_BASE_URL.replace(/\/+$/, '')}/admin/chats/${sessionId}`;
}

async function purchaseContext(purchase: UpgradePurchase) {
  const [property, upgrade, session] = await Promise.all([
    propertyDal.findById(purchase.pmcId, purchase.propertyId),
    upgradeDal.findById(purchase.upgradeId),
    chatDal.findSession(purchase.guestSessionId),
  ]);
  return {
    propertyName: property?.name ?? 'your property',
    upgradeTitle: upgrade?.title ?? 'An upgrade',
    guestName: session?.guestName ?? 'A guest',
  };
}

export async function notifyUpgradePurchased(purchase: UpgradePurchase): Promise<PmcMessage> {
  const ctx = await purchaseContext(purchase);
  return upsertPmcMessage({
    pmcId: purchase.pmcId,
    dedupeKey: purchaseDedupeKey(purchase.id),
    type: 'upgrade_purchase',
    subject: `Upgrade purchased: ${ctx.upgradeTitle}`,
    body:
      `${ctx.guestName} purchased ${ctx.upgradeTitle} at ${ctx.propertyName} ` +
      `for ${formatPrice(purchase.amountCents, purchase.currency)}.`,
    severity: 'info',
    propertyId: purchase.propertyId,
    upgradePurchaseId: purchase.id,
    upgradeId: purchase.upgradeId,
    guestSessionId: purchase.guestSessionId,
    linkUrl: chatLink(purchase.guestSessionId),
  });
}

export async function notifyUpgradeRefunded(purchase: UpgradePurchase): Promise<PmcMessage> {
  const ctx = await purchaseContext(purchase);
  const refunded = purchase.refundedAmountCents ?? purchase.amountCents;
  return upsertPmcMessage({
    pmcId: purchase.pmcId,
    dedupeKey: `upgrade_refund:${purchase.id}`,
    type: 'upgrade_refund',
    subject: `Upgrade refunded: ${ctx.upgradeTitle}`,
    body:
      `${formatPrice(refunded, purchase.currency)} of ${ctx.guestName}'s ${ctx.upgradeTitle} ` +
      `purchase at ${ctx.propertyName} was refunded.`,
    severity: 'warning',
    propertyId: purchase.propertyId,
    upgradePurchaseId: purchase.id,
    upgradeId: purchase.upgradeId,
    guestSessionId: purchase.guestSessionId,
    linkUrl: chatLink(purchase.guestSessionId),
  });
}

// ── Admin inbox ──

export interface ListInboxInput {
  status?: 'open' | 'resolved';
  type?: string;
  q?: string;
  limit?: number;
  offset?: number;
}

export async function listInbox(
  pmcId: string,
  input: ListInboxInput,
): Promise<{ messages: PmcMessage[]; total: number; limit: number; offset: number }> {
  const limit = Math.min(Math.max(input.limit ?? 50, 1), MAX_INBOX_PAGE);
  const offset = Math.max(input.offset ?? 0, 0);
  const { messages, total } = await pmcMessageDal.list({
    pmcId,
    status: input.status,
    type: input.type,
    q: input.q?.trim() || undefined,
    limit,
    offset,
  });
  return { messages, total, limit, offset };
}

export async function unreadCount(pmcId: string): Promise<number> {
  return pmcMessageDal.countUnread(pmcId);
}

export type InboxMessageResult = ServiceResult<{ message: PmcMessage }, 'message_not_found'>;

export async function markInboxMessageRead(pmcId: string, messageId: string): Promise<InboxMessageResult> {
  const message = await pmcMessageDal.markRead(pmcId, messageId);
  return message ? { success: true, message } : fail('message_not_found');
}

export async function resolveInboxMessage(pmcId: string, messageId: string): Promise<InboxMessageResult> {
  const message = await pmcMessageDal.resolve(pmcId, messageId);
  return message ? { success: true, message } : fail('message_not_found');
}
