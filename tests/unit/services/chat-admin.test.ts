import { describe, it, expect, beforeAll } from 'vitest';
import type { ChatSession, Pmc, Property } from '@/db/schema';
import {
  assignChat,
  escalateChat,
  getChatDetail,
  hostReply,
  listChatSessions,
  resolveChat,
  setChatNote,
  summarizeChat,
  unresolveChat,
} from '@/services/chat-admin.service';
import { chatDal, createPmc, createProperty, useStubIntegrations } from '../../helpers/fixtures';

describe('chat admin', () => {
  let pmc: Pmc;
  let otherPmc: Pmc;
  let harbor: Property;
  let cabin: Property;
  let angry: ChatSession;
  let calm: ChatSession;
  let resolved: ChatSession;

  beforeAll(async () => {
    useStubIntegrations();
    pmc = await createPmc();
    otherPmc = await createPmc();
    harbor = await createProperty(pmc.id, { name: 'Harbor Loft' });
    cabin = await createProperty(pmc.id, { name: 'Pine Cabin' });
    const elsewhere = await createProperty(otherPmc.id);

    angry = await chatDal.createSession({
      propertyId: harbor.id,
      guestName: 'Alex Early',
      guestMood: 'angry',
      escalationLevel: 'high',
      actionPriority: 'urgent',
      aiSummary: 'Guest reports a broken heater',
      lastActivityAt: new Date('2026-05-03T10:00:00Z'),
    });
    calm = await chatDal.createSession({
      propertyId: cabin.id,
      guestName: 'Blake Calm',
      guestMood: 'calm',
      lastActivityAt: new Date('2026-05-02T10:00:00Z'),
    });
    resolved = await chatDal.createSession({
      propertyId: harbor.id,
      guestName: 'Casey Done',
      isResolved: true,
      lastActivityAt: new Date('2026-05-01T10:00:00Z'),
    });
    await chatDal.createSession({ propertyId: elsewhere.id, guestName: 'Alex Other' });
  });

  describe('listChatSessions', () => {
    it('lists the PMC sessions, most recent first, with property names', async () => {
      const page = await listChatSessions({ pmcId: pmc.id });
      expect(page.total).toBe(3);
      expect(page.sessions.map((s) => [s.id, s.propertyName])).toEqual([
        [angry.id, 'Harbor Loft'],
        [calm.id, 'Pine Cabin'],
        [resolved.id, 'Harbor Loft'],
      ]);
      expect(page).toMatchObject({ limit: 25, offset: 0 });
    });

    it('filters by property, state, priority, escalation and mood', async () => {
      const ids = async (filters: Omit<Parameters<typeof listChatSessions>[0], 'pmcId'>) =>
        (await listChatSessions({ pmcId: pmc.id, ...filters })).sessions.map((s) => s.id);

      expect(await ids({ propertyId: cabin.id })).toEqual([calm.id]);
      expect(await ids({ resolved: true })).toEqual([resolved.id]);
      expect(await ids({ resolved: false })).toEqual([angry.id, calm.id]);
      expect(await ids({ priority: 'urgent' })).toEqual([angry.id]);
      expect(await ids({ escalation: 'high' })).toEqual([angry.id]);
      expect(await ids({ mood: 'calm' })).toEqual([calm.id]);
    });

    it('searches guest names and summaries case-insensitively', async () => {
      const search = async (q: string) =>
        (await listChatSessions({ pmcId: pmc.id, q })).sessions.map((s) => s.id);

      expect(await search('ALEX')).toEqual([angry.id]);
      expect(await search('heater')).toEqual([angry.id]);
      expect(await search('   ')).toHaveLength(3);
    });

    it('clamps paging', async () => {
      const page = await listChatSessions({ pmcId: pmc.id, limit: 500, offset: -3 });
      expect(page).toMatchObject({ limit: 100, offset: 0 });

      const second = await listChatSessions({ pmcId: pmc.id, limit: 1, offset: 1 });
      expect(second.sessions.map((s) => s.id)).toEqual([calm.id]);
      expect(second.total).toBe(3);
    });
  });

  it('never exposes another PMC session', async () => {
    expect(await getChatDetail(otherPmc.id, angry.id)).toEqual({ success: false, error: 'session_not_found' });
    expect(await resolveChat(otherPmc.id, angry.id)).toEqual({ success: false, error: 'session_not_found' });
    expect(await hostReply(otherPmc.id, angry.id, 'Hi')).toEqual({ success: false, error: 'session_not_found' });
  });

  it('resolves and reopens sessions', async () => {
    const done = await resolveChat(pmc.id, calm.id);
    expect(done.success && done.session.isResolved).toBe(true);
    expect(done.success && done.session.resolvedAt).toBeInstanceOf(Date);

    const reopened = await unresolveChat(pmc.id, calm.id);
    expect(reopened).toMatchObject({ success: true, session: { isResolved: false, resolvedAt: null } });
  });

  it('sets escalation, assignee and note', async () => {
    await escalateChat(pmc.id, calm.id, 'medium');
    await assignChat(pmc.id, calm.id, 'staff@example.com');
    await setChatNote(pmc.id, calm.id, 'Call back after 5pm');

    expect(await chatDal.findSession(calm.id)).toMatchObject({
      escalationLevel: 'medium',
      assignedTo: 'staff@example.com',
      internalNote: 'Call back after 5pm',
    });

    await escalateChat(pmc.id, calm.id, null);
    expect((await chatDal.findSession(calm.id))?.escalationLevel).toBeNull();
  });

  it('adds host replies to the transcript', async () => {
    const reply = await hostReply(pmc.id, calm.id, '  I will drop off towels.  ');
    if (!reply.success) throw new Error(`unexpected ${reply.error}`);
    expect(reply.message).toMatchObject({ sender: 'host', content: 'I will drop off towels.' });

    const detail = await getChatDetail(pmc.id, calm.id);
    expect(detail.success && detail.messages.map((m) => m.content)).toEqual(['I will drop off towels.']);
  });

  it('summarizes on demand', async () => {
    await chatDal.addMessage({ sessionId: resolved.id, sender: 'guest', content: 'Thanks for everything' });
    const result = await summarizeChat(pmc.id, resolved.id);

    expect(result).toEqual({
      success: true,
      summary: [
        '**What the guest wants:** General help with their stay.',
        '**Key facts:** None yet.',
        '**Risks:** None.',
        '**Next action:** No action needed.',
      ].join('\n'),
    });
  });
});
