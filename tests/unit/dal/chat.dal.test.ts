import { describe, it, expect } from 'vitest';
import { chatDal, createPmc, createProperty } from '../../helpers/fixtures';

describe('ChatDal', () => {
  it('returns the latest messages oldest first when limited', async () => {
    const pmc = await createPmc();
    const property = await createProperty(pmc.id);
    const session = await chatDal.createSession({ propertyId: property.id });
    for (const content of ['one', 'two', 'three', 'four']) {
      await chatDal.addMessage({ sessionId: session.id, sender: 'guest', content });
    }

    expect((await chatDal.listMessages(session.id)).map((m) => m.content)).toEqual(['one', 'two', 'three', 'four']);
    expect((await chatDal.listMessages(session.id, 2)).map((m) => m.content)).toEqual(['three', 'four']);
  });

  it('reports the time of the last message', async () => {
    const pmc = await createPmc();
    const property = await createProperty(pmc.id);
    const session = await chatDal.createSession({ propertyId: property.id });

    expect(await chatDal.lastMessageAt(session.id)).toBeNull();

    const at = new Date('2026-05-01T09:30:00Z');
    await chatDal.addMessage({ sessionId: session.id, sender: 'guest', content: 'hi', createdAt: at });
    expect(await chatDal.lastMessageAt(session.id)).toEqual(at);
  });

  it('starts sessions calm and unresolved', async () => {
    const pmc = await createPmc();
    const property = await createProperty(pmc.id);
    const session = await chatDal.createSession({ propertyId: property.id });

    expect(session).toMatchObject({
      source: 'guest_web',
      reservationStatus: 'pre_booking',
      isVerified: false,
      heatScore: 0,
      actionPriority: 'none',
      emotionalSignals: [],
      isResolved: false,
    });
  });
});
