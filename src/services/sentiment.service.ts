import { z } from 'zod';
import lexicon from '../config/lexicon.json';
import { chatConfig, heatConfig, type Mood } from '../config/concierge';
import { logger } from '../config/logger';
import type { ActionPriority, EscalationLevel, MessageSender } from '../db/schema';
import { getIntegrations } from '../integrations/registry';
import type { MessageCategory } from './message-classifier.service';

export type Sentiment = 'positive' | 'neutral' | 'negative';

export interface SentimentResult {
  sentiment: Sentiment;
  mood: Mood;
  confidence: number;
  source: 'llm' | 'override' | 'fallback';
  flags: Record<string, boolean>;
}

export interface TranscriptLine {
  sender: MessageSender;
  content: string;
}

const RESET_RE =
  /\b(jk|j\/k|just kidding|kidding|i was joking|only joking|never mind|nevermind|all good|no worries|we're good|we are good)\b/i;
const PLAYFUL_RE = /(\b(lol|lmao|rofl|haha|hehe)\b|😂|🤣|😅|😉|😜|😆)/iu;
const ESCALATE_RE =
  /\b(refund|chargeback|lawsuit|report you|unsafe|dangerous|mold|infestation|bed ?bugs|police|fraud|scam)\b/i;

const MOODS: readonly Mood[] = ['happy', 'calm', 'confused', 'upset', 'angry', 'anxious', 'playful'];
const SENTIMENTS: readonly Sentiment[] = ['positive', 'neutral', 'negative'];

const llmSentimentSchema = z.object({
  sentiment: z.string().optional(),
  mood: z.string().optional(),
  confidence: z.unknown().optional(),
  flags: z.record(z.unknown()).optional(),
});

function isMood(value: string): value is Mood {
  return MOODS.some((mood) => mood === value);
}

function isSentiment(value: string): value is Sentiment {
  return SENTIMENTS.some((sentiment) => sentiment === value);
}

function clampConfidence(value: unknown): number {
  const n = typeof value === 'number' ? value : Number.parseInt(String(value ?? ''), 10);
  if (!Number.isFinite(n)) return 60;
  return Math.max(0, Math.min(100, Math.trunc(n)));
}

/** Parses the first JSON object in a model reply, tolerating text around it. */
export function extractJsonObject(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) throw new Error('empty model output');
  try {
    return JSON.parse(trimmed);
  } catch {
    const match = /\{[\s\S]*\}/.exec(trimmed);
    if (!match) throw new Error('no json object found');
    return JSON.parse(match[0]);
  }
}

/** Compact transcript of the last turns, one line per message. */
export function buildSentimentContext(history: TranscriptLine[]): string {
  return history
    .slice(-chatConfig.SENTIMENT_CONTEXT_TURNS)
    .filter((line) => line.content.trim().length > 0)
    .map((line) => {
      const role = line.sender === 'assistant' ? 'assistant' : 'guest';
      const content = line.content.replace(/\n/g, ' ').trim().slice(0, chatConfig.SENTIMENT_LINE_CHARS);
      return `${role}: ${content}`;
    })
    .join('\n');
}

/** Keyword rule used when the model is unavailable. */
export function sentimentFallbackRule(text: string): SentimentResult {
  const t = text.toLowerCase();
  const result = (
    sentiment: Sentiment,
    mood: Mood,
    confidence: number,
    flags: Record<string, boolean> = {},
  ): SentimentResult => ({ sentiment, mood, confidence, source: 'fallback', flags });

  if (RESET_RE.test(t) || PLAYFUL_RE.test(t)) return result('neutral', 'calm', 90, { reset: true });
  if (ESCALATE_RE.test(t)) return result('negative', 'angry', 85, { escalation: true });
  if (lexicon.negativeWords.some((word) => t.includes(word))) {
    const confused = lexicon.confusionPhrases.some((phrase) => t.includes(phrase));
    return result('negative', confused ? 'confused' : 'upset', 70);
  }
  if (lexicon.positiveWords.some((word) => t.includes(word))) return result('positive', 'happy', 70);
  return result('neutral', 'calm', 60);
}

/** Deterministic overrides that skip the model entirely. */
export function sentimentOverride(text: string): SentimentResult | null {
  const playful = PLAYFUL_RE.test(text);
  if (RESET_RE.test(text) || playful) {
    return {
      sentiment: 'neutral',
      mood: playful ? 'playful' : 'calm',
      confidence: 92,
      source: 'override',
      flags: { reset: true, playful },
    };
  }
  if (ESCALATE_RE.test(text)) {
    return {
      sentiment: 'negative',
      mood: 'angry',
      confidence: 88,
      source: 'override',
      flags: { escalation: true },
    };
  }
  return null;
}

function buildPrompt(context: string, current: string): string {
  return [
    "You are labeling the GUEST'S CURRENT message in a hospitality chat.",
    '',
    'Use the context ONLY to interpret the CURRENT message.',
    'If the guest is joking, teasing, or clearly playful, do NOT label them upset/angry.',
    '',
    'Return ONLY valid JSON:',
    '{',
    '  "sentiment": "positive" | "neutral" | "negative",',
    '  "mood": "happy" | "calm" | "playful" | "confused" | "upset" | "angry" | "anxious",',
    '  "confidence": 0-100,',
    '  "flags": { "joking": true|false, "resolved": true|false, "escalation": true|false }',
    '}',
    '',
    'Context (recent turns):',
    context,
    '',
    'Guest CURRENT message:',
    current,
  ].join('\n');
}

/** Normalizes a model reply and applies joking/resolved adjustments. */
export function interpretModelSentiment(raw: string, current: string): SentimentResult {
  const data = llmSentimentSchema.parse(extractJsonObject(raw));

  const sentimentRaw = (data.sentiment ?? '').trim().toLowerCase();
  const moodRaw = (data.mood ?? '').trim().toLowerCase();
  let sentiment: Sentiment = isSentiment(sentimentRaw) ? sentimentRaw : 'neutral';
  let mood: Mood = isMood(moodRaw) ? moodRaw : 'calm';
  const confidence = clampConfidence(data.confidence);
  const flags: Record<string, boolean> = {};
  for (const [key, value] of Object.entries(data.flags ?? {})) flags[key] = Boolean(value);

  const playful = PLAYFUL_RE.test(current);
  if (flags.joking || playful) {
    if (sentiment === 'negative' && confidence < 90) sentiment = 'neutral';
    if (mood === 'upset' || mood === 'angry' || mood === 'anxious') mood = playful ? 'playful' : 'calm';
    flags.playful_override = true;
  }

  if (flags.resolved || RESET_RE.test(current)) {
    if (sentiment === 'negative' && confidence < 95) sentiment = 'neutral';
    if (mood === 'upset' || mood === 'angry') mood = 'calm';
    flags.resolved_override = true;
  }

  return { sentiment, mood, confidence, source: 'llm', flags };
}

/**
 * Mood of the guest's current message: overrides first, then the model,
 * then the keyword fallback.
 */
export async function classifyGuestSentiment(
  history: TranscriptLine[],
  currentText: string,
): Promise<SentimentResult> {
  const current = currentText.trim();
  const override = sentimentOverride(current);
  if (override) return override;

  try {
    const raw = await getIntegrations().llm.complete({
      purpose: 'sentiment',
      temperature: 0,
      json: true,
      messages: [
        { role: 'system', content: 'Return strict JSON only. No markdown, no extra text.' },
        { role: 'user', content: buildPrompt(buildSentimentContext(history), current) },
      ],
    });
    return interpretModelSentiment(raw, current);
  } catch (err) {
    logger.warn({ err }, 'Sentiment model failed, using keyword fallback');
    return sentimentFallbackRule(current);
  }
}

// ── Heat ──

/**
 * Heat of a session after a new guest message: the decayed previous heat
 * or the new reading, whichever is higher, clamped to 0..100.
 */
export function computeHeatScore(
  previous: number,
  result: SentimentResult,
  category: MessageCategory,
): number {
  let reading: number = heatConfig.MOOD_WEIGHTS[result.mood];
  if (result.sentiment === 'negative') reading += heatConfig.NEGATIVE_BONUS;
  if (category === 'urgent') reading += heatConfig.URGENT_BONUS;
  if (result.flags.escalation) reading += heatConfig.ESCALATION_BONUS;

  const decayed = Math.round(previous * heatConfig.DECAY);
  return Math.max(0, Math.min(100, Math.max(decayed, reading)));
}

export function escalationFromHeat(heat: number): EscalationLevel | null {
  if (heat >= heatConfig.HIGH_THRESHOLD) return 'high';
  if (heat >= heatConfig.MEDIUM_THRESHOLD) return 'medium';
  if (heat > 0) return 'low';
  return null;
}

export function priorityFor(
  heat: number,
  result: SentimentResult,
  category: MessageCategory,
): ActionPriority {
  if (category === 'urgent' || result.flags.escalation) return 'urgent';
  return escalationFromHeat(heat) ?? 'none';
}
