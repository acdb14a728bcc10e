/**
 * Moderation Classifier
 *
 * Asks the chat oracle to label user text with one category from a closed
 * set, then maps the label to an action through a fixed policy table.
 *
 * The classifier fails open: an unreachable oracle or an unreadable reply
 * yields SAFE/allow with reason "moderation fallback". It never bans on a
 * failure path. An oracle label outside the known set is flagged.
 */

import { z } from 'zod';
import { createModuleLogger, errorMessage } from '../utils/logger.js';
import { OracleResponseError } from '../utils/errors.js';
import type { ChatOracle } from '../llm/oracle.js';

const logger = createModuleLogger('moderation');

export const MODERATION_LABELS = [
  'SAFE',
  'HATE_SPEECH',
  'ABUSIVE_LANGUAGE',
  'SEXUAL_CONTENT',
  'SEXUAL_CONTENT_MINORS',
  'VIOLENCE',
  'SELF_HARM',
  'ILLEGAL_ACTIVITY',
  'SPAM',
  'MISINFORMATION',
  'SENSITIVE_POLITICAL',
] as const;

export type ModerationLabel = (typeof MODERATION_LABELS)[number];

export type ModerationAction = 'allow' | 'flag' | 'warn' | 'ban';

export const ACTION_MAP: Readonly<Record<ModerationLabel, ModerationAction>> = {
  SAFE: 'allow',
  HATE_SPEECH: 'flag',
  ABUSIVE_LANGUAGE: 'ban',
  SEXUAL_CONTENT: 'ban',
  SEXUAL_CONTENT_MINORS: 'ban',
  VIOLENCE: 'flag',
  SELF_HARM: 'flag',
  ILLEGAL_ACTIVITY: 'flag',
  SPAM: 'ban',
  MISINFORMATION: 'warn',
  SENSITIVE_POLITICAL: 'flag',
};

export interface ModerationVerdict {
  /** UNKNOWN when the oracle named a category outside the closed set. */
  label: ModerationLabel | 'UNKNOWN';
  action: ModerationAction;
  reason: string;
}

export const FALLBACK_REASON = 'moderation fallback';
export const MAX_REASON_LENGTH = 200;

export const SAFE_FALLBACK: Readonly<ModerationVerdict> = Object.freeze({
  label: 'SAFE',
  action: 'allow',
  reason: FALLBACK_REASON,
});

export type ClassificationResult =
  | { kind: 'ok'; verdict: ModerationVerdict }
  | { kind: 'fallback'; verdict: ModerationVerdict; diagnostic: string };

export const SYSTEM_PROMPT = `
You are a strict content moderation classifier. Given user text, return a JSON with:
- label: one of [${MODERATION_LABELS.join(', ')}]
- reason: brief explanation (max 25 words)

Rules:
- SEXUAL_CONTENT_MINORS is hard block if any minor sexual context.
- Be conservative: if unsure between safe and unsafe, pick the unsafe category.
- Do not include any extra text besides the JSON.
`.trim();

const VerdictReplySchema = z.object({
  label: z.string().min(1),
  reason: z.string().optional().default(''),
});

export function isModerationLabel(value: string): value is ModerationLabel {
  return MODERATION_LABELS.some((label) => label === value);
}

/**
 * Policy lookup. Labels outside the table are flagged for review.
 */
export function actionForLabel(label: string): ModerationAction {
  return isModerationLabel(label) ? ACTION_MAP[label] : 'flag';
}

function truncateReason(reason: string): string {
  const trimmed = reason.trim();
  return trimmed.length > MAX_REASON_LENGTH ? trimmed.slice(0, MAX_REASON_LENGTH) : trimmed;
}

/**
 * Extract the verdict from a raw oracle reply. Tolerates prose or code
 * fences around the object by reading from the first `{` to the last `}`.
 *
 * @throws OracleResponseError when no well-formed object is found
 */
export function parseVerdict(raw: string): ModerationVerdict {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new OracleResponseError('Moderation reply contains no JSON object');
  }

  let json: unknown;
  try {
    json = JSON.parse(raw.slice(start, end + 1));
  } catch (error) {
    throw new OracleResponseError(`Moderation reply is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = VerdictReplySchema.safeParse(json);
  if (!parsed.success) {
    throw new OracleResponseError(`Moderation reply has unexpected shape: ${parsed.error.message}`);
  }

  const label = parsed.data.label.trim().toUpperCase();
  return {
    label: isModerationLabel(label) ? label : 'UNKNOWN',
    action: actionForLabel(label),
    reason: truncateReason(parsed.data.reason),
  };
}

export class ModerationClassifier {
  constructor(private readonly oracle: ChatOracle) {}

  /**
   * Classify text and report whether the verdict came from the oracle or
   * from the fallback path.
   */
  async classifyDetailed(text: string): Promise<ClassificationResult> {
    const trimmed = text.trim();
    if (!trimmed) {
      return { kind: 'fallback', verdict: { ...SAFE_FALLBACK }, diagnostic: 'empty text' };
    }

    try {
      const raw = await this.oracle.complete({
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: `Classify this text:\n"""${trimmed}"""` },
        ],
        temperature: 0,
        maxCompletionTokens: 300,
        topP: 1,
      });

      const verdict = parseVerdict(raw);
      if (verdict.label === 'UNKNOWN') {
        logger.warn('Moderation oracle returned an unknown label, flagging', { reason: verdict.reason });
      }
      return { kind: 'ok', verdict };
    } catch (error) {
      logger.error(`Moderation failed, defaulting to SAFE: ${errorMessage(error)}`);
      return { kind: 'fallback', verdict: { ...SAFE_FALLBACK }, diagnostic: errorMessage(error) };
    }
  }

  /**
   * @example
   * const verdict = await classifier.classify('Buy cheap followers now!!!');
   * // { label: 'SPAM', action: 'ban', reason: '...' }
   */
  async classify(text: string): Promise<ModerationVerdict> {
    const result = await this.classifyDetailed(text);
    return result.verdict;
  }
}
