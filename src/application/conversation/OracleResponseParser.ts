import { z } from 'zod';
import { ConversationIntent, RecommendationCandidate } from '../../types';
import { ParseResult, ok, fallback } from '../../domain/common/ParseResult';
import { OracleParseError } from '../../domain/common/Errors';

const NameDetectionSchema = z.object({
  is_name: z.boolean(),
  name: z.string().optional().default('')
});

const ProposalSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string().optional().default('')
});

const INTENTS: readonly ConversationIntent[] = ['task_assignment', 'buddy_response', 'general_conversation'];

/**
 * Remove Markdown code fences around a payload.
 */
export function stripCodeFences(raw: string): string {
  return raw.replace(/```[a-zA-Z]*\s*/g, '').replace(/```/g, '').trim();
}

/**
 * Find the first balanced JSON value opened by `open` and parse it.
 * Brackets inside string literals are not counted.
 */
export function extractJSON(raw: string, open: '{' | '['): unknown {
  const close = open === '{' ? '}' : ']';
  const cleaned = stripCodeFences(raw);

  try {
    return JSON.parse(cleaned);
  } catch {
    // Fall through to balanced extraction
  }

  const start = cleaned.indexOf(open);
  if (start === -1) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < cleaned.length; i++) {
    const ch = cleaned[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      if (depth === 0) {
        try {
          return JSON.parse(cleaned.slice(start, i + 1));
        } catch {
          return undefined;
        }
      }
    }
  }
  return undefined;
}

function parseFailure(what: string, raw: string): OracleParseError {
  return new OracleParseError(`Oracle ${what} did not match the expected shape`, raw);
}

/**
 * `{"is_name": boolean, "name": string}` to the extracted name, or null
 * when the text was not a name. Unreadable output means "not a name".
 */
export function parseNameDetection(raw: string): ParseResult<string | null> {
  const parsed = NameDetectionSchema.safeParse(extractJSON(raw, '{'));
  if (!parsed.success) {
    return fallback(null, parseFailure('name detection', raw));
  }

  const name = parsed.data.name.trim();
  return ok(parsed.data.is_name && name ? name : null);
}

/**
 * The first intent name mentioned in the output, defaulting to
 * general_conversation.
 */
export function parseIntent(raw: string): ParseResult<ConversationIntent> {
  const normalized = raw.toLowerCase();
  let intent: ConversationIntent | null = null;
  let earliest = Infinity;
  for (const name of INTENTS) {
    const at = normalized.indexOf(name);
    if (at >= 0 && at < earliest) {
      intent = name;
      earliest = at;
    }
  }
  return intent ? ok(intent) : fallback('general_conversation', parseFailure('intent', raw));
}

/**
 * A JSON array of `{id, title}` proposals, possibly wrapped in prose or code
 * fences. Malformed entries are skipped; an unreadable array yields none.
 */
export function parseTaskProposals(raw: string): ParseResult<RecommendationCandidate[]> {
  const parsed = extractJSON(raw, '[');
  if (!Array.isArray(parsed)) {
    return fallback([], parseFailure('task proposals', raw));
  }

  const candidates: RecommendationCandidate[] = [];
  let malformed = 0;
  for (const item of parsed) {
    const entry = ProposalSchema.safeParse(item);
    if (entry.success && entry.data.id.trim()) {
      candidates.push({ taskId: entry.data.id.trim(), title: entry.data.title });
    } else {
      malformed++;
    }
  }

  return malformed > 0 && candidates.length === 0
    ? fallback([], parseFailure('task proposals', raw))
    : ok(candidates);
}
