/**
 * Pattern Validator - Turns a raw model response (or a list of values) into clean
 * exclude/include patterns.
 */

export type PatternPayload =
  | { kind: 'text'; text: string }
  | { kind: 'items'; items: readonly string[] };

export class PatternValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PatternValidationError';
  }
}

// Opening fence with optional language tag, or a closing fence, on its own line
const CODE_FENCE = /(^```[a-zA-Z]*\s*|\s*```$)/gm;
const SURROUNDING_NOISE = /^['"`\s]+|['"`\s]+$/g;
const REPEATED_SEPARATORS = /\/{2,}/g;

/**
 * Wrap an arbitrary value in a payload. Strings become text, arrays become items.
 */
export function toPatternPayload(value: unknown): PatternPayload {
  if (typeof value === 'string') {
    return { kind: 'text', text: value };
  }
  if (Array.isArray(value)) {
    return { kind: 'items', items: value.map(item => String(item)) };
  }
  const shape = value === null ? 'null' : typeof value;
  throw new PatternValidationError(`Patterns must be a string or a list, got ${shape}`);
}

/**
 * Parse a payload into cleaned, de-duplicated patterns in their original order.
 */
export function parsePatterns(payload: PatternPayload): string[] {
  const rawTokens = splitPayload(payload);

  const seen = new Set<string>();
  const patterns: string[] = [];
  for (const token of rawTokens) {
    const pattern = cleanPattern(token);
    if (!pattern || seen.has(pattern)) continue;
    seen.add(pattern);
    patterns.push(pattern);
  }
  return patterns;
}

/**
 * Strip quotes and whitespace around a single pattern and collapse doubled separators.
 * Returns an empty string when nothing is left.
 */
export function cleanPattern(token: string): string {
  return token.replace(SURROUNDING_NOISE, '').replace(REPEATED_SEPARATORS, '/');
}

function splitPayload(payload: PatternPayload): string[] {
  switch (payload.kind) {
    case 'text': {
      const unfenced = payload.text.replace(CODE_FENCE, '').trim();
      return unfenced
        .split(',')
        .map(token => token.trim())
        .filter(token => token.length > 0);
    }
    case 'items':
      return payload.items
        .map(item => item.trim())
        .filter(item => item.length > 0);
    default:
      return rejectPayload(payload);
  }
}

function rejectPayload(payload: never): never {
  const value: unknown = payload;
  const kind = typeof value === 'object' && value !== null && 'kind' in value ? value.kind : value;
  throw new PatternValidationError(`Unsupported pattern payload kind: ${String(kind)}`);
}
