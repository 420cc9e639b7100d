/**
 * What an LLM capability hands back: either machine-readable data or the
 * verbatim text. `degraded` marks text substituted after a transport failure
 * or timeout rather than produced by the model.
 */
export type LlmPayload<T> =
  | { kind: 'structured'; data: T }
  | { kind: 'raw'; text: string; degraded: boolean };

export type JsonRecord = Record<string, unknown>;

/** A coerced number plus whether the default had to be used. */
export interface Coerced {
  value: number;
  defaulted: boolean;
}

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const stripCodeFences = (text: string): string =>
  text.replace(/```(?:json)?\s*/gi, '').replace(/```/g, '').trim();

const tryParse = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const sliceBetween = (text: string, open: string, close: string): string | null => {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
};

/**
 * Finds the outermost JSON value in model output. Models often wrap JSON in
 * prose or markdown fences.
 */
export function extractJson(text: string): unknown {
  const cleaned = stripCodeFences(text);
  if (!cleaned) return undefined;

  const whole = tryParse(cleaned);
  if (whole !== undefined) return whole;

  const objectStart = cleaned.indexOf('{');
  const arrayStart = cleaned.indexOf('[');
  const candidates =
    arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart)
      ? [sliceBetween(cleaned, '[', ']'), sliceBetween(cleaned, '{', '}')]
      : [sliceBetween(cleaned, '{', '}'), sliceBetween(cleaned, '[', ']')];

  for (const candidate of candidates) {
    if (candidate === null) continue;
    const parsed = tryParse(candidate);
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

export const rawPayload = (text: string, degraded = false): LlmPayload<never> => ({
  kind: 'raw',
  text,
  degraded,
});

export function parseObjectPayload(text: string): LlmPayload<JsonRecord> {
  const parsed = extractJson(text);
  return isRecord(parsed) ? { kind: 'structured', data: parsed } : rawPayload(text);
}

/**
 * Accepts a bare array, an object wrapping one under `offers`/`proposals`,
 * or a single object.
 */
export function parseListPayload(text: string): LlmPayload<JsonRecord[]> {
  const parsed = extractJson(text);

  let items: unknown[] | null = null;
  if (Array.isArray(parsed)) {
    items = parsed;
  } else if (isRecord(parsed)) {
    const wrapped = parsed.offers ?? parsed.proposals;
    items = Array.isArray(wrapped) ? wrapped : [parsed];
  }

  if (items === null) return rawPayload(text);
  return { kind: 'structured', data: items.filter(isRecord) };
}

export function optionalNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const cleaned = value.replace(/[\s€$£%]/g, '');
    if (!cleaned) return undefined;
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export const coerceNumber = (value: unknown, fallback = 0): Coerced => {
  const parsed = optionalNumber(value);
  return parsed === undefined ? { value: fallback, defaulted: true } : { value: parsed, defaulted: false };
};

export function optionalBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

export const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() ? value.trim() : undefined;

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

export const roundTo = (value: number, decimals = 2): number => {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
};

/** Renders a payload for a conversation transcript. */
export function payloadToText<T>(payload: LlmPayload<T>): string {
  switch (payload.kind) {
    case 'structured':
      return JSON.stringify(payload.data);
    case 'raw':
      return payload.text;
  }
}
