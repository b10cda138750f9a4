import { isRecord } from '../types.js';
import type { AgentResponse } from '../types.js';

export const UNPARSEABLE_RESPONSE = 'unparseable response';

export type NormalizeResult =
  | { ok: true; response: AgentResponse }
  | { ok: false; reason: string };

const FENCED = /^```[\w-]*[^\S\n]*\n?([\s\S]*?)\n?[^\S\n]*```$/;

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCED.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

function isSerializable(response: AgentResponse): boolean {
  try {
    JSON.stringify(response);
    return true;
  } catch {
    // BigInt values and cycles
    return false;
  }
}

/**
 * Turns raw agent output into a response map. Strings are parsed as JSON,
 * optionally wrapped in a markdown code fence. Objects must survive
 * `JSON.stringify`.
 */
export function normalizeResponse(raw: unknown): NormalizeResult {
  if (isRecord(raw)) {
    const response = { ...raw };
    return isSerializable(response) ? { ok: true, response } : { ok: false, reason: UNPARSEABLE_RESPONSE };
  }

  if (typeof raw !== 'string') {
    return { ok: false, reason: UNPARSEABLE_RESPONSE };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch {
    return { ok: false, reason: UNPARSEABLE_RESPONSE };
  }

  if (!isRecord(parsed)) {
    return { ok: false, reason: UNPARSEABLE_RESPONSE };
  }

  return { ok: true, response: parsed };
}
