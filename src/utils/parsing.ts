import { ParseError, errorMessage } from '../research/errors';

const JSON_FENCE = /```json\s*([\s\S]*?)```/;
const ANY_FENCE = /```\s*([\s\S]*?)```/;

/**
 * Pulls the JSON object out of model output that may wrap it in reasoning
 * prose or markdown fences. Returns null when no candidate is found; the
 * candidate itself is not guaranteed to be valid JSON.
 */
export function extractJson(raw: string): string | null {
  const content = raw.trim();

  const fenced = JSON_FENCE.exec(content);
  if (fenced) {
    return fenced[1].trim();
  }

  const plain = ANY_FENCE.exec(content);
  if (plain) {
    const extracted = plain[1].trim();
    if (extracted.startsWith('{')) {
      return extracted;
    }
  }

  const start = content.indexOf('{');
  if (start >= 0) {
    let depth = 0;
    for (let i = start; i < content.length; i++) {
      const char = content[i];
      if (char === '{') {
        depth++;
      } else if (char === '}') {
        depth--;
        if (depth === 0) {
          return content.slice(start, i + 1);
        }
      }
    }
  }

  if (content.startsWith('{')) {
    return content;
  }

  return null;
}

export function parseJsonObject(raw: string): Record<string, unknown> {
  const candidate = extractJson(raw);
  if (candidate === null) {
    throw new ParseError('No JSON found in response', raw);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (err) {
    throw new ParseError(`Invalid JSON in response: ${errorMessage(err)}`, raw);
  }

  if (!isRecord(parsed)) {
    throw new ParseError('Response JSON is not an object', raw);
  }
  return parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const preview = (text: string, length = 500): string => text.slice(0, length);
