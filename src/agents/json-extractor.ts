import YAML from 'yaml';
import { errorMessage } from '../utils/errors';

export type ExtractionStrategy = 'direct' | 'fenced' | 'sliced' | 'repaired' | 'yaml';

export type ExtractionResult = { ok: true; value: unknown; strategy: ExtractionStrategy } | { ok: false; attempts: string[] };

/**
 * Pull a JSON value out of free-form model output.
 *
 * Strategies run in order until one yields a value:
 *  1. the whole reply as JSON
 *  2. the first fenced code block
 *  3. the span between the first opening and last closing bracket
 *  4. the same span after repairing comments, trailing commas and
 *     single-quoted strings or True/False/None literals
 *  5. the span parsed as YAML (flow mappings cover most dict-like output)
 */
export function extractJson(raw: string): ExtractionResult {
  const text = raw.trim();
  if (!text) return { ok: false, attempts: ['response was empty'] };

  const attempts: string[] = [];
  const fenced = extractFenced(text);
  const sliced = sliceOuter(fenced ?? text);

  const candidates: Array<[ExtractionStrategy, string | null]> = [
    ['direct', text],
    ['fenced', fenced],
    ['sliced', sliced],
    ['repaired', repairJson(sliced ?? fenced ?? text)],
  ];

  for (const [strategy, candidate] of candidates) {
    if (candidate === null) continue;
    try {
      const value: unknown = JSON.parse(candidate);
      return { ok: true, value, strategy };
    } catch (err) {
      attempts.push(`${strategy}: ${errorMessage(err)}`);
    }
  }

  try {
    const value: unknown = YAML.parse(sliced ?? fenced ?? text);
    if (typeof value === 'object' && value !== null) {
      return { ok: true, value, strategy: 'yaml' };
    }
    attempts.push('yaml: not a mapping or list');
  } catch (err) {
    attempts.push(`yaml: ${errorMessage(err)}`);
  }

  return { ok: false, attempts };
}

export function extractFenced(text: string): string | null {
  const match = /```[a-zA-Z0-9_-]*\s*\n?([\s\S]*?)```/.exec(text);
  const body = match?.[1]?.trim();
  return body ? body : null;
}

export function sliceOuter(text: string): string | null {
  const braceAt = text.indexOf('{');
  const bracketAt = text.indexOf('[');
  const candidates = [braceAt, bracketAt].filter((i) => i >= 0);
  if (candidates.length === 0) return null;

  const start = Math.min(...candidates);
  const closer = text[start] === '{' ? '}' : ']';
  const end = text.lastIndexOf(closer);
  if (end <= start) return null;
  return text.slice(start, end + 1);
}

export function repairJson(text: string): string {
  let repaired = text
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .replace(/(^|\s)\/\/[^\n]*/g, '$1')
    .replace(/,\s*([}\]])/g, '$1')
    .replace(/\bTrue\b/g, 'true')
    .replace(/\bFalse\b/g, 'false')
    .replace(/\bNone\b/g, 'null');

  if (!repaired.includes('"')) {
    repaired = repaired.replace(/'/g, '"');
  }

  return repaired;
}
