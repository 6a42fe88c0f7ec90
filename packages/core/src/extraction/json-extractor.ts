import { parse } from 'lossless-json';

export type JsonCandidateSource = 'fenced' | 'braces' | 'raw';

export type JsonExtractionResult =
  | {
      success: true;
      /** The candidate text that parsed, trimmed but otherwise untouched */
      json: string;
      source: JsonCandidateSource;
    }
  | { success: false; error: string };

const FENCED_BLOCK = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/i;

/**
 * Candidate JSON strings in the order they are tried.
 */
export function jsonCandidates(raw: string): Array<{ source: JsonCandidateSource; text: string }> {
  const candidates: Array<{ source: JsonCandidateSource; text: string }> = [];

  const fenced = FENCED_BLOCK.exec(raw);
  if (fenced?.[1] !== undefined) {
    candidates.push({ source: 'fenced', text: fenced[1].trim() });
  }

  const first = raw.indexOf('{');
  const last = raw.lastIndexOf('}');
  if (first !== -1 && last > first) {
    candidates.push({ source: 'braces', text: raw.slice(first, last + 1).trim() });
  }

  candidates.push({ source: 'raw', text: raw.trim() });

  return candidates.filter((candidate) => candidate.text.length > 0);
}

/**
 * Pull a JSON value out of a model reply.
 *
 * Tries a fenced code block, then the outermost brace span, then the whole
 * text; the first candidate that parses wins. Parsing goes through
 * lossless-json, which also rejects conflicting duplicate keys.
 */
export function extractJson(raw: string): JsonExtractionResult {
  let lastError = 'Response is empty';

  for (const candidate of jsonCandidates(raw)) {
    try {
      parse(candidate.text);
      return { success: true, json: candidate.text, source: candidate.source };
    } catch (error) {
      lastError = error instanceof Error ? error.message : 'Invalid JSON';
    }
  }

  return { success: false, error: lastError };
}
