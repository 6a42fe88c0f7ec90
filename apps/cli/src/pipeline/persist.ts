import { writeFile } from 'fs/promises';
import { formatJson } from '@docstruct/core';

const JSON_INDENT = 4;

/**
 * Lay out extracted JSON text: 4-space indent, key order and number
 * literals as received, non-ASCII characters written as-is.
 */
export function formatJsonOutput(json: string): string {
  return `${formatJson(json, JSON_INDENT)}\n`;
}

export async function writeJsonOutput(path: string, json: string): Promise<void> {
  await writeFile(path, formatJsonOutput(json), 'utf8');
}

/**
 * Keep an unparseable response verbatim for inspection.
 */
export async function writeErrorArtifact(path: string, rawResponse: string): Promise<void> {
  await writeFile(path, rawResponse, 'utf8');
}
