import { readFile } from 'fs/promises';
import { errorMessage } from '@docstruct/core';

export type TemplateLoadResult =
  | { success: true; content: string }
  | { success: false; error: string };

/**
 * Read a JSON template file verbatim.
 */
export async function loadTemplate(path: string): Promise<TemplateLoadResult> {
  try {
    return { success: true, content: await readFile(path, 'utf8') };
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      return { success: false, error: `Template file '${path}' not found` };
    }
    return { success: false, error: `Failed to read template '${path}': ${errorMessage(error)}` };
  }
}
