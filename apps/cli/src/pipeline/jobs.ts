import { readdir, stat } from 'fs/promises';
import { basename, extname, join } from 'path';

/**
 * One input document and where its results go.
 */
export interface DocumentJob {
  fileName: string;
  sourcePath: string;
  /** `<outputDir>/<name>.json` */
  outputPath: string;
  /** `<outputDir>/<name>.json.error.txt`, raw response when it is not JSON */
  errorPath: string;
}

export const PDF_EXTENSION = '.pdf';

/**
 * Derive output paths for a document by replacing its extension.
 */
export function createDocumentJob(inputDir: string, outputDir: string, fileName: string): DocumentJob {
  const stem = basename(fileName, extname(fileName));
  const outputPath = join(outputDir, `${stem}.json`);
  return {
    fileName,
    sourcePath: join(inputDir, fileName),
    outputPath,
    errorPath: `${outputPath}.error.txt`,
  };
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    // Dangling link
    return false;
  }
}

/**
 * List the PDF files directly inside `inputDir`, sorted by name.
 * Symbolic links count when they point at a file.
 */
export async function scanDocumentJobs(inputDir: string, outputDir: string): Promise<DocumentJob[]> {
  const entries = await readdir(inputDir, { withFileTypes: true });
  const fileNames: string[] = [];

  for (const entry of entries) {
    if (extname(entry.name).toLowerCase() !== PDF_EXTENSION) continue;
    if (entry.isFile() || (entry.isSymbolicLink() && (await isFile(join(inputDir, entry.name))))) {
      fileNames.push(entry.name);
    }
  }

  return fileNames
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((fileName) => createDocumentJob(inputDir, outputDir, fileName));
}
