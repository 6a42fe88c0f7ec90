import { readFile } from 'fs/promises';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PageText, TextExtractionResult, TextExtractor } from '@docstruct/connector-sdk';

/** Vertical distance (in PDF units) that starts a new line */
const LINE_BREAK_THRESHOLD = 5;

/**
 * Extract text from a PDF buffer.
 * Uses pdf.js for embedded text extraction; pages are kept in document order.
 *
 * @param buffer - PDF file buffer
 * @returns Extracted text from all pages
 */
export async function extractTextFromPdf(buffer: Uint8Array): Promise<TextExtractionResult> {
  let loadingTask: ReturnType<typeof getDocument> | undefined;

  try {
    // pdf.js takes ownership of the array it is given
    const data = new Uint8Array(buffer);

    loadingTask = getDocument({
      data,
      useSystemFonts: true,
      disableFontFace: true,
      isEvalSupported: false,
    });

    const pdf = await loadingTask.promise;
    const pages: PageText[] = [];

    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();

      let currentY: number | null = null;
      let currentLine = '';
      const lines: string[] = [];

      for (const item of textContent.items) {
        // Marked-content items carry no text
        if (!('str' in item)) continue;

        const rawY: unknown = item.transform[5];
        const y = typeof rawY === 'number' ? rawY : null;

        if (currentY !== null && y !== null && Math.abs(y - currentY) > LINE_BREAK_THRESHOLD) {
          if (currentLine.trim()) {
            lines.push(currentLine.trim());
          }
          currentLine = '';
        }

        currentLine += item.str;
        if (item.hasEOL) {
          if (currentLine.trim()) {
            lines.push(currentLine.trim());
          }
          currentLine = '';
        }
        currentY = y;
      }

      if (currentLine.trim()) {
        lines.push(currentLine.trim());
      }

      pages.push({
        pageNumber: i,
        text: lines.join('\n'),
        lines,
      });
    }

    return {
      success: true,
      pages,
      fullText: pages.map((p) => p.text).join('\n\n'),
      pageCount: pdf.numPages,
    };
  } catch (error) {
    return {
      success: false,
      pages: [],
      fullText: '',
      pageCount: 0,
      error: error instanceof Error ? error.message : 'Unknown error during PDF text extraction',
    };
  } finally {
    // Also tears down a document that failed to open
    await loadingTask?.destroy();
  }
}

/**
 * Check if extracted text is likely from a scanned PDF (mostly empty).
 */
export function isScannedPdf(result: TextExtractionResult): boolean {
  if (!result.success) return true;

  const charCount = result.fullText.replace(/\s/g, '').length;
  // At least 100 characters per page
  return charCount < result.pageCount * 100;
}

/**
 * Reads PDF files from disk.
 */
export class PdfTextExtractor implements TextExtractor {
  async extract(path: string): Promise<TextExtractionResult> {
    let buffer: Buffer;
    try {
      buffer = await readFile(path);
    } catch (error) {
      return {
        success: false,
        pages: [],
        fullText: '',
        pageCount: 0,
        error: error instanceof Error ? error.message : `Cannot read ${path}`,
      };
    }
    return extractTextFromPdf(buffer);
  }
}
