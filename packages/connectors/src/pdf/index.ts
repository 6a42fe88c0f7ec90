// PDF connector exports
export { extractTextFromPdf, isScannedPdf, PdfTextExtractor } from './text-extractor.js';
