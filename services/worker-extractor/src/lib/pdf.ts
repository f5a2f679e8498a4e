/**
 * PDF Text Extraction
 *
 * Extracts text from PDF files using pdfjs-dist.
 */

import fs from 'fs';
import type * as PdfJs from 'pdfjs-dist';
import { logger } from '@aqlparse/shared';

// The legacy build runs on Node without DOM globals and loads as CommonJS
const pdfjsLib: typeof PdfJs = require('pdfjs-dist/legacy/build/pdf.js');

// Configure worker for Node.js environment
pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/legacy/build/pdf.worker.js');

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
  combinedText: string;
}

/** Separator between page texts in the combined text */
export const PAGE_SEPARATOR = '\n\n';

/**
 * Extract text from a PDF file, preserving line structure.
 *
 * Groups text items by Y position so that a header and the row printed
 * beneath it come out as separate lines.
 */
export async function extractTextFromPdf(filePath: string): Promise<PdfTextResult> {
  logger.debug('Extracting text from PDF', { filePath });

  const data = new Uint8Array(await fs.promises.readFile(filePath));
  const pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;

  const pages: PageText[] = [];

  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      // Group text items by Y position to preserve line structure
      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        // Text on the same visual line may have slight Y variations
        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);

        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
      }

      // Top to bottom, then left to right
      const lines: string[] = [];
      for (const y of [...itemsByY.keys()].sort((a, b) => b - a)) {
        const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
        const lineText = lineItems.map(item => item.str).join(' ').trim();
        if (lineText) {
          lines.push(lineText);
        }
      }

      pages.push({ pageNumber: pageNum, text: lines.join('\n') });
      page.cleanup();
    }
  } finally {
    await pdf.destroy();
  }

  const combinedText = pages.map(page => page.text).join(PAGE_SEPARATOR);

  logger.debug('PDF text extraction complete', {
    filePath,
    totalPages: pages.length,
    totalChars: combinedText.length,
  });

  return {
    pages,
    totalPages: pages.length,
    combinedText,
  };
}
