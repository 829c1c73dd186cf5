import fs from 'node:fs/promises';
import path from 'node:path';
import { getDocumentProxy } from 'unpdf';

import type { SourceDocument } from '../rag/schema';

type TextContentItem = { str: string; hasEOL?: boolean } | { type: string };

const isTextItem = (item: TextContentItem): item is { str: string; hasEOL?: boolean } => 'str' in item;

/** Concatenates text runs, keeping the line breaks the PDF marks. */
export const joinTextItems = (items: TextContentItem[]): string =>
  items
    .filter(isTextItem)
    .map((item) => (item.hasEOL ? `${item.str}\n` : item.str))
    .join('');

export const extractPdf = async (filePath: string): Promise<SourceDocument> => {
  const buffer = await fs.readFile(filePath);
  const pdf = await getDocumentProxy(new Uint8Array(buffer));
  const sourceFile = path.basename(filePath);
  const pages: (string | null)[] = [];

  try {
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
      try {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        pages.push(joinTextItems(content.items));
      } catch (error) {
        console.warn(`[INGEST] Could not read page ${pageNumber} of ${sourceFile}, keeping it empty.`, error);
        pages.push(null);
      }
    }
  } finally {
    await pdf.destroy();
  }

  return { sourceFile, pages };
};
