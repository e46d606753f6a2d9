/**
 * PDF Text Source
 *
 * Extracts page lines from PDF files using pdf-parse.
 */

import fs from 'fs';
import pdfParse from 'pdf-parse';
import type { TextDocument, TextSource } from '@checkin/shared';
import { logger } from '@checkin/shared';
import { assembleLines, type PositionedText } from './page-lines';

interface PageTextContent {
  items: PositionedText[];
}

export class PdfTextSource implements TextSource {
  async open(filePath: string): Promise<TextDocument> {
    logger.debug('Opening PDF', { filePath });

    const pages = new Map<number, string[]>();
    const data = await pdfParse(fs.readFileSync(filePath), {
      // Pages are rendered one after another. pdf-parse turns a page that
      // fails to render into empty text, so such a page never reaches `pages`.
      pagerender: (pageData) =>
        pageData.getTextContent().then((content: PageTextContent) => {
          const lines = assembleLines(content.items);
          pages.set(Number(pageData.pageNumber), lines);
          return lines.join('\n');
        }),
    });

    return {
      totalPages: data.numpages,
      getPageLines: async (pageNumber) => {
        const lines = pages.get(pageNumber);
        if (!lines) {
          throw new Error(`No text layer extracted for page ${pageNumber}`);
        }
        return lines;
      },
      close: async () => {
        pages.clear();
      },
    };
  }
}
