import fs from 'fs';
import { PDFParse } from 'pdf-parse';

/** Reads the text of one document; the batch driver takes any implementation. */
export type TextExtractor = (filePath: string) => Promise<string>;

/**
 * Extract the text of a PDF, one page after another joined by newlines.
 * Page markers that pdf-parse adds to its combined text are not included.
 */
async function extractPdfBuffer(buffer: Buffer): Promise<string> {
  const data = new Uint8Array(buffer);
  const parser = new PDFParse({ data });

  try {
    const textResult = await parser.getText();
    return textResult.pages.map(page => page.text || '').join('\n');
  } finally {
    await parser.destroy();
  }
}

export const extractPdfText: TextExtractor = async (filePath) => {
  const buffer = await fs.promises.readFile(filePath);
  return extractPdfBuffer(buffer);
};
