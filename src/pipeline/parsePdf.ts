import fs from 'node:fs/promises';
import path from 'node:path';
import pdfParse from 'pdf-parse';

import { NotFoundError } from '../errors';

export type DocumentMetadata = {
  filename: string;
  pageCount: number;
  info: Record<string, string | number | boolean>;
};

export type ExtractedDocument = {
  fullText: string;
  metadata: DocumentMetadata;
};

export interface DocumentExtractor {
  extract(filePath: string): Promise<ExtractedDocument>;
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const normalizeInfo = (info: unknown): Record<string, string | number | boolean> => {
  const base: Record<string, string | number | boolean> = {};

  if (isPlainObject(info)) {
    Object.entries(info).forEach(([key, value]) => {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        base[key] = value;
      }
    });
  }

  return base;
};

/** Collapses whitespace and drops characters outside printable ASCII. */
export const cleanText = (text: string): string =>
  text
    .replace(/\s+/g, ' ')
    .replace(/[^\x20-\x7E\n]/g, '')
    .trim();

export class PdfDocumentExtractor implements DocumentExtractor {
  async extract(filePath: string): Promise<ExtractedDocument> {
    let fileBuffer: Buffer;

    try {
      fileBuffer = await fs.readFile(filePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new NotFoundError(`Document not found at ${filePath}`);
      }
      throw error;
    }

    const result = await pdfParse(fileBuffer);
    const pageCount = typeof result.numpages === 'number' ? Math.max(0, Math.trunc(result.numpages)) : 0;

    return {
      fullText: cleanText(result.text ?? ''),
      metadata: {
        filename: path.basename(filePath),
        pageCount,
        info: normalizeInfo(result.info),
      },
    };
  }
}
