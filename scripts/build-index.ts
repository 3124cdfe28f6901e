import path from 'node:path';

import { config } from '../src/config';
import { chunkText } from '../src/pipeline/chunkText';
import { PdfDocumentExtractor } from '../src/pipeline/parsePdf';
import { ChunkIndex } from '../src/rag/chunkIndex';

const usage = 'Usage: npm run build-index -- <document.pdf> [outDir]';

const main = async (): Promise<void> => {
  const [pdfPath, outDir = config.INDEX_DIR] = process.argv.slice(2);

  if (!pdfPath) {
    console.error(usage);
    process.exitCode = 1;
    return;
  }

  const document = await new PdfDocumentExtractor().extract(path.resolve(pdfPath));
  console.info(
    `[INDEX] Extracted ${document.fullText.length} character(s) from ${document.metadata.filename} `
    + `(${document.metadata.pageCount} page(s)).`,
  );

  const chunks = chunkText(document.fullText, {
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
  });

  if (!chunks.length) {
    console.warn('No text could be extracted from the document. Nothing to index.');
    return;
  }

  const index = new ChunkIndex({ maxFeatures: config.MAX_FEATURES });
  index.fit(chunks);
  console.info(`[INDEX] Fitted ${index.size} chunk(s) with ${index.vocabularySize} term(s).`);

  await index.save(path.resolve(outDir));
};

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
