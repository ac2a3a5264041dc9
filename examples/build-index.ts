#!/usr/bin/env node
/**
 * Index a corpus file, persist the index, and read a few sequences back
 *
 * Usage: tsx examples/build-index.ts <corpus> [keys-file]
 */

import { CorpusDescriptor } from "../src/corpus";
import { getErrorSuggestion } from "../src/errors";
import { writeIndexFile } from "../src/index-store";
import { buildIndex } from "../src/indexer";
import { createLogger } from "../src/logger";
import { readSequenceText } from "../src/reader/sequence-reader";

async function main(): Promise<void> {
  const [corpusPath, keysPath] = process.argv.slice(2);
  if (corpusPath === undefined) {
    console.error("Usage: build-index <corpus> [keys-file]");
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ level: "debug", pretty: true });
  const corpus =
    keysPath === undefined ? CorpusDescriptor.all() : await CorpusDescriptor.fromFile(keysPath);

  const result = await buildIndex(corpusPath, corpus, { logger });
  if (!result.success) {
    logger.error({ err: result.error, suggestion: getErrorSuggestion(result.error) }, "failed");
    process.exitCode = 1;
    return;
  }

  const { index, summary } = result.value;
  console.log(
    `${summary.appended} sequences (${summary.excluded} excluded) in ${index.chunks.length} chunks`
  );

  await writeIndexFile(`${corpusPath}.idx`, index, corpus.getRegistry());

  // ============================================================================
  // Random access to the first sequences
  // ============================================================================

  let shown = 0;
  for (const descriptor of index.sequences()) {
    if (shown++ === 3) break;
    const key = corpus.getRegistry().lookup(descriptor.key.sequence);
    const text = await readSequenceText(corpusPath, descriptor);
    console.log(`${key} @${descriptor.fileOffsetBytes}: ${JSON.stringify(text)}`);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
