/**
 * Ingest runbooks into the configured vector store
 *
 * Usage:
 *   npx tsx scripts/ingest-runbooks.ts              # everything under the configured prefix
 *   npx tsx scripts/ingest-runbooks.ts <path>       # a single runbook
 *   npx tsx scripts/ingest-runbooks.ts --clear      # drop the index first
 */

import "dotenv/config";
import { createServices, loadConfig } from "../packages/core/src";

async function main() {
  const args = process.argv.slice(2);
  const clear = args.includes("--clear");
  const path = args.find((arg) => !arg.startsWith("--"));

  const services = await createServices(loadConfig());

  if (clear) {
    await services.store.clear();
  }

  if (path) {
    const result = await services.ingestion.ingestOne(path);
    console.log(`\n✅ ${result.path}: ${result.chunksStored} chunks stored, ${result.chunksFailed} failed`);
  } else {
    const result = await services.ingestion.ingestAll(services.runbookPrefix);
    console.log(
      `\n✅ ${result.documentsProcessed} runbooks ingested, ${result.documentsFailed} failed ` +
        `(${result.chunksStored} chunks stored, ${result.chunksFailed} failed)`
    );
    for (const failure of result.failures) {
      console.log(`   ❌ ${failure.path}: ${failure.error}`);
    }
  }

  const stats = await services.store.stats();
  console.log(`📊 Index: ${stats.totalChunks} chunks from ${stats.totalDocuments} runbooks`);
}

main().catch((error: unknown) => {
  console.error("Ingestion failed:", error);
  process.exit(1);
});
