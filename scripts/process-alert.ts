/**
 * Run one alert through the pipeline and print the checklist
 *
 * Usage:
 *   npx tsx scripts/process-alert.ts                         # bundled sample alarm
 *   npx tsx scripts/process-alert.ts path/to/alert.json      # SNS, CloudWatch or generic alert JSON
 *
 * Set INGEST_ON_STARTUP=true to index ./runbooks before processing.
 */

import "dotenv/config";
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import {
  createServices,
  getPriorityLabel,
  loadConfig,
  normalizeAlert,
  runStartupIngestion,
} from "../packages/core/src";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const SAMPLE_ALERT = path.join(__dirname, "fixtures", "high-memory-alarm.json");

async function main() {
  const alertPath = process.argv[2] ?? SAMPLE_ALERT;
  const payload: unknown = JSON.parse(await fs.readFile(alertPath, "utf-8"));

  const alert = normalizeAlert(payload);
  if (!alert) {
    console.log("Alarm is in OK state; nothing to do.");
    return;
  }

  const config = loadConfig();
  const services = await createServices(config, {
    onStateChange: (alertId, from, to) => console.log(`   ${alertId}: ${from} → ${to}`),
  });

  if (config.ingestOnStartup) {
    await runStartupIngestion(services.ingestion, services.runbookPrefix);
  }

  console.log(`\n🚨 ${alert.title} (${alert.severity})\n`);
  const checklist = await services.pipeline.processAlert(alert);

  console.log(`\n📋 ${checklist.summary}\n`);
  for (const step of checklist.steps) {
    console.log(`${step.order}. ${getPriorityLabel(step.priority)} ${step.description}`);
    for (const command of step.commands) {
      console.log(`     $ ${command}`);
    }
  }
  if (checklist.sourceRunbooks.length > 0) {
    console.log(`\n📚 Sources: ${checklist.sourceRunbooks.join(", ")}`);
  }

  await services.pipeline.drain();
}

main().catch((error: unknown) => {
  console.error("Processing failed:", error);
  process.exit(1);
});
