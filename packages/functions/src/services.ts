import {
  createServices,
  loadConfig,
  runStartupIngestion,
  type Services,
} from "@runbook-synthesizer/core";

let services: Promise<Services> | null = null;

async function initialize(): Promise<Services> {
  const config = loadConfig();
  const created = await createServices(config);

  if (config.ingestOnStartup) {
    await runStartupIngestion(created.ingestion, created.runbookPrefix);
  }

  return created;
}

/**
 * Services are built once per Lambda container, on first use
 */
export function getServices(): Promise<Services> {
  if (!services) {
    services = initialize().catch((error: unknown) => {
      // Let the next invocation retry a failed cold start
      services = null;
      throw error;
    });
  }
  return services;
}
