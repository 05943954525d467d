/**
 * Application entry point.
 *
 * 1. Parse configuration (dotenv is loaded by ./config).
 * 2. Build the OpenAI providers (OPENAI_API_KEY is required).
 * 3. Open the index directory and cache database and create the session registry.
 * 4. Serve the contract tools over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http, which also exposes /health).
 *
 * Configuration errors are fatal; everything after startup is reported per
 * tool call.
 */
import { getConfig } from "./config";
import { RagError } from "./errors";
import { logger } from "./logger";
import { createProviders, createRuntime } from "./runtime";
import { statusManager } from "./status";
import { createToolServer } from "./tools";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

async function main(): Promise<void> {
  const config = getConfig();
  if (config.VERBOSE) logger.level = "debug";

  const runtime = createRuntime(config, createProviders(config));
  statusManager.setModelNames(runtime.embeddings.getModelName(), runtime.generation.getModelName());
  statusManager.trackSessions(() => ({ active: runtime.registry.size, ready: runtime.registry.readyCount() }));

  const createServer = () =>
    createToolServer({ registry: runtime.registry, status: statusManager, documentsDir: config.DOCUMENTS_DIR });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    runtime.close();
    process.exit(0);
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";
  if (useHttp) {
    statusManager.markTransport("http");
    await startHttpTransport(createServer, {
      port: config.MCP_PORT,
      host: config.HOST,
      allowedHosts: config.ALLOWED_HOSTS,
      enableDnsRebindingProtection: config.ENABLE_DNS_REBINDING_PROTECTION,
      status: statusManager,
    });
  } else {
    statusManager.markTransport("stdio");
    await startStdioTransport(createServer);
  }
  statusManager.markReady();
}

main().catch((err: unknown) => {
  logger.fatal({ err: err instanceof RagError ? err.describe() : String(err) }, "startup failed");
  process.exit(1);
});
