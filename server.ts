/**
 * bucketd - Server
 *
 * Usage:
 *   tsx server.ts                          # sqlite database at ./bucketd.db, port 8080
 *   tsx server.ts --db data/kv.db --port 9000
 *   tsx server.ts --memory                 # in-memory engine, nothing persisted
 *   tsx server.ts --config bucketd.yaml    # YAML or JSON config file
 */

import { readFileSync } from "node:fs";
import { createServer } from "node:https";
import { serve } from "@hono/node-server";
import { Command } from "commander";
import { createApp } from "./src/app.ts";
import { bootstrapEngine, openEngine } from "./src/bootstrap.ts";
import { type AppConfig, loadConfig } from "./src/config.ts";
import { createEtagProvider } from "./src/http/etag.ts";
import { createConsoleLogger } from "./src/logger.ts";

type CliOptions = {
  db?: string;
  port?: string;
  config?: string;
  memory?: boolean;
};

const logger = createConsoleLogger();

// ============================================================================
// Helpers
// ============================================================================

const parsePort = (value: string | undefined): number | undefined => {
  if (value === undefined) return undefined;
  const port = Number.parseInt(value, 10);
  if (Number.isNaN(port)) {
    throw new Error(`invalid port: ${value}`);
  }
  return port;
};

const startServer = async (config: AppConfig): Promise<void> => {
  const engine = openEngine(config.storage);
  const metadata = bootstrapEngine(engine);
  const etags = await createEtagProvider();

  const app = createApp({
    config,
    engine,
    metadata,
    etags,
    clock: () => new Date(),
    logger,
  });

  const { port, host } = config.server;
  const tls = config.tls;
  const server = tls
    ? serve({
        fetch: app.fetch,
        port,
        hostname: host,
        createServer,
        serverOptions: {
          cert: readFileSync(tls.certFile),
          key: readFileSync(tls.keyFile),
        },
      })
    : serve({ fetch: app.fetch, port, hostname: host });

  logger.info(`Listening on ${tls ? "https" : "http"}://${host}:${port}`);
  logger.info(
    `Storage: ${config.storage.engine === "memory" ? "in-memory" : `sqlite (${config.storage.path})`}`
  );
  logger.info(`CSRF protection: ${config.csrf.key ? "on" : "off"}`);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      engine.close();
      process.exit(0);
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

// ============================================================================
// Main
// ============================================================================

const program = new Command();

program
  .name("bucketd")
  .description("Hierarchical key/value store served over HTTP")
  .option("--db <path>", "sqlite database file")
  .option("--port <number>", "port to serve from")
  .option("--config <file>", "config file (YAML or JSON)")
  .option("--memory", "use the in-memory engine")
  .action(async (options: CliOptions) => {
    try {
      const config = loadConfig({
        file: options.config,
        overrides: {
          db: options.db,
          port: parsePort(options.port),
          memory: options.memory,
        },
      });
      await startServer(config);
    } catch (err) {
      logger.error("fatal", { error: err });
      process.exit(1);
    }
  });

await program.parseAsync(process.argv);
