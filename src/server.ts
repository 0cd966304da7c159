/**
 * Application entry point for the court forms search service.
 *
 * Validates the OpenAI configuration, wires the container, and starts two
 * listeners: the REST API (plus the static question page) and the JSON-RPC
 * tool endpoint.
 */
import type { Server } from "http";

import { config } from "@config/index";
import { createContainer } from "@infrastructure/container";
import {
  assertOpenAIKey,
  checkEmbeddingConnectivity,
} from "@infrastructure/llm/OpenAIAdapter";
import { logger } from "@infrastructure/logging/Logger";
import { createHttpApp } from "@interfaces/http/createHttpApp";
import { createRpcApp } from "@interfaces/rpc/createRpcApp";
import { describeError } from "@typesLocal/AppError";

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function main(): Promise<void> {
  assertOpenAIKey(config.openai.key);

  const container = await createContainer(config);

  await checkEmbeddingConnectivity(
    container.openai,
    config.openai.embeddingModel,
    config.embedding.dimensions
  );

  const httpApp = createHttpApp({
    ask: container.ask,
    search: container.search,
    crawl: container.crawl,
    catalog: container.catalog,
    embeddingModel: config.openai.embeddingModel,
    publicDir: config.http.publicDir,
  });

  const httpServer = httpApp.listen(config.port, () => {
    logger.log("info", "HTTP server listening", {
      url: `http://localhost:${config.port}`,
      env: config.env,
      store: config.store.driver,
      embeddingModel: config.openai.embeddingModel,
    });
  });

  const rpcServer = createRpcApp(container.search).listen(config.rpcPort, () => {
    logger.log("info", "JSON-RPC server listening", {
      url: `http://localhost:${config.rpcPort}`,
    });
  });

  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.log("info", "Shutting down", { signal });

    try {
      await Promise.all([closeServer(httpServer), closeServer(rpcServer)]);
      await container.close();
      process.exit(0);
    } catch (error: unknown) {
      logger.log("error", "Shutdown failed", describeError(error));
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.log("error", "Startup failed", describeError(error));
  process.exit(1);
});
