// packages/server/src/index.ts

import Fastify from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import type { DeckCatalog } from "poker-rules";
import { loadConfig, type AppConfig } from "./config";
import { loadDeckCatalog } from "./decks";
import { PokerEngine } from "./engine";
import { GameRegistry } from "./registry";
import { registerRoutes } from "./routes";
import { registerPokerWebSocket } from "./ws";

function isLocalDevOrigin(origin: string): boolean {
  return /^http:\/\/(localhost|127\.0\.0\.1|0\.0\.0\.0|\[::1\])(:\d+)?$/.test(
    origin
  );
}

export interface BuildServerOptions {
  /** Skips reading `config.decksPath`. */
  decks?: DeckCatalog;
  generateCode?: () => string;
  logger?: boolean;
}

export async function buildServer(
  config: AppConfig = loadConfig(),
  options: BuildServerOptions = {}
) {
  const server = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });

  const allow = new Set(config.corsOrigins);

  await server.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      if (allow.has(origin)) return cb(null, true);
      if (isLocalDevOrigin(origin)) return cb(null, true);
      cb(new Error("Not allowed by CORS"), false);
    },
    credentials: true,
  });

  await server.register(websocket, {
    options: { maxPayload: config.wsMaxPayloadBytes },
  });

  const decks =
    options.decks ?? (await loadDeckCatalog(config.decksPath, config.defaultDeckId));
  const registry = new GameRegistry({ decks, generateCode: options.generateCode });
  const engine = new PokerEngine({
    registry,
    logger: server.log,
    reconnectGraceMs: config.reconnectGraceMs,
    maxPayloadBytes: config.wsMaxPayloadBytes,
    rateLimitWindowMs: config.wsRateLimitWindowMs,
    rateLimitMaxMessages: config.wsRateLimitMaxMessages,
    debug: config.debug,
  });

  server.addHook("onClose", async () => {
    engine.shutdown();
  });

  await registerRoutes(server, registry, { debug: config.debug });
  registerPokerWebSocket(server, engine);

  return server;
}

async function start() {
  const config = loadConfig();

  const server = await buildServer(config);
  try {
    const address = await server.listen({ port: config.port, host: config.host });
    server.log.info(`server listening on ${address}`);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

if (require.main === module) {
  void start();
}
