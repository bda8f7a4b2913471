// packages/server/src/routes.ts

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { UnknownDeckError } from "poker-rules";
import { z } from "zod";
import { logPoker } from "./pokerLogger";
import type { GameRegistry } from "./registry";
import { CREATE_KEY } from "./roomQueue";
import { CreateGameBodySchema, DeckParamsSchema, GameParamsSchema } from "./schemas";

function sendValidationError(reply: FastifyReply, error: z.ZodError) {
  reply.code(400).send({ error: "Invalid request", details: error.flatten() });
}

export interface RouteOptions {
  debug?: boolean;
}

export async function registerRoutes(
  server: FastifyInstance,
  registry: GameRegistry,
  options: RouteOptions = {}
) {
  server.get("/", async () => ({
    name: "poker-server",
    version: process.env.npm_package_version ?? "unknown",
  }));

  server.get("/health", async () => ({ ok: true, games: registry.size }));

  server.get("/api/decks", async () => registry.decks.listDecks());

  server.get(
    "/api/decks/:id",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = DeckParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }

      try {
        reply.send(registry.decks.getDeck(parsed.data.id));
      } catch (err) {
        if (!(err instanceof UnknownDeckError)) throw err;
        reply.code(404).send({ error: "Deck not found" });
      }
    }
  );

  server.get("/api/games", async () => registry.listSummaries());

  server.post(
    "/api/games",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = CreateGameBodySchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }

      const summary = await registry.queue.enqueue(CREATE_KEY, () =>
        registry.summary(registry.createGame(parsed.data))
      );
      logPoker(
        server.log,
        { tag: "poker:game:create", code: summary.code, deckId: summary.deckId },
        options.debug
      );

      reply.code(201).send({
        code: summary.code,
        name: summary.name,
        deckId: summary.deckId,
      });
    }
  );

  server.get(
    "/api/games/:code",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = GameParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }

      const session = registry.findSession(parsed.data.code);
      if (!session) {
        reply.code(404).send({ error: "Game not found" });
        return;
      }
      reply.send(registry.summary(session.code));
    }
  );
}
