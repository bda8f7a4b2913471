// packages/server/src/schemas.ts

import { z } from "zod";
import { CODE_RE } from "./ids";

export const GameCodeSchema = z.string().trim().regex(CODE_RE);

export const CardSchema = z.object({
  label: z.string().min(1).max(16),
  value: z.number().finite(),
  abstain: z.boolean().optional(),
});

export const DeckSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  cards: z.array(CardSchema).min(1),
});

export const DeckFileSchema = z.object({
  defaultDeckId: z.number().int().positive().optional(),
  decks: z.array(DeckSchema).min(1),
});

export const CreateGameBodySchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  deckId: z.number().int().positive().optional(),
});

export const DeckParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const GameParamsSchema = z.object({
  code: GameCodeSchema,
});

export const JoinMessageSchema = z.object({
  type: z.literal("join"),
  code: GameCodeSchema,
  playerId: z.string().min(1).max(64).optional(),
  name: z.string().max(50).optional(),
});

export const LeaveMessageSchema = z.object({
  type: z.literal("leave"),
});

export const CastVoteMessageSchema = z.object({
  type: z.literal("castVote"),
  card: CardSchema.pick({ label: true, value: true }),
});

export const StartRoundMessageSchema = z.object({
  type: z.literal("startRound"),
  ticketUrl: z.string().url().max(2048).nullable().optional(),
});

export const RevealMessageSchema = z.object({
  type: z.literal("reveal"),
});

export const ObserveMessageSchema = z.object({
  type: z.literal("observe"),
});

export const SyncMessageSchema = z.object({
  type: z.literal("sync"),
});

export const ClientMessageSchema = z.discriminatedUnion("type", [
  JoinMessageSchema,
  LeaveMessageSchema,
  CastVoteMessageSchema,
  StartRoundMessageSchema,
  RevealMessageSchema,
  ObserveMessageSchema,
  SyncMessageSchema,
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type CreateGameBody = z.infer<typeof CreateGameBodySchema>;
export type DeckFile = z.infer<typeof DeckFileSchema>;
