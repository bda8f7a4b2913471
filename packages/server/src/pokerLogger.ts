import type { FastifyBaseLogger } from "fastify";

export interface PokerLogEntry {
  tag: string;
  [key: string]: unknown;
}

function ts() {
  return new Date().toISOString();
}

const INFO_TAGS = new Set([
  "poker:game:create",
  "poker:game:remove",
  "poker:join",
  "poker:leave",
  "poker:disconnect",
  "poker:grace:expired",
  "poker:round:start",
  "poker:round:reveal",
  "poker:admin:changed",
]);

const WARN_TAGS = new Set([
  "poker:send_failed",
  "poker:join_rejected",
  "poker:rate_limited",
]);

// Debug-only entries are dropped entirely unless POKER_DEBUG is on.
const DEBUG_TAGS = new Set(["poker:incoming", "poker:broadcast", "poker:commandRejected"]);

/**
 * Routes a tagged entry to the matching level of the Fastify (pino) logger.
 */
export function logPoker(logger: FastifyBaseLogger, entry: PokerLogEntry, debug = false) {
  const payload = { ts: ts(), ...entry };
  try {
    if (entry.tag === "poker:error" || entry.err !== undefined) {
      logger.error(payload);
      return;
    }
    if (INFO_TAGS.has(entry.tag)) {
      logger.info(payload);
      return;
    }
    if (WARN_TAGS.has(entry.tag)) {
      logger.warn(payload);
      return;
    }
    if (DEBUG_TAGS.has(entry.tag)) {
      if (debug) logger.debug(payload);
      return;
    }
    // default: debug when enabled, otherwise info
    if (debug) {
      logger.debug(payload);
    } else {
      logger.info(payload);
    }
  } catch (e) {
    // a logger that throws must not take the caller down with it
    process.stderr.write(`poker logging failed: ${String(e)}\n`);
  }
}
