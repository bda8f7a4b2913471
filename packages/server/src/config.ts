// packages/server/src/config.ts

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  corsOrigins: string[];
  decksPath: string;
  defaultDeckId: number | undefined;
  reconnectGraceMs: number;
  wsMaxPayloadBytes: number;
  wsRateLimitWindowMs: number;
  wsRateLimitMaxMessages: number;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

function mustInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const v = Number(raw);
  if (!Number.isFinite(v)) return fallback;
  return Math.trunc(v);
}

function optionalInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  const v = Number(raw);
  return Number.isInteger(v) ? v : undefined;
}

function flag(env: Env, name: string): boolean {
  const raw = env[name];
  return raw === "1" || raw === "true";
}

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://127.0.0.1:5173"];

function parseOrigins(env: Env): string[] {
  const extra = (env.POKER_CORS_URLS ?? "")
    .split(",")
    .map((url) => url.trim())
    .filter(Boolean);
  const all = [...DEFAULT_ORIGINS, env.WEB_ORIGIN, ...extra].filter(
    (origin): origin is string => !!origin
  );
  return Array.from(new Set(all));
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: mustInt(env, "PORT", 3000),
    host: env.HOST || "0.0.0.0",
    logLevel: env.LOG_LEVEL || "info",
    corsOrigins: parseOrigins(env),
    decksPath: env.DECKS_PATH || "conf/decks.json",
    defaultDeckId: optionalInt(env, "DEFAULT_DECK_ID"),
    reconnectGraceMs: mustInt(env, "RECONNECT_GRACE_MS", 45_000),
    wsMaxPayloadBytes: mustInt(env, "WS_MAX_PAYLOAD_BYTES", 16 * 1024),
    wsRateLimitWindowMs: mustInt(env, "WS_RATE_LIMIT_WINDOW_MS", 1000),
    wsRateLimitMaxMessages: mustInt(env, "WS_RATE_LIMIT_MAX_MESSAGES", 30),
    debug: flag(env, "POKER_DEBUG"),
  };
}
