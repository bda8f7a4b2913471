import crypto from "node:crypto";

const CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export const CODE_RE = /^[A-Za-z\d]{4,10}$/;

export function genGameCode(len = 4): string {
  let out = "";
  for (let i = 0; i < len; i++) out += CODE_ALPHABET[crypto.randomInt(CODE_ALPHABET.length)];
  return out;
}

/** Codes are case-insensitive; the registry keys on the upper-case form. */
export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

export function genPlayerId(): string {
  return crypto.randomUUID();
}

export function genConnId(): string {
  return crypto.randomUUID();
}
