import { readFile } from "node:fs/promises";
import path from "node:path";
import { DeckCatalog } from "poker-rules";
import { DeckFileSchema } from "./schemas";

/**
 * Reads and validates the deck configuration. Relative paths resolve against
 * the server package directory.
 */
export async function loadDeckCatalog(
  filePath: string,
  defaultDeckId?: number
): Promise<DeckCatalog> {
  const resolved = path.isAbsolute(filePath)
    ? filePath
    : path.resolve(__dirname, "..", filePath);

  const raw: unknown = JSON.parse(await readFile(resolved, "utf8"));
  const parsed = DeckFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid deck file ${resolved}: ${parsed.error.message}`);
  }

  return new DeckCatalog(parsed.data.decks, defaultDeckId ?? parsed.data.defaultDeckId);
}
