// packages/rules/src/deckCatalog.ts

import type { Card, Deck, DeckSummary } from "./model";
import { UnknownDeckError } from "./errors";

function freezeDeck(deck: Deck): Deck {
  const cards = deck.cards.map((card) => Object.freeze({ ...card }));
  return Object.freeze({ ...deck, cards: Object.freeze(cards) });
}

/**
 * Immutable lookup of card decks by ID.
 * Falling back to the default deck is the caller's decision.
 */
export class DeckCatalog {
  private readonly decks = new Map<number, Deck>();
  private readonly defaultId: number;

  constructor(decks: Deck[], defaultDeckId?: number) {
    if (decks.length === 0) {
      throw new Error("Deck catalog needs at least one deck");
    }
    for (const deck of decks) {
      if (this.decks.has(deck.id)) {
        throw new Error(`Duplicate deck ID ${deck.id}`);
      }
      if (deck.cards.length === 0) {
        throw new Error(`Deck ${deck.id} has no cards`);
      }
      this.decks.set(deck.id, freezeDeck(deck));
    }

    this.defaultId = defaultDeckId ?? decks[0].id;
    if (!this.decks.has(this.defaultId)) {
      throw new UnknownDeckError(this.defaultId);
    }
  }

  getDeck(id: number): Deck {
    const deck = this.decks.get(id);
    if (!deck) {
      throw new UnknownDeckError(id);
    }
    return deck;
  }

  defaultDeck(): Deck {
    return this.getDeck(this.defaultId);
  }

  listDecks(): DeckSummary[] {
    return Array.from(this.decks.values()).map((deck) => ({
      id: deck.id,
      name: deck.name,
      cardCount: deck.cards.length,
    }));
  }
}

export function findCard(deck: Deck, candidate: Pick<Card, "label" | "value">): Card | null {
  return (
    deck.cards.find(
      (card) => card.label === candidate.label && card.value === candidate.value
    ) ?? null
  );
}
