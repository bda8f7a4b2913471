// packages/rules/src/aggregate.ts

import type { Card, Deck } from "./model";

export interface CardCount {
  label: string;
  count: number;
}

export interface VoteAggregate {
  /** Every revealed vote, abstentions included */
  voteCount: number;
  /** Votes that take part in the numeric figures */
  numericCount: number;
  average: number | null;
  min: number | null;
  max: number | null;
  distribution: CardCount[];
  distinctCount: number;
  consensus: boolean;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Summarises revealed votes. Players who did not vote are not passed in.
 * The distribution follows deck order when a deck is given, otherwise the
 * order in which labels first appear.
 */
export function computeAggregate(votes: Card[], deck?: Deck): VoteAggregate {
  const counts = new Map<string, number>();
  for (const card of votes) {
    counts.set(card.label, (counts.get(card.label) ?? 0) + 1);
  }

  const order = deck ? deck.cards.map((c) => c.label) : Array.from(counts.keys());
  const distribution: CardCount[] = [];
  for (const label of order) {
    const count = counts.get(label);
    if (count) distribution.push({ label, count });
  }

  const numeric = votes.filter((c) => !c.abstain).map((c) => c.value);
  const sum = numeric.reduce((acc, v) => acc + v, 0);

  return {
    voteCount: votes.length,
    numericCount: numeric.length,
    average: numeric.length > 0 ? round2(sum / numeric.length) : null,
    min: numeric.length > 0 ? Math.min(...numeric) : null,
    max: numeric.length > 0 ? Math.max(...numeric) : null,
    distribution,
    distinctCount: counts.size,
    consensus: votes.length > 0 && counts.size === 1,
  };
}
