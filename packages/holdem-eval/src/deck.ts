import { allRanks, allSuits, assertValidCardId, cardIdFromRankSuit, cardToDisplay, type CardId } from "./cards.js";
import { shuffleInPlace } from "./rng.js";

const LINE_CARDS = 10;

/**
 * A set of distinct cards with a dealing order. `deal()` takes from the end,
 * so shuffle before dealing for a random draw.
 */
export class Deck {
  private readonly order: CardId[];

  private constructor(cards: readonly CardId[]) {
    this.order = [];
    for (const c of cards) this.insert(c);
  }

  static full(): Deck {
    const cards: CardId[] = [];
    for (const suit of allSuits()) {
      for (const rank of allRanks()) cards.push(cardIdFromRankSuit(rank, suit));
    }
    return new Deck(cards);
  }

  static empty(): Deck {
    return new Deck([]);
  }

  get size(): number {
    return this.order.length;
  }

  isEmpty(): boolean {
    return this.order.length === 0;
  }

  contains(card: CardId): boolean {
    return this.order.includes(card);
  }

  /** Returns false when the card was already in the deck. */
  insert(card: CardId): boolean {
    assertValidCardId(card);
    if (this.contains(card)) return false;
    this.order.push(card);
    return true;
  }

  /** Returns false when the card was not in the deck. */
  remove(card: CardId): boolean {
    const idx = this.order.indexOf(card);
    if (idx === -1) return false;
    this.order.splice(idx, 1);
    return true;
  }

  cards(): CardId[] {
    return [...this.order];
  }

  shuffle(rand: () => number): this {
    shuffleInPlace(this.order, rand);
    return this;
  }

  deal(): CardId | null {
    return this.order.pop() ?? null;
  }

  toString(): string {
    const lines: string[] = [];
    for (let i = 0; i < this.order.length; i += LINE_CARDS) {
      lines.push(this.order.slice(i, i + LINE_CARDS).map(cardToDisplay).join(", "));
    }
    return lines.join("\n");
  }
}
