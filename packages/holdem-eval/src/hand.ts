import { cardFromCode, cardToDisplay, type CardId } from "./cards.js";
import { HoldemEvalError } from "./errors.js";
import { rankFive, rankHand } from "./evaluate.js";
import type { HandRank } from "./handRank.js";
import { handType, type StartingHandType } from "./handType.js";

export const MAX_HOLDEM_HAND_SIZE = 7;

/** Ordered hole + board cards of one player, at most seven. */
export class Hand implements Iterable<CardId> {
  private readonly list: CardId[];

  private constructor(cards: readonly CardId[]) {
    this.list = [];
    this.extend(cards);
  }

  static fromCards(cards: readonly CardId[]): Hand {
    return new Hand(cards);
  }

  static fromCodes(codes: readonly string[]): Hand {
    return new Hand(codes.map(cardFromCode));
  }

  get length(): number {
    return this.list.length;
  }

  get cards(): readonly CardId[] {
    return this.list;
  }

  isEmpty(): boolean {
    return this.list.length === 0;
  }

  at(index: number): CardId | undefined {
    return this.list[index];
  }

  push(card: CardId): this {
    if (this.list.length >= MAX_HOLDEM_HAND_SIZE) {
      throw new HoldemEvalError(
        "HOLDEM_HAND_SIZE",
        `Holdem hands never hold more than ${MAX_HOLDEM_HAND_SIZE} cards.`,
        { size: this.list.length + 1 }
      );
    }
    this.list.push(card);
    return this;
  }

  extend(cards: Iterable<CardId>): this {
    for (const card of cards) this.push(card);
    return this;
  }

  remove(index: number): this {
    if (!Number.isInteger(index) || index < 0 || index >= this.list.length) {
      throw new RangeError(`Invalid card index ${index} for a hand of ${this.list.length}.`);
    }
    this.list.splice(index, 1);
    return this;
  }

  truncate(length: number): this {
    if (length < this.list.length) this.list.length = Math.max(0, length);
    return this;
  }

  rank(): HandRank {
    return rankHand(this.list);
  }

  rankFive(): HandRank {
    return rankFive(this.list);
  }

  handType(): StartingHandType {
    return handType(this.list);
  }

  [Symbol.iterator](): Iterator<CardId> {
    return this.list[Symbol.iterator]();
  }

  toString(): string {
    return this.list.map(cardToDisplay).join(", ");
  }
}
