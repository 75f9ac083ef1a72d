import { HoldemEvalError } from "./errors.js";

export type CardId = number; // 0..51

// 0 = clubs, 1 = diamonds, 2 = hearts, 3 = spades
export type Suit = 0 | 1 | 2 | 3;

export type Rank =
  | 2
  | 3
  | 4
  | 5
  | 6
  | 7
  | 8
  | 9
  | 10
  | 11
  | 12
  | 13
  | 14; // 14 = Ace

export const ACE: Rank = 14;

const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];
const SUITS: readonly Suit[] = [0, 1, 2, 3];

const RANK_CHARS = ["2", "3", "4", "5", "6", "7", "8", "9", "T", "J", "Q", "K", "A"] as const;
const SUIT_CHARS = ["C", "D", "H", "S"] as const;
const SUIT_ICONS = ["♣", "♦", "♥", "♠"] as const;

export function isRank(n: number): n is Rank {
  return Number.isInteger(n) && n >= 2 && n <= 14;
}

export function isSuit(n: number): n is Suit {
  return Number.isInteger(n) && n >= 0 && n <= 3;
}

export function allRanks(): readonly Rank[] {
  return RANKS;
}

export function allSuits(): readonly Suit[] {
  return SUITS;
}

export function rankFromChar(c: string): Rank | null {
  const idx = RANK_CHARS.indexOf(c.toUpperCase() as (typeof RANK_CHARS)[number]);
  return idx === -1 ? null : RANKS[idx] ?? null;
}

export function rankToChar(rank: Rank): string {
  return RANK_CHARS[rank - 2];
}

export function suitFromChar(c: string): Suit | null {
  const idx = SUIT_CHARS.indexOf(c.toUpperCase() as (typeof SUIT_CHARS)[number]);
  return idx === -1 ? null : SUITS[idx] ?? null;
}

export function suitToChar(suit: Suit): string {
  return SUIT_CHARS[suit];
}

export function suitToIcon(suit: Suit): string {
  return SUIT_ICONS[suit];
}

/** Absolute distance between two ranks. */
export function rankGap(a: Rank, b: Rank): number {
  return Math.abs(a - b);
}

/** Steps from `rank` up to the Ace (0 for an Ace). */
export function rankGapToAce(rank: Rank): number {
  return ACE - rank;
}

/** The rank `steps` above `rank`; throws past the Ace. */
export function rankAbove(rank: Rank, steps: number): Rank {
  const r = rank + steps;
  if (!isRank(r)) {
    throw new RangeError(`Rank ${rank} + ${steps} is outside [2, 14].`);
  }
  return r;
}

export function assertValidCardId(card: CardId): void {
  if (!Number.isInteger(card) || card < 0 || card > 51) {
    throw new RangeError(`Invalid card id ${card}; expected integer in [0, 51].`);
  }
}

export function cardSuit(card: CardId): Suit {
  assertValidCardId(card);
  const suit = Math.floor(card / 13);
  if (!isSuit(suit)) {
    throw new RangeError(`Invalid card id ${card}; expected integer in [0, 51].`);
  }
  return suit;
}

export function cardRank(card: CardId): Rank {
  assertValidCardId(card);
  const rank = (card % 13) + 2;
  if (!isRank(rank)) {
    throw new RangeError(`Invalid card id ${card}; expected integer in [0, 51].`);
  }
  return rank;
}

export function cardIdFromRankSuit(rank: Rank, suit: Suit): CardId {
  if (!isRank(rank)) {
    throw new RangeError(`Invalid rank ${rank}; expected integer in [2, 14].`);
  }
  if (!isSuit(suit)) {
    throw new RangeError(`Invalid suit ${suit}; expected integer in [0, 3].`);
  }
  const rankIndex = rank - 2; // 0..12
  return suit * 13 + rankIndex;
}

/**
 * Parses a two-letter card code, suit first: "SA", "h9", "dT".
 *
 * Both characters are case-insensitive. A code that is not exactly two
 * characters long fails with `UNEXPECTED_CARD_CHAR`.
 */
export function cardFromCode(code: string): CardId {
  if (typeof code !== "string" || code.length !== 2) {
    throw new HoldemEvalError(
      "UNEXPECTED_CARD_CHAR",
      `Invalid card code ${JSON.stringify(code)}; expected like "SA" or "h9".`,
      { code }
    );
  }

  const suitChar = code.charAt(0);
  const rankChar = code.charAt(1);

  const suit = suitFromChar(suitChar);
  if (suit === null) {
    throw new HoldemEvalError(
      "UNEXPECTED_SUIT_CHAR",
      `Invalid suit character ${JSON.stringify(suitChar)} in ${JSON.stringify(code)}.`,
      { code }
    );
  }

  const rank = rankFromChar(rankChar);
  if (rank === null) {
    throw new HoldemEvalError(
      "UNEXPECTED_RANK_CHAR",
      `Invalid rank character ${JSON.stringify(rankChar)} in ${JSON.stringify(code)}.`,
      { code }
    );
  }

  return cardIdFromRankSuit(rank, suit);
}

export function cardToCode(card: CardId): string {
  return `${suitToChar(cardSuit(card))}${rankToChar(cardRank(card))}`;
}

export function cardToDisplay(card: CardId): string {
  return `${suitToIcon(cardSuit(card))}${rankToChar(cardRank(card))}`;
}
