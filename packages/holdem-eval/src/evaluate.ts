import { assertValidCardId, cardRank, cardSuit, type CardId } from "./cards.js";
import { bestHandIndices, HandCategory, type HandRank } from "./handRank.js";

// Ranks occupy bits 0 (deuce) .. 12 (ace); grouped payloads shift the group above them.
const GROUP_SHIFT = 13;

// A-2-3-4-5
const WHEEL = 0b1_0000_0000_1111;

type RankCounts = {
  /** Bit r set iff rank r occurs exactly k times, for k = 0..4. */
  countToValue: number[];
  /** One 13-bit rank mask per suit. */
  suitMasks: number[];
  /** Every rank present, ignoring multiplicity. */
  present: number;
};

function popcount(mask: number): number {
  let n = 0;
  let m = mask;
  while (m !== 0) {
    m &= m - 1;
    n += 1;
  }
  return n;
}

function keepHighest(mask: number): number {
  if (mask === 0) return 0;
  return 1 << (31 - Math.clz32(mask));
}

function keepN(mask: number, n: number): number {
  let result = mask;
  while (popcount(result) > n) {
    result &= result - 1;
  }
  return result;
}

/**
 * Straight rank of a 13-bit rank mask: 0 for the wheel, 1 for six-high up to
 * 9 for ace-high, or null when no five consecutive ranks are present.
 */
function straightRank(mask: number): number | null {
  const runs = mask & (mask << 1) & (mask << 2) & (mask << 3) & (mask << 4);
  if (runs !== 0) {
    // Surviving bits sit on the top card of each run; the highest wins.
    return 31 - Math.clz32(runs) - 3;
  }
  if ((mask & WHEEL) === WHEEL) return 0;
  return null;
}

function computeCounts(cards: readonly CardId[]): RankCounts {
  const valueToCount = new Array<number>(13).fill(0);
  const suitMasks = [0, 0, 0, 0];
  let present = 0;

  for (const card of cards) {
    const bit = cardRank(card) - 2;
    present |= 1 << bit;
    valueToCount[bit] += 1;
    suitMasks[cardSuit(card)] |= 1 << bit;
  }

  const countToValue = [0, 0, 0, 0, 0];
  for (let bit = 0; bit < valueToCount.length; bit += 1) {
    countToValue[valueToCount[bit]] |= 1 << bit;
  }

  return { countToValue, suitMasks, present };
}

function handRank(category: HandCategory, value: number): HandRank {
  return { category, value };
}

function grouped(category: HandCategory, group: number, kickers: number): HandRank {
  return handRank(category, (group << GROUP_SHIFT) | kickers);
}

/**
 * Ranks the best five-card hand out of 5, 6 or 7 cards.
 *
 * Works on rank bitmasks instead of enumerating five-card subsets. Cards are
 * assumed distinct; duplicates are not detected.
 */
export function rankHand(cards: readonly CardId[]): HandRank {
  const { countToValue, suitMasks, present } = computeCounts(cards);

  const flushMask = suitMasks.find((mask) => popcount(mask) >= 5);
  if (flushMask !== undefined) {
    const straightFlush = straightRank(flushMask);
    if (straightFlush !== null) return handRank(HandCategory.StraightFlush, straightFlush);
    return handRank(HandCategory.Flush, keepN(flushMask, 5));
  }

  const quads = countToValue[4];
  const trips = countToValue[3];
  const pairs = countToValue[2];

  if (quads !== 0) {
    return grouped(HandCategory.FourOfAKind, quads, keepHighest(present ^ quads));
  }

  if (popcount(trips) >= 2) {
    const set = keepHighest(trips);
    return grouped(HandCategory.FullHouse, set, keepHighest(trips ^ set));
  }

  if (trips !== 0 && pairs !== 0) {
    return grouped(HandCategory.FullHouse, trips, keepHighest(pairs));
  }

  const straight = straightRank(present);
  if (straight !== null) return handRank(HandCategory.Straight, straight);

  if (trips !== 0) {
    return grouped(HandCategory.ThreeOfAKind, trips, keepN(present ^ trips, 2));
  }

  if (popcount(pairs) >= 2) {
    const topPairs = keepN(pairs, 2);
    return grouped(HandCategory.TwoPair, topPairs, keepHighest(present ^ topPairs));
  }

  if (pairs !== 0) {
    return grouped(HandCategory.OnePair, pairs, keepN(present ^ pairs, 3));
  }

  return handRank(HandCategory.HighCard, keepN(present, 5));
}

/**
 * Ranks exactly five cards. With five cards the number of distinct ranks
 * settles the category, apart from the straight and flush checks.
 */
export function rankFive(cards: readonly CardId[]): HandRank {
  const { countToValue, suitMasks, present } = computeCounts(cards);

  switch (popcount(present)) {
    case 5: {
      const isFlush = suitMasks.some((mask) => popcount(mask) === 5);
      const straight = straightRank(present);
      if (straight !== null) {
        return handRank(isFlush ? HandCategory.StraightFlush : HandCategory.Straight, straight);
      }
      return handRank(isFlush ? HandCategory.Flush : HandCategory.HighCard, present);
    }
    case 4:
      return grouped(HandCategory.OnePair, countToValue[2], present ^ countToValue[2]);
    case 3:
      if (countToValue[3] !== 0) {
        return grouped(HandCategory.ThreeOfAKind, countToValue[3], present ^ countToValue[3]);
      }
      return grouped(HandCategory.TwoPair, countToValue[2], present ^ countToValue[2]);
    case 2:
      if (countToValue[3] !== 0) {
        return grouped(HandCategory.FullHouse, countToValue[3], present ^ countToValue[3]);
      }
      return grouped(HandCategory.FourOfAKind, countToValue[4], present ^ countToValue[4]);
    default:
      throw new RangeError(`rankFive expected 5 cards, got ${cards.length}.`);
  }
}

function assertDistinct(cards: readonly CardId[], label: string): void {
  const seen = new Set<number>();
  for (const c of cards) {
    assertValidCardId(c);
    if (seen.has(c)) {
      throw new RangeError(`${label} contains duplicate card id ${c}.`);
    }
    seen.add(c);
  }
}

/** Showdown: the seats holding the best seven-card hand, ascending. */
export function winners(
  board5: readonly CardId[],
  holeCardsBySeat: Readonly<Record<number, readonly [CardId, CardId]>>
): number[] {
  if (board5.length !== 5) {
    throw new RangeError(`winners expected 5 board cards, got ${board5.length}.`);
  }
  assertDistinct(board5, "board5");

  const entries = Object.entries(holeCardsBySeat)
    .map(([seatStr, hole]) => ({ seat: Number(seatStr), hole }))
    .filter((e) => Number.isInteger(e.seat))
    .sort((a, b) => a.seat - b.seat);

  const ranks = entries.map(({ seat, hole }) => {
    if (!Array.isArray(hole) || hole.length !== 2) {
      throw new TypeError(`Invalid hole cards for seat ${seat}; expected [c1, c2].`);
    }
    const seven = [...board5, hole[0], hole[1]];
    assertDistinct(seven, `seat ${seat} cards`);
    return rankHand(seven);
  });

  return bestHandIndices(ranks).map((i) => entries[i].seat);
}
