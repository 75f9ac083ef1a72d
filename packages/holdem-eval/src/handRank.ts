export enum HandCategory {
  HighCard = 0,
  OnePair = 1,
  TwoPair = 2,
  ThreeOfAKind = 3,
  Straight = 4,
  Flush = 5,
  FullHouse = 6,
  FourOfAKind = 7,
  StraightFlush = 8
}

export const HAND_CATEGORY_NAMES: Readonly<Record<HandCategory, string>> = {
  [HandCategory.HighCard]: "High Card",
  [HandCategory.OnePair]: "One Pair",
  [HandCategory.TwoPair]: "Two Pair",
  [HandCategory.ThreeOfAKind]: "Three of a Kind",
  [HandCategory.Straight]: "Straight",
  [HandCategory.Flush]: "Flush",
  [HandCategory.FullHouse]: "Full House",
  [HandCategory.FourOfAKind]: "Four of a Kind",
  [HandCategory.StraightFlush]: "Straight Flush"
};

export type HandRank = Readonly<{
  category: HandCategory;
  /**
   * Tie-break payload within the category. Rank bits are indexed 0 (deuce)
   * through 12 (ace).
   * - Straight / StraightFlush: 0 (wheel) .. 9 (ace high)
   * - Flush / HighCard: bitset of the five ranks played
   * - grouped hands: (groupBits << 13) | kickerBits
   */
  value: number;
}>;

export function compareHandRank(a: HandRank, b: HandRank): -1 | 0 | 1 {
  if (a.category !== b.category) {
    return a.category < b.category ? -1 : 1;
  }
  if (a.value !== b.value) {
    return a.value < b.value ? -1 : 1;
  }
  return 0;
}

/** Indices of every rank tied for the best, ascending. */
export function bestHandIndices(ranks: readonly HandRank[]): number[] {
  let best: HandRank | null = null;
  let indices: number[] = [];

  for (let i = 0; i < ranks.length; i += 1) {
    const rank = ranks[i];
    if (best === null) {
      best = rank;
      indices = [i];
      continue;
    }
    const cmp = compareHandRank(rank, best);
    if (cmp === 1) {
      best = rank;
      indices = [i];
    } else if (cmp === 0) {
      indices.push(i);
    }
  }

  return indices;
}

export function describeHandRank(rank: HandRank): string {
  return HAND_CATEGORY_NAMES[rank.category];
}
