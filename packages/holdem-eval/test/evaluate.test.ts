import { describe, expect, test } from "vitest";
import { Hand as SolverHand } from "pokersolver";

import {
  Deck,
  HandCategory,
  bestHandIndices,
  cardFromCode,
  cardRank,
  cardSuit,
  compareHandRank,
  describeHandRank,
  mulberry32,
  rankFive,
  rankHand,
  rankToChar,
  winners,
  type CardId,
  type HandRank
} from "../src/index.js";

function cs(s: string): number[] {
  return s
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map(cardFromCode);
}

// Rank bit as used in tie-break payloads: deuce = 0 .. ace = 12.
function bit(rankChar: string): number {
  return 1 << (cardRank(cardFromCode(`S${rankChar}`)) - 2);
}

function subsets(cards: readonly CardId[], size: number): CardId[][] {
  if (size === 0) return [[]];
  if (cards.length < size) return [];
  const [first, ...rest] = cards;
  return [...subsets(rest, size - 1).map((s) => [first, ...s]), ...subsets(rest, size)];
}

function bestOfFives(cards: readonly CardId[]): HandRank {
  let best: HandRank | null = null;
  for (const five of subsets(cards, 5)) {
    const rank = rankFive(five);
    if (best === null || compareHandRank(rank, best) === 1) best = rank;
  }
  if (best === null) throw new Error("need at least 5 cards");
  return best;
}

function solverCode(c: CardId): string {
  // pokersolver expects uppercase rank, lowercase suit (e.g. "As")
  return `${rankToChar(cardRank(c))}${"cdhs".charAt(cardSuit(c))}`;
}

describe("rankFive known-answer", () => {
  test("high card keeps all five ranks", () => {
    const r = rankFive(cs("DA H8 C9 CT C5"));
    expect(r).toEqual({ category: HandCategory.HighCard, value: 4552 });
  });

  test("flush", () => {
    const r = rankFive(cs("DA D8 D9 DT D5"));
    expect(r).toEqual({ category: HandCategory.Flush, value: 4552 });
  });

  test("full house", () => {
    const r = rankFive(cs("DA CA D9 C9 S9"));
    expect(r).toEqual({ category: HandCategory.FullHouse, value: (bit("9") << 13) | bit("A") });
  });

  test("two pair", () => {
    const r = rankFive(cs("DA CA D9 C9 ST"));
    expect(r).toEqual({ category: HandCategory.TwoPair, value: ((bit("A") | bit("9")) << 13) | bit("T") });
  });

  test("one pair", () => {
    const r = rankFive(cs("DA CA D9 C8 ST"));
    expect(r).toEqual({ category: HandCategory.OnePair, value: 33554880 });
  });

  test("three of a kind", () => {
    const r = rankFive(cs("C2 S2 H2 S5 D6"));
    expect(r).toEqual({ category: HandCategory.ThreeOfAKind, value: 8216 });
  });

  test("four of a kind", () => {
    const r = rankFive(cs("DA CA SA HA ST"));
    expect(r).toEqual({ category: HandCategory.FourOfAKind, value: 33554688 });
  });

  test("royal flush is the highest straight flush", () => {
    const r = rankFive(cs("DA DK DQ DJ DT"));
    expect(r).toEqual({ category: HandCategory.StraightFlush, value: 9 });
  });

  test("wheel ranks below a six-high straight", () => {
    const wheel = rankFive(cs("D2 C3 S4 H5 SA"));
    const sixHigh = rankFive(cs("C2 S3 H4 S5 D6"));
    expect(wheel).toEqual({ category: HandCategory.Straight, value: 0 });
    expect(sixHigh).toEqual({ category: HandCategory.Straight, value: 1 });
    expect(compareHandRank(wheel, sixHigh)).toBe(-1);
  });
});

describe("rankHand known-answer", () => {
  test("ace-high straight flush over the nine-high one", () => {
    const r = rankHand(cs("DA DK DQ DJ DT D9 D8"));
    expect(r).toEqual({ category: HandCategory.StraightFlush, value: 9 });
  });

  test("wheel straight flush beats the plain straight", () => {
    const r = rankHand(cs("D2 D3 D4 D5 H6 C7 DA"));
    expect(r).toEqual({ category: HandCategory.StraightFlush, value: 0 });
  });

  test("six-high straight flush over the wheel", () => {
    const r = rankHand(cs("D6 DK DA D2 D5 D4 D3"));
    expect(r).toEqual({ category: HandCategory.StraightFlush, value: 1 });
  });

  test("straights from six-high to ace-high", () => {
    const straights = [
      "H2 C3 S4 D5 D6 S6 HK",
      "C3 S4 D5 D6 H7 ST HK",
      "S4 D5 D6 H7 C8 ST HK",
      "C5 C6 H7 H8 D9 HA DA",
      "C6 C7 H8 H9 ST CK S6",
      "C7 H8 H9 ST CK S6 HJ",
      "H8 H9 ST CQ S6 HJ SA",
      "H9 ST CQ S6 HJ SK CK",
      "ST CQ S6 HJ SK CA H5"
    ];
    straights.forEach((s, idx) => {
      expect(rankHand(cs(s))).toEqual({ category: HandCategory.Straight, value: idx + 1 });
    });
  });

  test("four of a kind takes the best kicker", () => {
    const r = rankHand(cs("S2 H2 D2 C2 DK H9 S4"));
    expect(r).toEqual({ category: HandCategory.FourOfAKind, value: (bit("2") << 13) | bit("K") });
  });

  test("four of a kind alongside a set", () => {
    const r = rankHand(cs("S2 H2 D2 C2 D8 S8 C8"));
    expect(r).toEqual({ category: HandCategory.FourOfAKind, value: 8256 });
  });

  test("two sets make a full house of the higher set", () => {
    const r = rankHand(cs("SA H2 D2 C2 D8 S8 C8"));
    expect(r).toEqual({ category: HandCategory.FullHouse, value: 524289 });
  });

  test("full house picks the best pair", () => {
    const r = rankHand(cs("H2 D2 C2 D8 S8 DK SK"));
    expect(r).toEqual({ category: HandCategory.FullHouse, value: (bit("2") << 13) | bit("K") });
  });

  test("three pairs play the top two with the third as kicker", () => {
    const r = rankHand(cs("H2 D2 D8 S8 DK SK HT"));
    expect(r).toEqual({ category: HandCategory.TwoPair, value: 17301760 });
  });

  test("two pair with the best kicker", () => {
    const r = rankHand(cs("H2 D2 D8 S8 DK S6 HT"));
    expect(r).toEqual({ category: HandCategory.TwoPair, value: 534528 });
  });

  test("flush beats straight", () => {
    const flush = rankHand(cs("SA SQ S9 S4 S2 DK C3"));
    const straight = rankHand(cs("SA DK HQ SJ CT D2 C3"));
    expect(compareHandRank(flush, straight)).toBe(1);
  });

  test("flush keeps the five highest suited ranks", () => {
    const r = rankHand(cs("SA SQ S9 S4 S2 S3 DK"));
    expect(r).toEqual({
      category: HandCategory.Flush,
      value: bit("A") | bit("Q") | bit("9") | bit("4") | bit("3")
    });
  });
});

describe("ordering", () => {
  test("category dominates payload", () => {
    const twoPair: HandRank = { category: HandCategory.TwoPair, value: 0 };
    const onePair: HandRank = { category: HandCategory.OnePair, value: 1 << 25 };
    expect(compareHandRank(twoPair, onePair)).toBe(1);
    expect(compareHandRank(onePair, twoPair)).toBe(-1);
  });

  test("payload breaks ties within a category", () => {
    expect(compareHandRank({ category: HandCategory.HighCard, value: 0 }, { category: HandCategory.HighCard, value: 100 })).toBe(-1);
    expect(compareHandRank({ category: HandCategory.Flush, value: 7 }, { category: HandCategory.Flush, value: 7 })).toBe(0);
  });

  test("bestHandIndices returns every tied index", () => {
    const high: HandRank = { category: HandCategory.HighCard, value: 1 };
    const pair: HandRank = { category: HandCategory.OnePair, value: 1 << 13 };
    const twoPair: HandRank = { category: HandCategory.TwoPair, value: 2 << 13 };

    expect(bestHandIndices([high, pair, pair, twoPair])).toEqual([3]);
    expect(bestHandIndices([high, pair, twoPair, twoPair])).toEqual([2, 3]);
    expect(bestHandIndices([high])).toEqual([0]);
    expect(bestHandIndices([])).toEqual([]);
  });

  test("describeHandRank names the category", () => {
    expect(describeHandRank(rankHand(cs("SA H2 D2 C2 D8 S8 C8")))).toBe("Full House");
    expect(describeHandRank(rankFive(cs("D2 C3 S4 H5 SA")))).toBe("Straight");
  });
});

describe("winners()", () => {
  test("ties on board", () => {
    const board = cs("SA SK SQ SJ ST");
    const w = winners(board, {
      0: [cardFromCode("C2"), cardFromCode("D3")],
      5: [cardFromCode("HA"), cardFromCode("DA")]
    });
    expect(w).toEqual([0, 5]);
  });

  test("straight high wins", () => {
    const board = cs("C2 D3 H4 S5 C9");
    const w = winners(board, {
      0: [cardFromCode("D6"), cardFromCode("DK")], // 6-high straight
      1: [cardFromCode("DA"), cardFromCode("D7")] // wheel
    });
    expect(w).toEqual([0]);
  });

  test("rejects a short board", () => {
    expect(() => winners(cs("C2 D3 H4 S5"), {})).toThrow(RangeError);
  });

  test("rejects hole cards that repeat a board card", () => {
    const board = cs("C2 D3 H4 S5 C9");
    expect(() => winners(board, { 0: [cardFromCode("C2"), cardFromCode("DK")] })).toThrow(RangeError);
  });
});

describe("seeded properties", () => {
  test("rankHand on 7 cards equals the best rankFive over all 21 subsets", () => {
    const rand = mulberry32(0x5eed_0007);
    for (let iter = 0; iter < 300; iter += 1) {
      const deck = Deck.full().shuffle(rand).cards();
      const seven = deck.slice(0, 7);
      expect(rankHand(seven)).toEqual(bestOfFives(seven));
    }
  });

  test("rankHand on 6 cards equals the best rankFive over all 6 subsets", () => {
    const rand = mulberry32(0x5eed_0006);
    for (let iter = 0; iter < 200; iter += 1) {
      const six = Deck.full().shuffle(rand).cards().slice(0, 6);
      expect(rankHand(six)).toEqual(bestOfFives(six));
    }
  });

  test("rankHand agrees with rankFive on 5 cards", () => {
    const rand = mulberry32(0x5eed_0005);
    for (let iter = 0; iter < 300; iter += 1) {
      const five = Deck.full().shuffle(rand).cards().slice(0, 5);
      expect(rankHand(five)).toEqual(rankFive(five));
    }
  });
});

describe("randomized cross-check vs pokersolver", () => {
  test("rankHand ordering matches reference (seeded)", () => {
    const rand = mulberry32(0x51c0_ffee);

    for (let iter = 0; iter < 250; iter += 1) {
      const deck = Deck.full().shuffle(rand).cards();
      const cards7a = deck.slice(0, 7);
      const cards7b = deck.slice(7, 14);

      const oursCmp = compareHandRank(rankHand(cards7a), rankHand(cards7b));

      const refA = SolverHand.solve(cards7a.map(solverCode));
      const refB = SolverHand.solve(cards7b.map(solverCode));
      const winnersHands = SolverHand.winners([refA, refB]);
      const refCmp = winnersHands.length === 2 ? 0 : winnersHands[0] === refA ? 1 : -1;

      expect(oursCmp).toBe(refCmp);
    }
  });

  test("winners() matches reference (seeded)", () => {
    const rand = mulberry32(0x0bad_f00d);
    const seats = [0, 1, 2, 3];

    for (let iter = 0; iter < 200; iter += 1) {
      const deck = Deck.full().shuffle(rand).cards();
      const board = deck.slice(0, 5);
      const holeBySeat: Record<number, [number, number]> = {};
      seats.forEach((seat, i) => {
        holeBySeat[seat] = [deck[5 + i * 2], deck[6 + i * 2]];
      });

      const oursW = winners(board, holeBySeat);

      const refHands = seats.map((seat) => {
        const seven = [...board, ...holeBySeat[seat]];
        return { seat, hand: SolverHand.solve(seven.map(solverCode)) };
      });
      const winnersHands = SolverHand.winners(refHands.map((h) => h.hand));
      const refW = refHands
        .filter((h) => winnersHands.includes(h.hand))
        .map((h) => h.seat)
        .sort((a, b) => a - b);

      expect(oursW).toEqual(refW);
    }
  });
});
