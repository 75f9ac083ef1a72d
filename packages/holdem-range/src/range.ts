import {
  rankAbove,
  rankFromChar,
  rankGap,
  rankGapToAce,
  rankToChar,
  startingHandLabel,
  type CardId,
  type Rank
} from "@holdem-toolkit/holdem-eval";

import { RangeParseError } from "./errors.js";

/** Two-card starting hands in a 52-card deck: C(52, 2). */
export const STARTING_HAND_COMBINATIONS = 1326;

// Deals of one specific class, e.g. AKo, AKs, AA.
export const OFFSUIT_COMBINATIONS = 12;
export const SUITED_COMBINATIONS = 4;
export const PAIRED_COMBINATIONS = 6;

const RANGE_TOKEN = /^([AKQJT2-9])([AKQJT2-9])([os])?(\+)?$/i;
const COMMA_SPACING = /\s*,\s*/g;

export type HandRange = Readonly<{
  offsuit: ReadonlySet<string>;
  suited: ReadonlySet<string>;
  paired: ReadonlySet<string>;
}>;

// "unpaired" = two distinct ranks with no suffix: both suited and offsuit.
type TokenKind = "offsuit" | "suited" | "paired" | "unpaired";

type RangeToken = {
  high: Rank;
  low: Rank;
  kind: TokenKind;
  plus: boolean;
};

type MutableRange = {
  offsuit: Set<string>;
  suited: Set<string>;
  paired: Set<string>;
};

function invalidToken(token: string, index: number): RangeParseError {
  return new RangeParseError("INVALID_RANGE_TOKEN", `Unable to parse hand range token ${JSON.stringify(token)}.`, {
    token,
    index
  });
}

function parseToken(token: string, index: number): RangeToken {
  const m = RANGE_TOKEN.exec(token);
  if (!m) throw invalidToken(token, index);

  const r1 = rankFromChar(m[1]);
  const r2 = rankFromChar(m[2]);
  if (r1 === null || r2 === null) throw invalidToken(token, index);

  const high = r1 >= r2 ? r1 : r2;
  const low = r1 >= r2 ? r2 : r1;
  const suffix = (m[3] ?? "").toLowerCase();

  let kind: TokenKind;
  if (high === low) kind = "paired";
  else if (suffix === "o") kind = "offsuit";
  else if (suffix === "s") kind = "suited";
  else kind = "unpaired";

  return { high, low, kind, plus: m[4] !== undefined };
}

function addClass(range: MutableRange, kind: TokenKind, high: Rank, low: Rank): void {
  const label = `${rankToChar(high)}${rankToChar(low)}`;
  switch (kind) {
    case "paired":
      range.paired.add(label);
      break;
    case "offsuit":
      range.offsuit.add(label);
      break;
    case "suited":
      range.suited.add(label);
      break;
    case "unpaired":
      range.offsuit.add(label);
      range.suited.add(label);
      break;
  }
}

function addToken(range: MutableRange, token: RangeToken): void {
  const { high, low, kind, plus } = token;

  if (!plus) {
    addClass(range, kind, high, low);
    return;
  }

  if (kind === "paired") {
    // 88+ -> 88 through AA
    for (let step = 0; step <= rankGapToAce(high); step += 1) {
      const r = rankAbove(high, step);
      addClass(range, kind, r, r);
    }
    return;
  }

  // AJo+ -> AJo, AQo, AKo: the kicker climbs toward the high card.
  for (let step = 0; step < rankGap(high, low); step += 1) {
    addClass(range, kind, high, rankAbove(low, step));
  }
}

/**
 * Expands range notation ("88+, AJo+, KQ") into its starting-hand classes.
 * Overlapping tokens are merged; the first token that does not parse aborts
 * with a {@link RangeParseError}.
 */
export function parseRange(text: string): HandRange {
  const tokens = text.replace(COMMA_SPACING, ",").trim().split(",");
  const range: MutableRange = { offsuit: new Set(), suited: new Set(), paired: new Set() };

  tokens.forEach((token, index) => {
    addToken(range, parseToken(token, index));
  });

  return range;
}

export function comboCount(range: HandRange): number {
  return (
    range.offsuit.size * OFFSUIT_COMBINATIONS +
    range.suited.size * SUITED_COMBINATIONS +
    range.paired.size * PAIRED_COMBINATIONS
  );
}

/** Fraction of all 1326 starting hands covered by the range text. */
export function measureRange(text: string): number {
  return comboCount(parseRange(text)) / STARTING_HAND_COMBINATIONS;
}

export function rangeIncludes(range: HandRange, c1: CardId, c2: CardId): boolean {
  const label = startingHandLabel(c1, c2);
  const ranks = label.slice(0, 2);
  switch (label.charAt(2)) {
    case "s":
      return range.suited.has(ranks);
    case "o":
      return range.offsuit.has(ranks);
    default:
      return range.paired.has(ranks);
  }
}

function labelOrder(a: string, b: string): number {
  for (let i = 0; i < 2; i += 1) {
    const ra = rankFromChar(a.charAt(i)) ?? 0;
    const rb = rankFromChar(b.charAt(i)) ?? 0;
    if (ra !== rb) return rb - ra;
  }
  return 0;
}

/** Every class in the range, strongest first: pairs, then suited, then offsuit. */
export function rangeLabels(range: HandRange): string[] {
  const paired = [...range.paired].sort(labelOrder);
  const suited = [...range.suited].sort(labelOrder).map((l) => `${l}s`);
  const offsuit = [...range.offsuit].sort(labelOrder).map((l) => `${l}o`);
  return [...paired, ...suited, ...offsuit];
}
