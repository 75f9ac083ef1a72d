import { cardRank, cardSuit, rankToChar, type CardId } from "./cards.js";
import { HoldemEvalError } from "./errors.js";

export type StartingHandType = "paired" | "suited" | "offsuit";

export function handType(cards: readonly CardId[]): StartingHandType {
  if (cards.length !== 2) {
    throw new HoldemEvalError("INVALID_HAND_SIZE", `Hand must contain exactly 2 cards, got ${cards.length}.`, {
      size: cards.length
    });
  }

  const [c1, c2] = cards;
  if (cardRank(c1) === cardRank(c2)) return "paired";
  if (cardSuit(c1) === cardSuit(c2)) return "suited";
  return "offsuit";
}

/** Range-notation class of two hole cards, high rank first: "AKs", "QJo", "TT". */
export function startingHandLabel(c1: CardId, c2: CardId): string {
  const r1 = cardRank(c1);
  const r2 = cardRank(c2);
  const hi = rankToChar(r1 >= r2 ? r1 : r2);
  const lo = rankToChar(r1 >= r2 ? r2 : r1);
  const type = handType([c1, c2]);
  if (type === "paired") return `${hi}${lo}`;
  return `${hi}${lo}${type === "suited" ? "s" : "o"}`;
}
