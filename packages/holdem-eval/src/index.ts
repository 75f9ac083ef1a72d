export {
  type CardId,
  type Rank,
  type Suit,
  ACE,
  allRanks,
  allSuits,
  assertValidCardId,
  cardFromCode,
  cardIdFromRankSuit,
  cardRank,
  cardSuit,
  cardToCode,
  cardToDisplay,
  isRank,
  isSuit,
  rankAbove,
  rankFromChar,
  rankGap,
  rankGapToAce,
  rankToChar,
  suitFromChar,
  suitToChar,
  suitToIcon
} from "./cards.js";
export { Deck } from "./deck.js";
export { HoldemEvalError, type HoldemEvalErrorCode } from "./errors.js";
export { rankFive, rankHand, winners } from "./evaluate.js";
export { Hand, MAX_HOLDEM_HAND_SIZE } from "./hand.js";
export {
  HAND_CATEGORY_NAMES,
  HandCategory,
  type HandRank,
  bestHandIndices,
  compareHandRank,
  describeHandRank
} from "./handRank.js";
export { type StartingHandType, handType, startingHandLabel } from "./handType.js";
export { mulberry32, shuffleInPlace } from "./rng.js";
