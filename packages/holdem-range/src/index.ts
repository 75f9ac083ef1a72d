export { RangeParseError, type RangeParseErrorCode } from "./errors.js";
export {
  type HandRange,
  OFFSUIT_COMBINATIONS,
  PAIRED_COMBINATIONS,
  STARTING_HAND_COMBINATIONS,
  SUITED_COMBINATIONS,
  comboCount,
  measureRange,
  parseRange,
  rangeIncludes,
  rangeLabels
} from "./range.js";
