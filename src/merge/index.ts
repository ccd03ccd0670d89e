export {
  mergeTrees,
  mergeLayers,
  isResetSequence,
  DEFAULT_RESET_SENTINEL,
  type MergeOptions,
} from "./merger.js";
