export {
  MAX_QUOTE_WORDS,
  countWords,
  documentLookup,
  normalizeForMatch,
  permittedSourceTypes,
  quoteOccursIn,
  validateProvenance,
} from "./validator";
