export {
  CategoryLookup,
  type CategoryLookupOptions,
  firstToken,
  formatRecord,
  getDictionaryEntry,
} from "./category-lookup.js";
export { MerriamWebsterClient, type MerriamWebsterClientOptions } from "./merriam-webster.js";
export type {
  DictionaryClient,
  DictionaryRecord,
  LookupFailure,
  LookupOutcome,
  LookupSuccess,
} from "./types.js";
export { findFirstElementText } from "./xml.js";
