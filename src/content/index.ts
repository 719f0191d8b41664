/**
 * Content model: schema, wire conversion, text helpers and hashing.
 */

export {
  ContentSchema,
  ContentRecordSchema,
  ImagePromptSchema,
  LinkSchema,
  type Content,
  type ContentRecord,
  type ContentRecordInput,
  type ImagePrompt,
  type Link,
} from "./schema.js";
export {
  parseContentRecord,
  toContentRecord,
  loadContentFromFile,
  cloneContent,
  makeContent,
} from "./record.js";
export { ContentValidationError, type ContentIssue } from "./errors.js";
export {
  stripTags,
  extractWords,
  countWords,
  splitSentences,
  countOccurrences,
  containsIgnoreCase,
  escapeRegExp,
  roundTo,
  truncateAtWord,
  capitalize,
  lowercaseFirst,
  titleCase,
  clamp,
} from "./text.js";
export {
  stableStringify,
  md5,
  hashValue,
  contentHash,
  fullContentHash,
  configHash,
  keywordHash,
} from "./hash.js";
