export { ItemExtractor, type ExtractionOutcome, type ItemExtractorOptions } from './item-extractor';
export { buildExtractionSystemPrompt, buildExtractionUserContent } from './extraction-prompt';
export {
  DEFAULT_SUMMARY,
  buildFallbackRecord,
  decodeJsonReply,
  isDateRange,
  parseExtractionReply,
} from './response-parser';
