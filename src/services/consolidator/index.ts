export { Consolidator, type ConsolidationOutcome, type ConsolidatorOptions } from './consolidator';
export { buildDigestSystemPrompt, buildDigestUserContent, type DigestPromptInput } from './digest-prompt';
export {
  collectAnnouncements,
  computeDateRange,
  eventKey,
  formatDay,
  mergeActionItems,
  mergeEvents,
  templateSummary,
} from './merge';
