export {
  ContentNormalizer,
  getHeader,
  orderByBodyPosition,
  parseReceivedAt,
  UNKNOWN_SENDER,
  type AttachmentFetcher,
  type NormalizerDependencies,
} from './content-normalizer';
export {
  classifyAttachment,
  extractAttachmentText,
  readPdfText,
  type PdfTextReader,
} from './attachment-extractor';
