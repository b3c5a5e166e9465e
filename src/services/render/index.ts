export {
  PdfDigestRenderer,
  digestFilename,
  renderDigestPdf,
  type DocumentRenderer,
  type PdfRendererOptions,
  type RenderedDigest,
} from './pdf-renderer';
export {
  digestTitle,
  formatActionItemLine,
  formatEventDate,
  formatEventLine,
  renderTextDigest,
} from './text-digest';
