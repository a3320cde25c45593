export { openMbox, type MboxContainer } from './mbox-reader';
export {
  parseMessage,
  parseHeaderValue,
  walkParts,
  isMultipart,
  getHeader,
  type MessagePart,
  type PartKind,
  type HeaderMap,
} from './mime-tree';
export { decodeHeader } from './header-decoder';
export { resolveBody, looksLikeHtml, decodePartText, type ResolvedBody } from './body-resolver';
export { htmlToPlainText } from './html-text';
export {
  ContentSanitizer,
  SANITIZE_RULES,
  EXTERNAL_IMAGE_MARKER,
  INLINE_IMAGE_MARKER,
  type SanitizeRule,
} from './content-sanitizer';
export { sanitizeFilename, UNNAMED_FILE } from './filename';
export { extractAttachments } from './attachment-extractor';
export {
  MessageIngestor,
  buildPreview,
  extractSenderName,
  type IngestSummary,
  type MessageIngestorOptions,
} from './message-ingestor';
export {
  loadConfig,
  ArchiveConfigSchema,
  DEFAULT_CONFIG,
  type ArchiveConfig,
  type ArchiveConfigInput,
  type SanitizerConfig,
} from './config';
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './logger';
export { ArchiveError, ContainerError, ConfigError, errorMessage } from './errors';
