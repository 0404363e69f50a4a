export { getSetCookies, splitSetCookie, type SplitSetCookieOptions } from './cookies/split-set-cookie.js';
export { formatHttpDate, parseHttpDate } from './date/index.js';
export {
  createHeaderReader,
  type HeaderReaderState,
  readHeader,
  readHeaders,
  readLine,
} from './decode/header-reader.js';
export { parseHeaderBlock, type ParseHeaderBlockOptions } from './decode/parse-header-block.js';
export { HeaderOperationError, HeaderParseError } from './errors.js';
export {
  createParserTable,
  DEFAULT_HEADER_PARSERS,
  type HeaderParserTable,
  httpDateParser,
  integerParser,
  rawStringParser,
  tokenListParser,
} from './headers/header-parsers.js';
export { HeaderStore, type HeaderStoreOptions, isValidHeaderName } from './headers/header-store.js';
export {
  HeaderValueCollection,
  type HeaderValueCollectionOptions,
  type HeaderValueValidator,
} from './headers/header-value-collection.js';
export {
  getKnownHeaderName,
  isKnownHeaderName,
  KnownHeaderNames,
  tryGetKnownHeaderName,
} from './headers/known-header-names.js';
export {
  configureLogger,
  createLogger,
  getLogger,
  type LogLevel,
  resetLogger,
} from './logging/logger.js';
export { CRLF, DEFAULT_HEADER_BLOCK_LIMITS, HEADER_VALUE_SEPARATOR } from './specs.js';
export type {
  HeaderBlockLimits,
  HeaderField,
  HeaderParseResult,
  HeaderValueParser,
  ParsedHeaderValue,
  TextSpan,
} from './types.js';
