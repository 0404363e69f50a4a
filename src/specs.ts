import type { HeaderBlockLimits } from './types.js';

export const CR = 0x0d;
export const LF = 0x0a;
export const CRLF = '\r\n';
export const COLON = 0x3a;

export const HEADER_VALUE_SEPARATOR = ', ';

export const DEFAULT_HEADER_BLOCK_LIMITS: HeaderBlockLimits = {
  maxHeaderCount: 100,
} as const;

export const LOG_LEVEL_ENV = 'HTTP_HEADERS_LOG_LEVEL';
