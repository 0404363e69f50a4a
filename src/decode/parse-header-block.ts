import { Buffer } from 'node:buffer';

import type { Logger } from 'pino';

import { HeaderStore, type HeaderStoreOptions } from '../headers/header-store.js';
import { getLogger } from '../logging/logger.js';
import { DEFAULT_HEADER_BLOCK_LIMITS } from '../specs.js';
import type { HeaderBlockLimits } from '../types.js';
import { createHeaderReader, readHeader } from './header-reader.js';

export interface ParseHeaderBlockOptions extends HeaderStoreOptions {
  limits?: HeaderBlockLimits;
  logger?: Logger;
}

/**
 * Reads a response header block into a new {@link HeaderStore}. Malformed
 * lines and values the header grammar rejects are dropped; nothing here throws
 * on the content of `input`.
 */
export function parseHeaderBlock(
  input: string | Buffer,
  options: ParseHeaderBlockOptions = {},
): HeaderStore {
  const limits = options.limits ?? DEFAULT_HEADER_BLOCK_LIMITS;
  const logger = options.logger ?? getLogger('header-block');
  const text = Buffer.isBuffer(input) ? input.toString('latin1') : input;
  const store = new HeaderStore({ parsers: options.parsers });
  const reader = createHeaderReader(text);

  let count = 0;
  let field = readHeader(reader);
  while (field) {
    if (count >= limits.maxHeaderCount) {
      logger.warn({ maxHeaderCount: limits.maxHeaderCount }, 'Header count limit reached, ignoring remaining headers');
      break;
    }

    const [name, value] = field;
    if (store.tryAdd(name, value)) {
      count++;
    } else {
      logger.debug({ name, value }, 'Dropped header rejected by its value grammar');
    }
    field = readHeader(reader);
  }

  return store;
}
