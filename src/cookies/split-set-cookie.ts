import type { Logger } from 'pino';

import { isWeekdayName } from '../date/index.js';
import type { HeaderStore } from '../headers/header-store.js';
import { KnownHeaderNames } from '../headers/known-header-names.js';
import { getLogger } from '../logging/logger.js';

const COMMA = 0x2c;
const SEMICOLON = 0x3b;
const DQUOTE = 0x22;

// `Expires=Wed` up to the comma inside the date
const EXPIRES_WEEKDAY_REGEX = /^\s*expires\s*=\s*([a-z]+)\s*$/i;

export interface SplitSetCookieOptions {
  logger?: Logger;
}

function isExpiresDateComma(raw: string, attributeStart: number, commaIndex: number): boolean {
  const match = EXPIRES_WEEKDAY_REGEX.exec(raw.slice(attributeStart, commaIndex));
  return match !== null && match[1] !== undefined && isWeekdayName(match[1]);
}

function findDefinitionEnd(raw: string, start: number): number {
  // -1 while still in the leading name=value pair
  let attributeStart = -1;
  let quoted = false;

  for (let i = start; i < raw.length; i++) {
    const code = raw.charCodeAt(i);
    if (code === DQUOTE) {
      quoted = !quoted;
    } else if (quoted) {
      continue;
    } else if (code === SEMICOLON) {
      attributeStart = i + 1;
    } else if (code === COMMA) {
      if (attributeStart === -1 || !isExpiresDateComma(raw, attributeStart, i)) {
        return i;
      }
    }
  }

  return raw.length;
}

function checkDefinition(definition: string): string | null {
  const semicolonIndex = definition.indexOf(';');
  const pair = semicolonIndex === -1 ? definition : definition.slice(0, semicolonIndex);
  const eqIndex = pair.indexOf('=');
  if (eqIndex === -1) {
    return `cookie "${pair.trim()}" has no "="`;
  }
  if (!pair.slice(0, eqIndex).trim()) {
    return 'cookie name is empty';
  }
  return null;
}

/**
 * Splits one `Set-Cookie` value into its cookie definitions. The comma inside
 * an `Expires` date or a quoted value is not a separator. A malformed definition ends the split:
 * what came before it is still produced and the stop is logged.
 */
export function* splitSetCookie(
  raw: string,
  options: SplitSetCookieOptions = {},
): Generator<string, void, undefined> {
  let start = 0;

  while (start < raw.length) {
    const end = findDefinitionEnd(raw, start);
    const definition = raw.slice(start, end).trim();

    if (definition) {
      const reason = checkDefinition(definition);
      if (reason) {
        const logger = options.logger ?? getLogger('set-cookie');
        logger.warn({ offset: start, reason }, 'Set-Cookie split stopped at malformed cookie');
        return;
      }
      yield definition;
    }

    start = end + 1;
  }
}

export function getSetCookies(store: HeaderStore, options: SplitSetCookieOptions = {}): string[] {
  const cookies: string[] = [];
  for (const value of store.getValues(KnownHeaderNames.SetCookie)) {
    cookies.push(...splitSetCookie(value, options));
  }
  return cookies;
}
