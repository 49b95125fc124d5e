/**
 * @fileoverview Short, human-readable identifiers for correlating the log
 * records of a single sync run.
 * @module src/utils/security/idGenerator
 */
import { randomBytes } from 'node:crypto';

const RUN_ID_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Draws `length` characters from `charset` using rejection sampling, so every
 * character is equally likely.
 */
const generateSecureRandomString = (length: number, charset: string): string => {
  let result = '';
  const maxValidByteValue = Math.floor(256 / charset.length) * charset.length;

  while (result.length < length) {
    const byte = randomBytes(1)[0];

    if (byte !== undefined && byte < maxValidByteValue) {
      const char = charset[byte % charset.length];
      if (char) {
        result += char;
      }
    }
  }
  return result;
};

/**
 * Generates a 10-character alphanumeric ID with a hyphen in the middle
 * (e.g., `ABCDE-FGHIJ`).
 */
export const generateRequestContextId = (): string =>
  `${generateSecureRandomString(5, RUN_ID_CHARSET)}-${generateSecureRandomString(5, RUN_ID_CHARSET)}`;
