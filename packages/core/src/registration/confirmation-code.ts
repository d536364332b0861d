import { randomBytes } from 'node:crypto';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
export const CONFIRMATION_CODE_LENGTH = 20;

// 62 * 4 = 248; bytes at or above this are rejected to keep the draw uniform.
const REJECT_FROM = 248;

/** Random alphanumeric confirmation code drawn from the OS CSPRNG. */
export function generateConfirmationCode(length: number = CONFIRMATION_CODE_LENGTH): string {
  let code = '';
  while (code.length < length) {
    for (const byte of randomBytes(length * 2)) {
      if (byte >= REJECT_FROM) continue;
      code += ALPHABET[byte % ALPHABET.length];
      if (code.length === length) break;
    }
  }
  return code;
}
