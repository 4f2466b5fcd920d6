import { randomInt } from 'crypto';

const ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const OBJECT_ID_LENGTH = 16;

/**
 * Public identifier exposed by the API, e.g. `zoc_aB3dE5fG7hJ9kL1m`.
 * Database primary keys never leave the service.
 */
export function generateObjectId(prefix: string): string {
  let suffix = '';
  for (let i = 0; i < OBJECT_ID_LENGTH; i++) {
    suffix += ALPHABET[randomInt(ALPHABET.length)];
  }
  return `${prefix}_${suffix}`;
}
