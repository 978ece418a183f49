import { createHash } from 'node:crypto';

/** Hex SHA-256 of a UTF-8 string. Used to fingerprint prompts and analyses in the audit log. */
export function sha256(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}
