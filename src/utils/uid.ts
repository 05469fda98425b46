import { randomBytes } from 'node:crypto';

export type UidGenerator = () => string;

export function generateShortUid(): string {
  return randomBytes(9).toString('base64url');
}
