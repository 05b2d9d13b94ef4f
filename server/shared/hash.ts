import { createHash } from 'crypto';

export function hashKey(obj: unknown): string {
  const json = typeof obj === 'string' ? obj : JSON.stringify(obj);
  return createHash('sha256').update(json).digest('hex');
}
