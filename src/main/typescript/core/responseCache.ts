/**
 * INPUT: prompt text + generated answer
 * OUTPUT: ResponseCache (bounded, fingerprint-keyed, FIFO eviction)
 * POS: core module, one instance per session; avoids paying twice for the same question
 */

import { createHash } from 'crypto';

interface CacheEntry {
  fingerprint: string;
  answerText: string;
  createdOrder: number;
}

/** MD5 hex digest of the trimmed prompt; collisions are not defended against */
export function fingerprint(prompt: string): string {
  return createHash('md5').update(prompt.trim(), 'utf8').digest('hex');
}

export class ResponseCache {
  // Map iteration order is insertion order, which is also createdOrder order
  private readonly entries = new Map<string, CacheEntry>();
  private sequence = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(prompt: string): string | null {
    return this.entries.get(fingerprint(prompt))?.answerText ?? null;
  }

  has(prompt: string): boolean {
    return this.entries.has(fingerprint(prompt));
  }

  put(prompt: string, answerText: string): void {
    const key = fingerprint(prompt);
    const existing = this.entries.get(key);

    // Overwrite keeps the original slot in the eviction order
    if (existing) {
      existing.answerText = answerText;
      return;
    }

    if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }

    this.entries.set(key, { fingerprint: key, answerText, createdOrder: this.sequence++ });
  }

  clear(): void {
    this.entries.clear();
  }
}
