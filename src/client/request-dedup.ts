/**
 * Request Deduplicator
 *
 * Suppresses a rewrite/chat the user re-triggers before the first one has had
 * a chance to finish. Records live for the retention window; a key only
 * counts as a duplicate while its record is younger than the (much shorter)
 * dedup window.
 */

import crypto from "node:crypto";
import type { ChatParams, RewriteParams } from "./contracts/schema-validators.js";

/** Characters of rewrite text that take part in the key. */
export const REWRITE_KEY_TEXT_CHARS = 50;
/** Characters of chat query that take part in the key. */
export const CHAT_KEY_QUERY_CHARS = 100;

export type RequestDeduplicatorOptions = {
  windowMs?: number;
  retentionMs?: number;
  now?: () => number;
};

export class RequestDeduplicator {
  readonly windowMs: number;
  readonly retentionMs: number;
  private readonly now: () => number;
  private readonly seen = new Map<string, number>();

  constructor(options: RequestDeduplicatorOptions = {}) {
    this.windowMs = options.windowMs ?? 5_000;
    this.retentionMs = options.retentionMs ?? 300_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * True when `key` was seen within the dedup window. Otherwise records the
   * key as seen now and returns false.
   */
  isDuplicate(key: string): boolean {
    const now = this.now();

    for (const [existing, firstSeen] of this.seen) {
      if (now - firstSeen >= this.retentionMs) {
        this.seen.delete(existing);
      }
    }

    const firstSeen = this.seen.get(key);
    if (firstSeen !== undefined && now - firstSeen < this.windowMs) {
      return true;
    }

    this.seen.set(key, now);
    return false;
  }

  size(): number {
    return this.seen.size;
  }

  clear(): void {
    this.seen.clear();
  }
}

function hashKey(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex").slice(0, 16);
}

export function rewriteRequestKey(params: RewriteParams): string {
  const text = params.text.trim().slice(0, REWRITE_KEY_TEXT_CHARS);
  return hashKey(`rewrite|${text}|${params.tone}|${params.length}`);
}

export function chatRequestKey(params: ChatParams): string {
  return hashKey(`chat|${params.query.trim().slice(0, CHAT_KEY_QUERY_CHARS)}`);
}
