import { SessionRecord } from '@phonediag/parser';

export interface StoredSessions {
  source: string;   // scanned directory or uploaded zip path
  sessions: SessionRecord[];
}

/**
 * Simple in-memory store for parsed session collections.
 * Keyed by scan/upload ID. Entries expire after the configured TTL.
 */
export class SessionStore {
  private store = new Map<string, { entry: StoredSessions; timestamp: number }>();

  constructor(private readonly ttlMs: number) {}

  set(id: string, entry: StoredSessions): void {
    this.store.set(id, { entry, timestamp: Date.now() });
    this.cleanup();
  }

  get(id: string): StoredSessions | undefined {
    const item = this.store.get(id);
    if (!item) return undefined;
    if (Date.now() - item.timestamp > this.ttlMs) {
      this.store.delete(id);
      return undefined;
    }
    return item.entry;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, item] of this.store) {
      if (now - item.timestamp > this.ttlMs) {
        this.store.delete(key);
      }
    }
  }
}
