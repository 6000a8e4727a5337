import { DateTime } from 'luxon';
import { KnowledgeLoadError } from '../core/errors.js';
import type { KnowledgeEntry, MemoryStats } from '../types/knowledge.js';
import type { MemorySnapshot } from './schema.js';

/**
 * In-memory knowledge base.
 *
 * Entry content is immutable. Memory stats change by replacing the entry
 * object, so a reader holding an entry never sees it change underneath.
 * Iteration order is insertion order.
 */
export class KnowledgeStore {
  private readonly entries = new Map<string, KnowledgeEntry>();

  constructor(initial: Iterable<KnowledgeEntry> = []) {
    for (const entry of initial) {
      this.add(entry);
    }
  }

  add(entry: KnowledgeEntry): void {
    if (this.entries.has(entry.id)) {
      throw new KnowledgeLoadError(`duplicate entry id "${entry.id}"`);
    }
    this.entries.set(entry.id, entry);
  }

  get(id: string): KnowledgeEntry | undefined {
    return this.entries.get(id);
  }

  get size(): number {
    return this.entries.size;
  }

  all(): KnowledgeEntry[] {
    return [...this.entries.values()];
  }

  byDomain(domain: string): KnowledgeEntry[] {
    const wanted = domain.toLowerCase();
    return this.all().filter((e) => e.domain.toLowerCase() === wanted);
  }

  /**
   * Entries of any of the given domains, in insertion order.
   */
  byDomains(domains: readonly string[]): KnowledgeEntry[] {
    const wanted = new Set(domains.map((d) => d.toLowerCase()));
    return this.all().filter((e) => wanted.has(e.domain.toLowerCase()));
  }

  /** Distinct domains, in order of first appearance */
  domains(): string[] {
    return [...new Set(this.all().map((e) => e.domain))];
  }

  reinforce(id: string, at: Date = new Date()): KnowledgeEntry | undefined {
    return this.updateMemory(id, (memory) => ({
      ...memory,
      reinforcementCount: memory.reinforcementCount + 1,
      lastReinforcedAt: DateTime.fromJSDate(at).toUTC().toISO() ?? at.toISOString(),
    }));
  }

  penalize(id: string): KnowledgeEntry | undefined {
    return this.updateMemory(id, (memory) => ({
      ...memory,
      penaltyCount: memory.penaltyCount + 1,
    }));
  }

  /**
   * Memory stats of every entry that has any, keyed by id.
   */
  exportMemory(): MemorySnapshot {
    const snapshot: MemorySnapshot = {};
    for (const entry of this.entries.values()) {
      const { memory } = entry;
      if (
        memory.reinforcementCount > 0 ||
        memory.penaltyCount > 0 ||
        memory.lastReinforcedAt !== undefined
      ) {
        snapshot[entry.id] = { ...memory };
      }
    }
    return snapshot;
  }

  /**
   * Overlay persisted memory stats. Unknown ids are returned, not applied.
   */
  importMemory(snapshot: MemorySnapshot): string[] {
    const unknown: string[] = [];
    for (const [id, memory] of Object.entries(snapshot)) {
      if (!this.updateMemory(id, () => ({ ...memory }))) {
        unknown.push(id);
      }
    }
    return unknown;
  }

  private updateMemory(
    id: string,
    update: (memory: MemoryStats) => MemoryStats
  ): KnowledgeEntry | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    const next: KnowledgeEntry = { ...entry, memory: update(entry.memory) };
    this.entries.set(id, next);
    return next;
  }
}

/**
 * Factory function for creating a knowledge store.
 */
export function createKnowledgeStore(initial: Iterable<KnowledgeEntry> = []): KnowledgeStore {
  return new KnowledgeStore(initial);
}
