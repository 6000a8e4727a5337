import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../core/errors.js';
import { containsAny, countOccurrences, findMarkers } from '../core/utils/text-similarity.js';
import type { CouncilMemberId } from '../types/advisor.js';

export const lexiconFileSchema = z.object({
  version: z.number().int().positive(),
  advisors: z.record(z.string(), z.record(z.string(), z.array(z.string().min(1)))),
});

/**
 * Whole-word marker matching against one advisor's named marker sets.
 */
export interface MarkerMatcher {
  find(set: string, text: string): string[];
  any(set: string, text: string): boolean;
  count(set: string, text: string): number;
}

/**
 * Keyword sets each advisor's fallback heuristic reads.
 */
export class Lexicon {
  private readonly sets: ReadonlyMap<string, ReadonlyMap<string, readonly string[]>>;

  constructor(advisors: Record<string, Record<string, string[]>>) {
    const sets = new Map<string, ReadonlyMap<string, readonly string[]>>();
    for (const [advisor, named] of Object.entries(advisors)) {
      sets.set(advisor, new Map(Object.entries(named).map(([k, v]) => [k, Object.freeze([...v])])));
    }
    this.sets = sets;
  }

  has(advisor: CouncilMemberId, set: string): boolean {
    return this.sets.get(advisor)?.has(set) ?? false;
  }

  markers(advisor: CouncilMemberId, set: string): readonly string[] {
    const markers = this.sets.get(advisor)?.get(set);
    if (!markers) {
      throw new ConfigError(`lexicon has no marker set ${advisor}.${set}`);
    }
    return markers;
  }

  /** Matcher bound to one advisor */
  matcherFor(advisor: CouncilMemberId): MarkerMatcher {
    return {
      find: (set, text) => findMarkers(text, this.markers(advisor, set)),
      any: (set, text) => containsAny(text, this.markers(advisor, set)),
      count: (set, text) => countOccurrences(text, this.markers(advisor, set)),
    };
  }
}

export function parseLexicon(raw: unknown): Lexicon {
  const parsed = lexiconFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `advisor lexicon invalid: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }
  return new Lexicon(parsed.data.advisors);
}

export async function loadLexicon(filePath: string): Promise<Lexicon> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`cannot read advisor lexicon ${filePath}: ${errorMessage(error)}`);
  }
  return parseLexicon(raw);
}
