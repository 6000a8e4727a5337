import { z } from 'zod';
import { KNOWLEDGE_TYPES } from '../types/knowledge.js';
import type { Applicability, KnowledgeEntry, MemoryStats, Provenance } from '../types/knowledge.js';

const level = z.enum(['low', 'medium', 'high']);

export const memoryStatsSchema = z.object({
  reinforcementCount: z.number().int().min(0).default(0),
  penaltyCount: z.number().int().min(0).default(0),
  lastReinforcedAt: z.string().datetime({ offset: true }).optional(),
});

/**
 * One entry as written in a knowledge file.
 * `type` may be omitted when the file name implies it.
 */
export const knowledgeEntryFileSchema = z.object({
  id: z.string().min(1),
  domain: z.string().min(1).optional(),
  type: z.enum(KNOWLEDGE_TYPES).optional(),
  content: z.string().min(1),
  provenance: z
    .object({
      book: z.string().min(1),
      file: z.string().optional(),
      chapter: z.string().optional(),
    })
    .optional(),
  memory: memoryStatsSchema.optional(),
  conceptTags: z.array(z.string()).optional(),
  goalTags: z.array(z.string()).optional(),
  applicability: z
    .object({
      requiredDomains: z.array(z.string()).optional(),
      excludedDomains: z.array(z.string()).optional(),
      minStakes: level.optional(),
      maxTimePressure: level.optional(),
    })
    .optional(),
});

export type KnowledgeEntryFile = z.infer<typeof knowledgeEntryFileSchema>;

/** Persisted memory stats, keyed by entry id */
export const memorySnapshotSchema = z.record(z.string(), memoryStatsSchema);

export type MemorySnapshot = Record<string, MemoryStats>;

export function toMemoryStats(parsed: z.infer<typeof memoryStatsSchema>): MemoryStats {
  const memory: MemoryStats = {
    reinforcementCount: parsed.reinforcementCount,
    penaltyCount: parsed.penaltyCount,
  };
  if (parsed.lastReinforcedAt !== undefined) {
    memory.lastReinforcedAt = parsed.lastReinforcedAt;
  }
  return memory;
}

/**
 * Build a KnowledgeEntry from a validated file record.
 * Optional fields are only set when present.
 */
export function toKnowledgeEntry(
  parsed: KnowledgeEntryFile,
  defaults: Pick<KnowledgeEntry, 'domain' | 'type'> & { provenance: Provenance }
): KnowledgeEntry {
  const provenance: Provenance = { book: parsed.provenance?.book ?? defaults.provenance.book };
  const file = parsed.provenance?.file ?? defaults.provenance.file;
  if (file !== undefined) provenance.file = file;
  if (parsed.provenance?.chapter !== undefined) provenance.chapter = parsed.provenance.chapter;

  let applicability: Applicability | undefined;
  if (parsed.applicability) {
    const a = parsed.applicability;
    applicability = {};
    if (a.requiredDomains !== undefined) applicability.requiredDomains = a.requiredDomains;
    if (a.excludedDomains !== undefined) applicability.excludedDomains = a.excludedDomains;
    if (a.minStakes !== undefined) applicability.minStakes = a.minStakes;
    if (a.maxTimePressure !== undefined) applicability.maxTimePressure = a.maxTimePressure;
  }

  return {
    id: parsed.id,
    domain: parsed.domain ?? defaults.domain,
    type: parsed.type ?? defaults.type,
    content: parsed.content,
    provenance,
    memory: parsed.memory
      ? toMemoryStats(parsed.memory)
      : { reinforcementCount: 0, penaltyCount: 0 },
    ...(parsed.conceptTags !== undefined && { conceptTags: parsed.conceptTags }),
    ...(parsed.goalTags !== undefined && { goalTags: parsed.goalTags }),
    ...(applicability !== undefined && { applicability }),
  };
}
