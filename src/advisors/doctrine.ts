import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { DoctrineError, errorMessage } from '../core/errors.js';
import { JUDGES, VOTING_ADVISORS, type CouncilMemberId } from '../types/advisor.js';
import type { Logger } from '../types/logger.js';

export const doctrineSchema = z.object({
  /** Phrases that, when present in the input, force a red line */
  prohibitions: z.array(z.string().min(1)).default([]),
  worldview: z
    .object({
      keywords: z.array(z.string().min(1)).default([]),
      summary: z.string().optional(),
    })
    .default({ keywords: [] }),
  principles: z.array(z.string()).default([]),
  /** Behaviors the holder must not engage in ("must not moralize") */
  mustNot: z.array(z.string()).default([]),
});

export interface Doctrine {
  readonly prohibitions: readonly string[];
  readonly worldviewKeywords: readonly string[];
  readonly summary?: string;
  readonly principles: readonly string[];
  readonly mustNot: readonly string[];
}

export type DoctrineId = CouncilMemberId | 'authority';

export const DOCTRINE_IDS: readonly DoctrineId[] = [...VOTING_ADVISORS, ...JUDGES, 'authority'];

export const EMPTY_DOCTRINE: Doctrine = Object.freeze({
  prohibitions: [],
  worldviewKeywords: [],
  principles: [],
  mustNot: [],
});

export function toDoctrine(raw: unknown, id: DoctrineId): Doctrine {
  const parsed = doctrineSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DoctrineError(
      id,
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    );
  }
  const { prohibitions, worldview, principles, mustNot } = parsed.data;
  return Object.freeze({
    prohibitions: Object.freeze([...prohibitions]),
    worldviewKeywords: Object.freeze([...worldview.keywords]),
    ...(worldview.summary !== undefined && { summary: worldview.summary }),
    principles: Object.freeze([...principles]),
    mustNot: Object.freeze([...mustNot]),
  });
}

/**
 * Immutable set of doctrines, built once at start-up and passed by
 * reference to every advisor and the final-authority gate.
 */
export class DoctrineBook {
  private readonly doctrines: ReadonlyMap<DoctrineId, Doctrine>;

  constructor(doctrines: Partial<Record<DoctrineId, Doctrine>> = {}) {
    const map = new Map<DoctrineId, Doctrine>();
    for (const id of DOCTRINE_IDS) {
      const doctrine = doctrines[id];
      if (doctrine) map.set(id, doctrine);
    }
    this.doctrines = map;
    Object.freeze(this);
  }

  /** Doctrine of id, or the empty doctrine */
  get(id: DoctrineId): Doctrine {
    return this.doctrines.get(id) ?? EMPTY_DOCTRINE;
  }

  has(id: DoctrineId): boolean {
    return this.doctrines.has(id);
  }

  get authority(): Doctrine {
    return this.get('authority');
  }
}

/**
 * Load `<dir>/<id>.json` for every advisor, judge and the authority.
 *
 * A missing file leaves that holder with the empty doctrine. A file that
 * is present but invalid throws DoctrineError.
 */
export async function loadDoctrineBook(dir: string, logger?: Logger): Promise<DoctrineBook> {
  const log = logger?.child({ component: 'doctrine' });
  const loaded: Partial<Record<DoctrineId, Doctrine>> = {};
  const missing: DoctrineId[] = [];

  for (const id of DOCTRINE_IDS) {
    const filePath = join(dir, `${id}.json`);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        missing.push(id);
        continue;
      }
      throw new DoctrineError(id, `cannot read ${filePath}: ${errorMessage(error)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new DoctrineError(id, `invalid JSON: ${errorMessage(error)}`);
    }
    loaded[id] = toDoctrine(raw, id);
  }

  if (missing.length > 0) {
    log?.warn({ missing }, 'Doctrine files missing, using empty doctrine');
  }
  log?.info({ loaded: Object.keys(loaded).length }, 'Doctrine loaded');

  return new DoctrineBook(loaded);
}
