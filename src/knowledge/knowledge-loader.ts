import { readdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { z } from 'zod';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../types/logger.js';
import { KNOWLEDGE_TYPES, type KnowledgeType } from '../types/knowledge.js';
import { KnowledgeStore } from './knowledge-store.js';
import { knowledgeEntryFileSchema, toKnowledgeEntry } from './schema.js';

export interface KnowledgeLoadReport {
  store: KnowledgeStore;
  filesRead: number;
  entriesLoaded: number;
  entriesSkipped: number;
}

/**
 * Entry type implied by a file name ("rules.json" → rule).
 */
export function typeFromFileName(fileName: string): KnowledgeType | undefined {
  const stem = basename(fileName, '.json').toLowerCase();
  return KNOWLEDGE_TYPES.find((type) => stem === type || stem === `${type}s`);
}

/**
 * Load a knowledge directory laid out as `<dir>/<domain>/<file>.json`.
 *
 * Each file holds an array of entries. Entries that fail validation, lack
 * a type, or repeat an id are skipped and logged. A missing directory
 * yields an empty store.
 */
export async function loadKnowledgeDirectory(
  dir: string,
  logger?: Logger
): Promise<KnowledgeLoadReport> {
  const log = logger?.child({ component: 'knowledge-loader' });
  const store = new KnowledgeStore();
  const report: KnowledgeLoadReport = { store, filesRead: 0, entriesLoaded: 0, entriesSkipped: 0 };

  let domains: string[];
  try {
    const dirents = await readdir(dir, { withFileTypes: true });
    domains = dirents.filter((d) => d.isDirectory()).map((d) => d.name).sort();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      log?.warn({ dir }, 'Knowledge directory missing, starting empty');
      return report;
    }
    throw error;
  }

  for (const domain of domains) {
    const domainDir = join(dir, domain);
    const files = (await readdir(domainDir)).filter((f) => f.endsWith('.json')).sort();

    for (const file of files) {
      const filePath = join(domainDir, file);
      let raw: unknown;
      try {
        raw = JSON.parse(await readFile(filePath, 'utf-8'));
      } catch (error) {
        log?.warn({ file: filePath, error: errorMessage(error) }, 'Unreadable knowledge file skipped');
        continue;
      }
      report.filesRead++;

      const list = z.array(z.unknown()).safeParse(raw);
      if (!list.success) {
        log?.warn({ file: filePath }, 'Knowledge file is not an array, skipped');
        continue;
      }

      const impliedType = typeFromFileName(file);
      for (const item of list.data) {
        const parsed = knowledgeEntryFileSchema.safeParse(item);
        if (!parsed.success) {
          report.entriesSkipped++;
          log?.warn(
            { file: filePath, issues: parsed.error.issues.map((i) => i.message) },
            'Invalid knowledge entry skipped'
          );
          continue;
        }

        const type = parsed.data.type ?? impliedType;
        if (!type) {
          report.entriesSkipped++;
          log?.warn({ file: filePath, id: parsed.data.id }, 'Knowledge entry without type skipped');
          continue;
        }

        if (store.get(parsed.data.id)) {
          report.entriesSkipped++;
          log?.warn({ file: filePath, id: parsed.data.id }, 'Duplicate knowledge id skipped');
          continue;
        }

        store.add(
          toKnowledgeEntry(parsed.data, {
            domain,
            type,
            provenance: { book: `${domain}/${basename(file, '.json')}`, file: filePath },
          })
        );
        report.entriesLoaded++;
      }
    }
  }

  log?.info(
    { filesRead: report.filesRead, loaded: report.entriesLoaded, skipped: report.entriesSkipped },
    'Knowledge loaded'
  );
  return report;
}
