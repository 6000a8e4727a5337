import type { KnowledgeEntry } from '../types/knowledge.js';

const FALLBACK_BOOK = 'builtin';

function builtin(
  id: string,
  domain: string,
  type: KnowledgeEntry['type'],
  content: string
): KnowledgeEntry {
  return {
    id: `fallback_${id}`,
    domain,
    type,
    content,
    provenance: { book: FALLBACK_BOOK },
    memory: { reinforcementCount: 0, penaltyCount: 0 },
  };
}

/**
 * Small builtin knowledge set used when the knowledge base is empty or
 * could not be loaded. Covers the domains advisors ask about most.
 */
export const FALLBACK_ENTRIES: readonly KnowledgeEntry[] = Object.freeze([
  builtin(
    'risk_ruin',
    'risk',
    'principle',
    'Avoid any action whose worst case is ruin; survival comes before optimization.'
  ),
  builtin(
    'optionality_exit',
    'optionality',
    'principle',
    'Preserve exits. Prefer moves that keep future choices open over irreversible commitments.'
  ),
  builtin(
    'psychology_pause',
    'psychology',
    'advice',
    'Under strong emotion, pause and restate the decision in writing before acting on it.'
  ),
  builtin(
    'risk_downside',
    'risk',
    'warning',
    'Irreversible downside with limited upside is a trap; size the bet so a loss is recoverable.'
  ),
  builtin(
    'strategy_position',
    'strategy',
    'principle',
    'Judge a move by the position it leaves you in over the long-term trajectory, not the immediate relief.'
  ),
  builtin(
    'power_dependency',
    'power',
    'rule',
    'Do not increase dependency on a party who controls your alternatives.'
  ),
  builtin(
    'technology_leverage',
    'technology',
    'claim',
    'Tools and automation multiply leverage but also multiply the cost of mistakes.'
  ),
]);
