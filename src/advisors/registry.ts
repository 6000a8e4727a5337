import { ConfigError } from '../core/errors.js';
import type { ScoringEngine } from '../scoring/scoring-engine.js';
import {
  JUDGES,
  VOTING_ADVISORS,
  type AdvisorId,
  type CouncilMemberId,
  type JudgeId,
} from '../types/advisor.js';
import { Advisor } from './advisor.js';
import type { AdvisorDefinition } from './definition.js';
import type { DoctrineBook } from './doctrine.js';
import { JUDGE_DEFINITIONS } from './judges.js';
import type { Lexicon } from './lexicon.js';
import { VOTING_DEFINITIONS } from './voting-advisors.js';

export interface AdvisorRegistryDeps {
  doctrines: DoctrineBook;
  lexicon: Lexicon;
  scoring: ScoringEngine;
  evidenceCount?: number;
}

export function isJudge(id: CouncilMemberId): id is JudgeId {
  return JUDGES.some((judge) => judge === id);
}

/**
 * Fixed roster of council members, keyed by their closed id union.
 *
 * Built once; every member shares the same doctrine book, lexicon and
 * scoring engine. Construction fails if the lexicon lacks a marker set a
 * member's heuristic needs.
 */
export class AdvisorRegistry {
  private readonly members: ReadonlyMap<CouncilMemberId, Advisor>;

  constructor(deps: AdvisorRegistryDeps) {
    const members = new Map<CouncilMemberId, Advisor>();
    const build = (definition: AdvisorDefinition): void => {
      for (const set of definition.markerSets) {
        if (!deps.lexicon.has(definition.id, set)) {
          throw new ConfigError(`lexicon has no marker set ${definition.id}.${set}`);
        }
      }
      members.set(
        definition.id,
        new Advisor(definition, {
          doctrine: deps.doctrines.get(definition.id),
          lexicon: deps.lexicon,
          scoring: deps.scoring,
          evidenceCount: deps.evidenceCount ?? 3,
        })
      );
    };

    for (const id of VOTING_ADVISORS) build(VOTING_DEFINITIONS[id]);
    for (const id of JUDGES) build(JUDGE_DEFINITIONS[id]);
    this.members = members;
  }

  get(id: CouncilMemberId): Advisor {
    const advisor = this.members.get(id);
    if (!advisor) {
      // unreachable: the constructor registers every id of the union
      throw new ConfigError(`advisor ${id} not registered`);
    }
    return advisor;
  }

  /** Voting advisor ids in roster order */
  voting(): AdvisorId[] {
    return [...VOTING_ADVISORS];
  }

  judges(): JudgeId[] {
    return [...JUDGES];
  }

  all(): Advisor[] {
    return [...this.members.values()];
  }
}

/**
 * Factory function for creating the advisor registry.
 */
export function createAdvisorRegistry(deps: AdvisorRegistryDeps): AdvisorRegistry {
  return new AdvisorRegistry(deps);
}
