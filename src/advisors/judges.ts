import type { JudgeId } from '../types/advisor.js';
import type { AdvisorDefinition } from './definition.js';
import { verdict } from './definition.js';

type JudgeDefinition = AdvisorDefinition & { id: JudgeId };

const tribunal: JudgeDefinition = {
  id: 'tribunal',
  title: 'Tribunal',
  knowledgeDomains: ['ethics', 'legitimacy'],
  posture: 'analytical',
  markerSets: ['evasion', 'accountability'],
  assess({ text, markers }) {
    if (markers.any('evasion', text)) {
      return verdict('oppose', 0.8, 'Responsibility is being deflected', {
        concerns: ['Blame shifted away from the decider'],
      });
    }
    if (markers.any('accountability', text)) {
      return verdict('support', 0.8, 'Consequences are owned');
    }
    return verdict('neutral', 0.5, 'No accountability signal');
  },
};

/**
 * Advisory-only members. Their positions are audited, never counted.
 */
export const JUDGE_DEFINITIONS: Readonly<Record<JudgeId, AdvisorDefinition>> = Object.freeze({
  tribunal,
});
