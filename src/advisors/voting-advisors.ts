import type { AdvisorId } from '../types/advisor.js';
import type { AdvisorDefinition } from './definition.js';
import { verdict } from './definition.js';

type VotingDefinition = AdvisorDefinition & { id: AdvisorId };

const adaptation: VotingDefinition = {
  id: 'adaptation',
  title: 'Adaptation',
  knowledgeDomains: ['adaptation', 'strategy'],
  posture: 'creative',
  markerSets: ['change', 'rigid'],
  assess({ text, context, markers, knowledge }) {
    if (markers.any('rigid', text)) {
      return verdict('oppose', 0.65, 'Holding a fixed course while conditions move', {
        concerns: ['Refusal to adjust to new information'],
        recommendations: ['Name one assumption that would change the plan'],
      });
    }
    if (markers.any('change', text)) {
      return verdict('support', 0.7, 'Willingness to adjust to conditions', {
        recommendations: ['Keep the change small enough to reverse'],
      });
    }
    if (context.turnCount > 5 && knowledge.items.length === 0) {
      return verdict('neutral', 0.4, 'Long discussion with no grounding to adapt from');
    }
    return verdict('neutral', 0.5, 'No adaptation signal');
  },
};

const conflict: VotingDefinition = {
  id: 'conflict',
  title: 'Conflict',
  knowledgeDomains: ['conflict', 'power'],
  posture: 'bold',
  markerSets: ['conflict', 'attack'],
  assess({ text, markers }) {
    const found = markers.find('conflict', text);
    if (found.length > 0) {
      const attack = markers.any('attack', text);
      return verdict('oppose', 0.8, `Open conflict signals: ${found.join(', ')}`, {
        redLine: attack,
        concerns: attack ? ['Direct attack invites escalation beyond control'] : ['Conflict costs'],
        recommendations: ['Look for a path that does not require a fight'],
      });
    }
    return verdict('neutral', 0.5, 'No conflict dynamics detected');
  },
};

const diplomacy: VotingDefinition = {
  id: 'diplomacy',
  title: 'Diplomacy',
  knowledgeDomains: ['diplomacy', 'relationships'],
  posture: 'empathetic',
  markerSets: ['relationship'],
  assess({ text, markers }) {
    if (markers.any('relationship', text)) {
      return verdict('support', 0.75, 'Relationships and negotiation are in play', {
        recommendations: ['Secure agreement before committing'],
      });
    }
    return verdict('neutral', 0.4, 'No relationship angle');
  },
};

const data: VotingDefinition = {
  id: 'data',
  title: 'Data',
  knowledgeDomains: ['data'],
  posture: 'analytical',
  markerSets: ['empirical', 'speculative'],
  assess({ text, markers }) {
    const empirical = markers.any('empirical', text);
    if (empirical) {
      return verdict('support', 0.85, 'Decision rests on evidence');
    }
    const speculative = markers.find('speculative', text);
    if (speculative.length > 0) {
      return verdict('oppose', 0.7, `Decision rests on speculation: ${speculative.join(', ')}`, {
        redLine: true,
        concerns: ['No evidence behind the claim'],
        recommendations: ['Gather numbers before acting'],
      });
    }
    return verdict('neutral', 0.5, 'No evidence signal either way');
  },
};

const discipline: VotingDefinition = {
  id: 'discipline',
  title: 'Discipline',
  knowledgeDomains: ['discipline', 'psychology'],
  posture: 'cautious',
  markerSets: ['impulse', 'commitment'],
  assess({ text, context, markers }) {
    const impulsive = markers.any('impulse', text);
    const earlierCommitment = context.recentTurns.some((turn) => markers.any('commitment', turn));
    if (impulsive && earlierCommitment) {
      return verdict('oppose', 0.75, 'Impulse contradicts an earlier commitment', {
        concerns: ['Breaking a stated plan under impulse'],
        recommendations: ['Revisit the original plan before deviating'],
      });
    }
    if (impulsive) {
      return verdict('oppose', 0.7, 'Impulsive framing', {
        recommendations: ['Sleep on it'],
      });
    }
    if (markers.any('commitment', text)) {
      return verdict('support', 0.7, 'Structured, committed approach');
    }
    return verdict('neutral', 0.5, 'No discipline signal');
  },
};

const grandStrategist: VotingDefinition = {
  id: 'grand_strategist',
  title: 'Grand Strategist',
  knowledgeDomains: ['strategy'],
  posture: 'analytical',
  markerSets: ['longTerm'],
  assess({ text, markers }) {
    if (markers.any('longTerm', text)) {
      return verdict('support', 0.8, 'Long-horizon thinking present');
    }
    return verdict('oppose', 0.6, 'No long-term view', {
      concerns: ['Decision optimizes the short term only'],
      recommendations: ['State where this leaves you in five years'],
    });
  },
};

const intelligence: VotingDefinition = {
  id: 'intelligence',
  title: 'Intelligence',
  knowledgeDomains: ['intelligence', 'data'],
  posture: 'analytical',
  markerSets: ['awareness'],
  assess({ text, markers }) {
    if (markers.any('awareness', text)) {
      return verdict('support', 0.75, 'Situation has been investigated');
    }
    return verdict('oppose', 0.6, 'Acting without reconnaissance', {
      recommendations: ['Find out what the other side knows'],
    });
  },
};

const timing: VotingDefinition = {
  id: 'timing',
  title: 'Timing',
  knowledgeDomains: ['timing', 'strategy'],
  posture: 'cautious',
  markerSets: ['urgent', 'patient'],
  assess({ text, markers }) {
    if (markers.any('urgent', text)) {
      return verdict('oppose', 0.7, 'Urgency is forcing the decision', {
        concerns: ['Manufactured deadline'],
        recommendations: ['Check whether the deadline is real'],
      });
    }
    if (markers.any('patient', text)) {
      return verdict('support', 0.6, 'Timing is being considered');
    }
    return verdict('neutral', 0.5, 'Timing not discussed');
  },
};

const risk: VotingDefinition = {
  id: 'risk',
  title: 'Risk',
  knowledgeDomains: ['risk', 'optionality'],
  posture: 'cautious',
  markerSets: ['critical', 'risk'],
  assess({ text, markers }) {
    const critical = markers.find('critical', text);
    if (critical.length > 0) {
      return verdict('oppose', 0.95, `Catastrophic downside: ${critical.join(', ')}`, {
        redLine: true,
        concerns: ['Outcome may be unrecoverable'],
        recommendations: ['Cap the downside before anything else'],
      });
    }
    const risky = markers.find('risk', text);
    if (risky.length > 0) {
      return verdict('oppose', 0.75, `Material risk: ${risky.join(', ')}`, {
        concerns: ['Downside not yet bounded'],
        recommendations: ['Size the position so a loss is survivable'],
      });
    }
    return verdict('support', 0.5, 'No material risk language');
  },
};

const power: VotingDefinition = {
  id: 'power',
  title: 'Power',
  knowledgeDomains: ['power'],
  posture: 'bold',
  markerSets: ['weakness', 'power'],
  assess({ text, markers }) {
    if (markers.any('weakness', text)) {
      return verdict('oppose', 0.7, 'Acting from a weak position', {
        recommendations: ['Build leverage first'],
      });
    }
    if (markers.any('power', text)) {
      return verdict('support', 0.6, 'Leverage is being used');
    }
    return verdict('neutral', 0.5, 'No power dynamics detected');
  },
};

const psychology: VotingDefinition = {
  id: 'psychology',
  title: 'Psychology',
  knowledgeDomains: ['psychology'],
  posture: 'empathetic',
  markerSets: ['denial', 'psyche'],
  assess({ text, markers }) {
    if (markers.any('denial', text)) {
      return verdict('oppose', 0.7, 'Signs of denial', {
        concerns: ['Feelings are being dismissed rather than examined'],
      });
    }
    if (markers.any('psyche', text)) {
      return verdict('support', 0.7, 'Emotional state acknowledged');
    }
    return verdict('neutral', 0.5, 'No psychological signal');
  },
};

const technology: VotingDefinition = {
  id: 'technology',
  title: 'Technology',
  knowledgeDomains: ['technology'],
  posture: 'creative',
  markerSets: ['tech'],
  assess({ text, markers }) {
    if (markers.any('tech', text)) {
      return verdict('support', 0.6, 'Tools and leverage from technology considered');
    }
    return verdict('oppose', 0.5, 'No use of tools or automation');
  },
};

const legitimacy: VotingDefinition = {
  id: 'legitimacy',
  title: 'Legitimacy',
  knowledgeDomains: ['legitimacy', 'ethics'],
  posture: 'cautious',
  markerSets: ['illegitimate', 'legitimate'],
  assess({ text, markers }) {
    const illegitimate = markers.find('illegitimate', text);
    if (illegitimate.length > 0) {
      return verdict('oppose', 0.95, `Legitimacy breach: ${illegitimate.join(', ')}`, {
        redLine: true,
        concerns: ['Legal and reputational exposure'],
      });
    }
    if (markers.any('legitimate', text)) {
      return verdict('support', 0.7, 'Action stays within legitimate bounds');
    }
    return verdict('neutral', 0.5, 'No legitimacy signal');
  },
};

const truth: VotingDefinition = {
  id: 'truth',
  title: 'Truth',
  knowledgeDomains: ['truth', 'ethics'],
  posture: 'analytical',
  markerSets: ['deception', 'truth'],
  assess({ text, markers }) {
    const deception = markers.find('deception', text);
    if (deception.length > 0) {
      return verdict('oppose', 0.9, `Deception involved: ${deception.join(', ')}`, {
        redLine: true,
        concerns: ['Plan depends on others not knowing'],
      });
    }
    if (markers.any('truth', text)) {
      return verdict('support', 0.8, 'Grounded in verifiable facts');
    }
    return verdict('neutral', 0.5, 'No truth signal');
  },
};

const narrative: VotingDefinition = {
  id: 'narrative',
  title: 'Narrative',
  knowledgeDomains: ['narrative'],
  posture: 'creative',
  markerSets: ['story', 'rationalization'],
  assess({ text, context, markers }) {
    const hedges = [...context.recentTurns, text].reduce(
      (sum, turn) => sum + markers.count('rationalization', turn),
      0
    );
    if (hedges >= 3) {
      return verdict('oppose', 0.7, `Story keeps hedging (${String(hedges)} qualifiers)`, {
        concerns: ['Rationalizing rather than deciding'],
      });
    }
    if (markers.any('story', text)) {
      return verdict('support', 0.7, 'Decision fits a coherent story');
    }
    return verdict('neutral', 0.5, 'No narrative signal');
  },
};

const sovereign: VotingDefinition = {
  id: 'sovereign',
  title: 'Sovereign',
  knowledgeDomains: ['sovereignty', 'power'],
  posture: 'bold',
  markerSets: ['agency'],
  assess({ text, markers }) {
    if (markers.any('agency', text)) {
      return verdict('support', 0.8, 'Decision owned by the decider');
    }
    return verdict('oppose', 0.6, 'Agency unclear', {
      recommendations: ['State the decision in the first person'],
    });
  },
};

const optionality: VotingDefinition = {
  id: 'optionality',
  title: 'Optionality',
  knowledgeDomains: ['optionality', 'risk'],
  posture: 'cautious',
  markerSets: ['commitment', 'options'],
  assess({ text, markers }) {
    const hasOptions = markers.any('options', text);
    const locked = markers.find('commitment', text);
    if (locked.length > 0 && !hasOptions) {
      return verdict('oppose', 0.8, `Irreversible commitment: ${locked.join(', ')}`, {
        concerns: ['No exit once committed'],
        recommendations: ['Design an exit before entering'],
      });
    }
    if (hasOptions) {
      return verdict('support', 0.8, 'Exits and alternatives preserved');
    }
    return verdict('neutral', 0.5, 'Optionality not addressed');
  },
};

const riskResources: VotingDefinition = {
  id: 'risk_resources',
  title: 'Resources',
  knowledgeDomains: ['resources', 'risk'],
  posture: 'cautious',
  markerSets: ['depletion', 'resources'],
  assess({ text, markers }) {
    const depletion = markers.find('depletion', text);
    if (depletion.length > 0) {
      return verdict('oppose', 0.8, `Resource depletion: ${depletion.join(', ')}`, {
        concerns: ['No reserve left if it fails'],
        recommendations: ['Keep a buffer untouched'],
      });
    }
    if (markers.any('resources', text)) {
      return verdict('support', 0.7, 'Resources accounted for');
    }
    return verdict('neutral', 0.5, 'Resources not discussed');
  },
};

const warMode: VotingDefinition = {
  id: 'war_mode',
  title: 'War',
  knowledgeDomains: ['conflict', 'power'],
  posture: 'bold',
  markerSets: ['escalation', 'war'],
  assess({ text, markers }) {
    if (markers.any('escalation', text)) {
      return verdict('support', 0.85, 'Escalation is on the table and momentum matters');
    }
    if (markers.any('war', text)) {
      return verdict('support', 0.7, 'Competitive posture');
    }
    return verdict('oppose', 0.6, 'No competitive footing');
  },
};

/**
 * The 19 voting advisors, keyed by id.
 */
export const VOTING_DEFINITIONS: Readonly<Record<AdvisorId, AdvisorDefinition>> = Object.freeze({
  adaptation,
  conflict,
  diplomacy,
  data,
  discipline,
  grand_strategist: grandStrategist,
  intelligence,
  timing,
  risk,
  power,
  psychology,
  technology,
  legitimacy,
  truth,
  narrative,
  sovereign,
  optionality,
  risk_resources: riskResources,
  war_mode: warMode,
});
