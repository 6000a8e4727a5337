/**
 * Council module exports.
 */

export { aggregate, tally, CONSENSUS_SHARE, RED_LINE_STRENGTH } from './aggregator.js';
export { Council, createCouncil } from './council.js';
export type { CouncilConfig, CouncilSession, MemberLookup } from './council.js';
