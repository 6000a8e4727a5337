/**
 * Mode routing exports.
 */

export {
  ModeRouter,
  createModeRouter,
  selectMeetingAdvisors,
  WAR_COUNCIL,
  MEETING_DOMAIN_ADVISORS,
  MEETING_MIN,
  MEETING_MAX,
} from './mode-router.js';
export type { ModeInterpretation, ModePlan, RoutingSituation } from './mode-router.js';
