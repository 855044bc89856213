export type { BlastRadius } from "./impact.js";
export { blastRadius } from "./impact.js";
export type {
  SlaCompliance,
  SlaDefaults,
  SlaFilters,
  TeamSlaBreakdown,
} from "./sla.js";
export { DEFAULT_SLA_WINDOW_DAYS, slaCompliance } from "./sla.js";
