/**
 * Default persona per decision-support group. Groups not listed fall back
 * to the treating physician.
 */
export const DEFAULT_PERSONA = 'physician';

export const PERSONA_BY_GROUP: Readonly<Record<string, string>> = {
  diagnostic_reasoning: 'physician',
  therapy_selection: 'physician',
  medication_selection: 'pharmacist',
  oncology_pathway: 'oncologist',
  diagnostic_workflow: 'physician',
  precision_testing: 'genetic_counselor',
  task_prioritisation: 'nurse',
  quality_gap_closure: 'quality_officer',
  behaviour_change: 'health_coach',
  safety_guardrail: 'pharmacist',
  safety_appropriateness: 'radiologist',
  monitoring_cadence: 'nurse',
  population_oversight: 'care_manager',
  quality_tracking: 'quality_officer',
  predictive_analytics: 'care_manager',
  regulatory_reporting: 'public_health_officer',
  collaborative_planning: 'patient',
  social_context_adjustment: 'social_worker',
  engagement: 'patient',
  knowledge_lookup: 'physician',
  workflow_automation: 'informaticist',
  documentation: 'physician',
  escalation_handoff: 'nurse',
};

export function personaFor(group: string): string {
  return PERSONA_BY_GROUP[group] ?? DEFAULT_PERSONA;
}
