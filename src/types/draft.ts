/**
 * Types for the draft outline produced by the `draft` fidelity level.
 */

export type Specialty =
  | 'cardiology'
  | 'oncology'
  | 'endocrinology'
  | 'pulmonology'
  | 'general';

export type DecisionPattern =
  | 'for-patients-recommend'
  | 'recommend-for-patients'
  | 'order-for-patients'
  | 'order-for'
  | 'monitor-patients-for';

export interface DecisionPoint {
  action: string;
  patient_criteria: string[];
  pattern: DecisionPattern;
}

export interface DraftOutline {
  document_name: string;
  specialty: Specialty;
  decision_points: DecisionPoint[];
  /** Category ids with a match phrase inside some decision point, registry order */
  category_hints: string[];
}
