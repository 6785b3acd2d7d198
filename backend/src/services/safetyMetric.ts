// Safety Metric for acuity predictions
// Asymmetric: over-triage earns partial credit, under-triage less, and a
// missed emergency earns nothing regardless of the graded scale.

import { AcuityLevel, compareSeverity } from '../types/triage';

export interface SafetyPolicy {
  overTriageScore: number;
  underTriageScore: number;
}

export const DEFAULT_SAFETY_POLICY: SafetyPolicy = {
  overTriageScore: 0.7,
  underTriageScore: 0.3,
};

export type SafetyScorer = (gold: AcuityLevel, predicted: AcuityLevel) => number;

export function scorePrediction(
  gold: AcuityLevel,
  predicted: AcuityLevel,
  policy: SafetyPolicy = DEFAULT_SAFETY_POLICY
): number {
  // Zero tolerance for a missed emergency; checked before anything else
  if (gold === 'Emergency' && predicted !== 'Emergency') {
    return 0;
  }

  if (predicted === gold) {
    return 1;
  }

  return compareSeverity(predicted, gold) > 0 ? policy.overTriageScore : policy.underTriageScore;
}

/**
 * False only for a true emergency that was not predicted as one.
 */
export function redFlagDetected(gold: AcuityLevel, predicted: AcuityLevel): boolean {
  return gold !== 'Emergency' || predicted === 'Emergency';
}

export function combinedScore(
  gold: AcuityLevel,
  predicted: AcuityLevel,
  policy: SafetyPolicy = DEFAULT_SAFETY_POLICY
): number {
  if (!redFlagDetected(gold, predicted)) {
    return 0;
  }
  return scorePrediction(gold, predicted, policy);
}

/**
 * Metric used for exemplar selection and evaluation runs
 */
export function createSafetyScorer(policy: SafetyPolicy = DEFAULT_SAFETY_POLICY): SafetyScorer {
  return (gold, predicted) => combinedScore(gold, predicted, policy);
}

export type TriageOutcome = 'exact' | 'over-triage' | 'under-triage' | 'missed-emergency';

export function classifyOutcome(gold: AcuityLevel, predicted: AcuityLevel): TriageOutcome {
  if (!redFlagDetected(gold, predicted)) return 'missed-emergency';
  if (predicted === gold) return 'exact';
  return compareSeverity(predicted, gold) > 0 ? 'over-triage' : 'under-triage';
}
