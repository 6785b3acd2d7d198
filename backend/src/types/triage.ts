// Core triage domain types shared by the routing, selection and session layers

export const ACUITY_LEVELS = ['Emergency', 'Urgent', 'Moderate', 'HomeCare'] as const;

export type AcuityLevel = (typeof ACUITY_LEVELS)[number];

// Higher rank = more severe
const SEVERITY_RANK: Record<AcuityLevel, number> = {
  Emergency: 3,
  Urgent: 2,
  Moderate: 1,
  HomeCare: 0,
};

/**
 * Compare two acuity levels by severity.
 * Returns a positive number when `a` is more severe than `b`.
 */
export function compareSeverity(a: AcuityLevel, b: AcuityLevel): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/**
 * Parse the spellings classifiers and datasets use for acuity levels
 * ("home care", "home_care", "EMERGENCY", ...). Returns null when unrecognized.
 */
export function parseAcuityLevel(value: string): AcuityLevel | null {
  const normalized = value.trim().toLowerCase().replace(/[\s_-]+/g, '');
  switch (normalized) {
    case 'emergency':
      return 'Emergency';
    case 'urgent':
      return 'Urgent';
    case 'moderate':
      return 'Moderate';
    case 'homecare':
      return 'HomeCare';
    default:
      return null;
  }
}

export const GENERAL_SPECIALIZATION = 'general';

export interface Protocol {
  readonly id: string;
  readonly title: string;
  readonly keywords: ReadonlySet<string>;
  readonly body: string;
}

export interface LabeledCase {
  readonly id: string;
  readonly symptoms: string;
  readonly goldLevel: AcuityLevel;
  readonly rationale: string;
  readonly specialization?: string;
}

export interface SpecializationProfile {
  readonly id: string;
  readonly displayName: string;
  readonly description: string;
  readonly focusKeywords: ReadonlySet<string>;
  readonly focusProtocolIds: ReadonlySet<string>;
  readonly minTrainingCases: number;
}

export interface ExemplarSet {
  readonly specialization: string;
  readonly version: string;
  readonly exemplars: readonly LabeledCase[];
  readonly bootstrapPool: readonly LabeledCase[];
  readonly compiledAt: Date;
}

export interface TriageResult {
  level: AcuityLevel;
  justification: string;
  confidence: number;
  matchedProtocols: string[];
  specialization: string;
}

export interface RouteDecision {
  specialization: string;
  confidence: number;
}

// ==================== Classifier boundary ====================

export interface ClassifierExemplar {
  symptomText: string;
  goldLevel: AcuityLevel;
  rationale: string;
}

export interface ProtocolContext {
  title: string;
  excerpt: string;
}

export interface ClassificationRequest {
  symptomText: string;
  exemplars: ClassifierExemplar[];
  protocolContext: ProtocolContext[];
}

export interface ClassificationOutput {
  level: AcuityLevel;
  justification: string;
  confidence: number;
}

/**
 * Opaque, possibly slow and nondeterministic acuity classifier.
 * Implementations must reject (never resolve a default level) on failure and
 * should stop work when `signal` fires.
 */
export interface Classifier {
  classify(
    request: ClassificationRequest,
    options?: { signal?: AbortSignal }
  ): Promise<ClassificationOutput>;
}
