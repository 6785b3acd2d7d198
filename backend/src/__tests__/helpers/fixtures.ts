/**
 * Shared test data: a small protocol corpus, a specialization registry and a
 * scriptable classifier double.
 */

import {
  AcuityLevel,
  ClassificationOutput,
  ClassificationRequest,
  Classifier,
  ExemplarSet,
  LabeledCase,
  Protocol,
  SpecializationProfile,
} from '../../types/triage';
import { SpecializationRegistry } from '../../services/specializationRegistry';

export function makeProtocol(id: string, title: string, keywords: string[], body = `${title} guidance`): Protocol {
  return { id, title, keywords: new Set(keywords), body };
}

export function fixtureProtocols(): Protocol[] {
  return [
    makeProtocol('chest_pain', 'Chest Pain', ['chest pain', 'diaphoresis', 'left arm'],
      'Emergency: crushing chest pain with sweating. Call an ambulance.'),
    makeProtocol('shortness_of_breath', 'Shortness of Breath', ['shortness of breath', 'wheezing', 'dyspnea'],
      'Emergency: unable to speak in sentences.'),
    makeProtocol('cold_symptoms', 'Colds', ['runny nose', 'sneezing', 'sore throat'],
      'Home Care: rest and fluids.'),
    makeProtocol('fever_child', 'Fever - Child', ['fever', 'child', 'infant'],
      'Urgent: infant with fever who is hard to wake.'),
    makeProtocol('head_injury', 'Head Injury', ['head injury', 'unconscious', 'fall'],
      'Emergency: loss of consciousness after a head injury.'),
  ];
}

export function makeProfile(
  id: string,
  focusKeywords: string[],
  focusProtocolIds: string[] = [],
  minTrainingCases = 3
): SpecializationProfile {
  return {
    id,
    displayName: id,
    description: `${id} profile`,
    focusKeywords: new Set(focusKeywords),
    focusProtocolIds: new Set(focusProtocolIds),
    minTrainingCases,
  };
}

export function fixtureProfiles(): SpecializationProfile[] {
  return [
    makeProfile('chf_nurse', ['chest pain', 'shortness of breath', 'diaphoresis', 'edema'],
      ['chest_pain', 'shortness_of_breath']),
    makeProfile('ed_nurse', ['chest pain', 'unconscious', 'head injury', 'severe pain'],
      ['chest_pain', 'head_injury']),
    makeProfile('respiratory_nurse', ['shortness of breath', 'wheezing', 'cough'],
      ['shortness_of_breath']),
    makeProfile('pediatric_nurse', ['child', 'infant', 'fever'], ['fever_child']),
    makeProfile('general', [], [], 4),
  ];
}

export function fixtureRegistry(): SpecializationRegistry {
  return new SpecializationRegistry(fixtureProfiles());
}

export function makeCase(
  id: string,
  goldLevel: AcuityLevel,
  specialization?: string,
  symptoms = `symptoms for ${id}`
): LabeledCase {
  return {
    id,
    symptoms,
    goldLevel,
    rationale: `rationale for ${id}`,
    ...(specialization ? { specialization } : {}),
  };
}

export function makeExemplarSet(
  specialization: string,
  version: string,
  exemplars: LabeledCase[] = []
): ExemplarSet {
  return Object.freeze({
    specialization,
    version,
    exemplars: Object.freeze([...exemplars]),
    bootstrapPool: Object.freeze([...exemplars]),
    compiledAt: new Date('2024-05-01T10:00:00.000Z'),
  });
}

type Responder = (
  request: ClassificationRequest,
  signal: AbortSignal | undefined,
  call: number
) => ClassificationOutput | Promise<ClassificationOutput>;

/**
 * Classifier double that records every request and answers through `respond`
 */
export class FakeClassifier implements Classifier {
  readonly requests: ClassificationRequest[] = [];

  constructor(private readonly respond: Responder) {}

  async classify(request: ClassificationRequest, options: { signal?: AbortSignal } = {}): Promise<ClassificationOutput> {
    this.requests.push(request);
    return this.respond(request, options.signal, this.requests.length);
  }

  callsFor(symptomText: string): number {
    return this.requests.filter(r => r.symptomText === symptomText).length;
  }
}

export function answer(level: AcuityLevel, confidence = 0.9): ClassificationOutput {
  return { level, justification: `classified as ${level}`, confidence };
}

/**
 * A promise that settles only when the signal aborts
 */
export function pendingUntilAborted(signal: AbortSignal | undefined): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('aborted by caller')), { once: true });
  });
}
