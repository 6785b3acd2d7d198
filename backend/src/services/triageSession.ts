/**
 * Triage Session
 * One end-to-end classification: route, match protocols, snapshot the
 * published exemplars, classify. A classifier failure surfaces as
 * ClassificationUnavailableError; no acuity level is ever assumed.
 */

import {
  Classifier,
  ClassifierExemplar,
  ExemplarSet,
  GENERAL_SPECIALIZATION,
  RouteDecision,
  TriageResult,
} from '../types/triage';
import { ClassificationUnavailableError, UnknownSpecializationError } from '../middleware/errorHandler';
import { logClassifierCall, startLatencyTracking, endLatencyTracking } from '../utils/logger';
import { AbortedError, TimeoutError, errorMessage, withTimeout } from '../utils/retryLogic';
import { ExemplarRegistry } from './exemplarRegistry';
import { DEFAULT_EXCERPT_CHARS, ProtocolMatcher } from './protocolMatcher';
import { SpecializationRegistry } from './specializationRegistry';
import { SpecializationRouter } from './specializationRouter';

export interface TriageSessionOptions {
  timeoutMs: number;
  topK: number;
  excerptChars: number;
  classifierName: string;
}

export interface TriageOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Known specialization id; skips routing */
  specialization?: string;
  topK?: number;
}

const DEFAULT_SESSION_OPTIONS: TriageSessionOptions = {
  timeoutMs: 30000,
  topK: 3,
  excerptChars: DEFAULT_EXCERPT_CHARS,
  classifierName: 'classifier',
};

export function toClassifierExemplars(set: ExemplarSet | undefined): ClassifierExemplar[] {
  if (!set) return [];
  return set.exemplars.map(c => ({
    symptomText: c.symptoms,
    goldLevel: c.goldLevel,
    rationale: c.rationale,
  }));
}

export class TriageSession {
  private readonly options: TriageSessionOptions;

  constructor(
    private readonly classifier: Classifier,
    private readonly router: SpecializationRouter,
    private readonly matcher: ProtocolMatcher,
    private readonly specializations: SpecializationRegistry,
    private readonly exemplars: ExemplarRegistry,
    options: Partial<TriageSessionOptions> = {}
  ) {
    this.options = { ...DEFAULT_SESSION_OPTIONS, ...options };
  }

  route(symptomText: string, hint?: string): RouteDecision {
    if (hint) {
      if (!this.specializations.has(hint)) {
        throw new UnknownSpecializationError(hint);
      }
      return { specialization: hint, confidence: 1 };
    }
    return this.router.route(symptomText);
  }

  /**
   * Matches within the specialization's focus scope come first; the rest of
   * the topK is filled from the whole corpus
   */
  matchProtocols(symptomText: string, specialization: string, topK: number): string[] {
    const global = this.matcher.match(symptomText, topK);
    const scope = this.specializations.get(specialization).focusProtocolIds;
    if (specialization === GENERAL_SPECIALIZATION || scope.size === 0) {
      return global;
    }

    const matched = this.matcher.match(symptomText, topK, scope);
    for (const id of global) {
      if (matched.length >= topK) break;
      if (!matched.includes(id)) matched.push(id);
    }
    return matched;
  }

  async triage(symptomText: string, options: TriageOptions = {}): Promise<TriageResult> {
    const route = this.route(symptomText, options.specialization);
    const topK = options.topK ?? this.options.topK;
    const matchedProtocols = this.matchProtocols(symptomText, route.specialization, topK);

    // Captured once; a publish during the call does not change what this request sees
    const snapshot = this.exemplars.resolve(route.specialization);

    const request = {
      symptomText,
      exemplars: toClassifierExemplars(snapshot),
      protocolContext: this.matcher.contextFor(matchedProtocols, this.options.excerptChars),
    };

    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const metrics = startLatencyTracking('triage', { specialization: route.specialization });

    try {
      const output = await withTimeout(
        signal => this.classifier.classify(request, { signal }),
        timeoutMs,
        options.signal
      );
      const duration = endLatencyTracking(metrics);
      logClassifierCall({
        operation: 'triage',
        model: this.options.classifierName,
        duration,
        success: true,
        inputLength: symptomText.length,
      });

      return {
        level: output.level,
        justification: output.justification,
        confidence: clampUnit(output.confidence),
        matchedProtocols,
        specialization: route.specialization,
      };
    } catch (error) {
      const duration = endLatencyTracking(metrics);
      logClassifierCall({
        operation: 'triage',
        model: this.options.classifierName,
        duration,
        success: false,
        inputLength: symptomText.length,
        error: errorMessage(error),
      });

      throw new ClassificationUnavailableError(describeFailure(error), error);
    }
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof TimeoutError) {
    return `Classifier timed out after ${error.timeoutMs}ms`;
  }
  if (error instanceof AbortedError) {
    return 'Classification was cancelled';
  }
  return `Classifier failed: ${errorMessage(error)}`;
}

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
