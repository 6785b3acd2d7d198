/**
 * Exemplar Selector
 * Bootstrap-style selection of few-shot exemplars: run the classifier on every
 * candidate case without demos, score each prediction with the safety metric,
 * and keep the best-scoring cases. Builds a fresh frozen ExemplarSet; never
 * touches a previously compiled one.
 */

import {
  Classifier,
  ExemplarSet,
  GENERAL_SPECIALIZATION,
  LabeledCase,
} from '../types/triage';
import {
  ClassificationUnavailableError,
  CompilationAbortedError,
  InsufficientDataError,
} from '../middleware/errorHandler';
import { logAppEvent, logger, startLatencyTracking, endLatencyTracking } from '../utils/logger';
import { AbortedError, errorMessage, withRetry, withTimeout } from '../utils/retryLogic';
import { SafetyScorer, createSafetyScorer } from './safetyMetric';
import { ProtocolMatcher } from './protocolMatcher';
import { SpecializationRegistry } from './specializationRegistry';

export interface SelectorOptions {
  scorer: SafetyScorer;
  /** Per classifier call */
  timeoutMs: number;
  /** Classifier calls in flight at once */
  concurrency: number;
  /** Protocol context attached to each bootstrap call; 0 disables it */
  protocolTopK: number;
  /** Delay before the single retry of a failed call */
  retryDelayMs: number;
}

export interface CompileOptions {
  signal?: AbortSignal;
  /** Failed candidates tolerated before the whole compilation is abandoned */
  maxErrors?: number;
}

export interface CandidateEvaluation {
  candidate: LabeledCase;
  order: number;
  score: number;
  selectable: boolean;
}

const DEFAULT_SELECTOR_OPTIONS: SelectorOptions = {
  scorer: createSafetyScorer(),
  timeoutMs: 30000,
  concurrency: 1,
  protocolTopK: 3,
  retryDelayMs: 250,
};

/**
 * Rank by score descending; equal scores keep their original order
 */
export function rankEvaluations(evaluations: readonly CandidateEvaluation[]): CandidateEvaluation[] {
  return [...evaluations].sort((a, b) => b.score - a.score || a.order - b.order);
}

export class ExemplarSelector {
  private readonly options: SelectorOptions;

  constructor(
    private readonly classifier: Classifier,
    private readonly registry: SpecializationRegistry,
    private readonly matcher?: ProtocolMatcher,
    options: Partial<SelectorOptions> = {}
  ) {
    this.options = { ...DEFAULT_SELECTOR_OPTIONS, ...options };
  }

  async compile(
    specializationId: string,
    candidateCases: readonly LabeledCase[],
    maxBootstrapped: number,
    maxLabeled: number,
    options: CompileOptions = {}
  ): Promise<ExemplarSet> {
    if (!Number.isInteger(maxBootstrapped) || maxBootstrapped < 0) {
      throw new RangeError('maxBootstrapped must be a non-negative integer');
    }
    if (!Number.isInteger(maxLabeled) || maxLabeled < 0) {
      throw new RangeError('maxLabeled must be a non-negative integer');
    }

    const profile = this.registry.get(specializationId);
    const candidates = profile.id === GENERAL_SPECIALIZATION
      ? [...candidateCases]
      : candidateCases.filter(c => c.specialization === profile.id);

    if (candidates.length < profile.minTrainingCases) {
      throw new InsufficientDataError(profile.id, candidates.length, profile.minTrainingCases);
    }

    const metrics = startLatencyTracking('exemplar_compile', { specialization: profile.id });
    logAppEvent('Exemplar compilation started', {
      specialization: profile.id,
      candidates: candidates.length,
      maxBootstrapped,
      maxLabeled,
    });

    const evaluations = await this.evaluateAll(profile.id, candidates, options);

    // A zero score (a missed emergency, or a failed call) never becomes a demo
    const ranked = rankEvaluations(evaluations);
    const bootstrapPool = ranked
      .filter(e => e.selectable && e.score > 0)
      .slice(0, maxBootstrapped)
      .map(e => e.candidate);
    const exemplars = bootstrapPool.slice(0, maxLabeled);

    const compiledAt = new Date();
    const set: ExemplarSet = Object.freeze({
      specialization: profile.id,
      version: `${profile.id}-${compiledAt.getTime()}`,
      exemplars: Object.freeze(exemplars),
      bootstrapPool: Object.freeze(bootstrapPool),
      compiledAt,
    });

    endLatencyTracking(metrics);
    logAppEvent('Exemplar compilation finished', {
      specialization: profile.id,
      version: set.version,
      poolSize: bootstrapPool.length,
      exemplarCount: exemplars.length,
      failed: evaluations.filter(e => !e.selectable).length,
      rejected: evaluations.filter(e => e.selectable && e.score <= 0).length,
    });

    return set;
  }

  private async evaluateAll(
    specialization: string,
    candidates: LabeledCase[],
    options: CompileOptions
  ): Promise<CandidateEvaluation[]> {
    // Internal controller so an exhausted error budget also stops in-flight calls
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const maxErrors = options.maxErrors ?? Number.POSITIVE_INFINITY;
    const batchSize = Math.max(1, this.options.concurrency);
    const evaluations: CandidateEvaluation[] = [];
    let failures = 0;

    try {
      for (let i = 0; i < candidates.length; i += batchSize) {
        if (options.signal?.aborted) {
          throw new CompilationAbortedError(specialization);
        }

        const batch = candidates.slice(i, i + batchSize);
        const results = await Promise.allSettled(
          batch.map(candidate => this.scoreCandidate(candidate, controller.signal))
        );

        if (options.signal?.aborted) {
          throw new CompilationAbortedError(specialization);
        }

        results.forEach((result, j) => {
          const order = i + j;
          const candidate = batch[j];
          if (result.status === 'fulfilled') {
            evaluations.push({ candidate, order, score: result.value, selectable: true });
            return;
          }

          failures++;
          logger.warn('Bootstrap attempt discarded', {
            specialization,
            caseId: candidate.id,
            error: errorMessage(result.reason),
          });
          evaluations.push({ candidate, order, score: 0, selectable: false });
        });

        if (failures > maxErrors) {
          controller.abort();
          throw new ClassificationUnavailableError(
            `Compilation of "${specialization}" exceeded ${maxErrors} classifier failures`
          );
        }
      }
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }

    return evaluations;
  }

  /**
   * Classify one case without demos and score it; one retry on failure
   */
  private async scoreCandidate(candidate: LabeledCase, signal: AbortSignal): Promise<number> {
    const protocolIds = this.matcher && this.options.protocolTopK > 0
      ? this.matcher.match(candidate.symptoms, this.options.protocolTopK)
      : [];
    const protocolContext = this.matcher ? this.matcher.contextFor(protocolIds) : [];

    const prediction = await withRetry(
      () =>
        withTimeout(
          childSignal =>
            this.classifier.classify(
              { symptomText: candidate.symptoms, exemplars: [], protocolContext },
              { signal: childSignal }
            ),
          this.options.timeoutMs,
          signal
        ),
      {
        maxRetries: 1,
        baseDelayMs: this.options.retryDelayMs,
        maxDelayMs: this.options.retryDelayMs,
        signal,
        isRetryable: error => !(error instanceof AbortedError),
      }
    );

    return this.options.scorer(candidate.goldLevel, prediction.level);
  }
}
