/**
 * Wires the triage engine from configuration: corpus, profiles, router,
 * published exemplars and the session that ties them together.
 */

import { Classifier, LabeledCase, Protocol } from '../types/triage';
import { Env } from '../config/env';
import { logAppEvent } from '../utils/logger';
import { loadProtocols, loadSpecializations } from './dataLoader';
import { ExemplarRegistry } from './exemplarRegistry';
import { ExemplarSelector } from './exemplarSelector';
import { ExemplarStore } from './exemplarStore';
import { ProtocolMatcher } from './protocolMatcher';
import { createSafetyScorer } from './safetyMetric';
import { SpecializationRegistry } from './specializationRegistry';
import { SpecializationRouter } from './specializationRouter';
import { TriageSession } from './triageSession';

export interface TriageContext {
  matcher: ProtocolMatcher;
  specializations: SpecializationRegistry;
  router: SpecializationRouter;
  exemplars: ExemplarRegistry;
  store: ExemplarStore;
  session: TriageSession;
  selector: ExemplarSelector;
}

export type EngineSettings = Pick<
  Env,
  | 'EXEMPLARS_DIR'
  | 'CLASSIFIER_TIMEOUT_MS'
  | 'PROTOCOL_TOP_K'
  | 'ROUTER_MIN_CONFIDENCE'
  | 'SAFETY_OVER_TRIAGE_SCORE'
  | 'SAFETY_UNDER_TRIAGE_SCORE'
  | 'COMPILE_CONCURRENCY'
  | 'OPENAI_MODEL'
>;

export function buildTriageContext(
  settings: EngineSettings,
  classifier: Classifier,
  protocols: readonly Protocol[],
  specializations: SpecializationRegistry,
  classifierName = settings.OPENAI_MODEL
): TriageContext {
  const matcher = new ProtocolMatcher(protocols);
  const router = new SpecializationRouter(specializations, matcher, {
    ...(settings.ROUTER_MIN_CONFIDENCE !== undefined ? { minConfidence: settings.ROUTER_MIN_CONFIDENCE } : {}),
  });
  const exemplars = new ExemplarRegistry();
  const store = new ExemplarStore(settings.EXEMPLARS_DIR);

  const session = new TriageSession(classifier, router, matcher, specializations, exemplars, {
    timeoutMs: settings.CLASSIFIER_TIMEOUT_MS,
    topK: settings.PROTOCOL_TOP_K,
    classifierName,
  });

  const selector = new ExemplarSelector(classifier, specializations, matcher, {
    scorer: createSafetyScorer({
      overTriageScore: settings.SAFETY_OVER_TRIAGE_SCORE,
      underTriageScore: settings.SAFETY_UNDER_TRIAGE_SCORE,
    }),
    timeoutMs: settings.CLASSIFIER_TIMEOUT_MS,
    concurrency: settings.COMPILE_CONCURRENCY,
    protocolTopK: settings.PROTOCOL_TOP_K,
  });

  return { matcher, specializations, router, exemplars, store, session, selector };
}

/**
 * Build from the configured data files and publish every compiled set on disk
 */
export async function loadTriageContext(
  env: Env,
  classifier: Classifier,
  classifierName?: string
): Promise<TriageContext> {
  const protocols = loadProtocols(env.PROTOCOLS_PATH);
  const specializations = loadSpecializations(env.SPECIALIZATIONS_PATH);
  const context = buildTriageContext(env, classifier, protocols, specializations, classifierName);

  const ready = await context.store.loadInto(
    context.exemplars,
    specializations.list().map(p => p.id)
  );
  logAppEvent('Triage engine ready', {
    protocols: context.matcher.size,
    specializations: specializations.list().length,
    compiled: ready,
  });

  return context;
}

/**
 * Compile, persist and publish one specialization. The registry only changes
 * after the new set is fully built and saved.
 */
export async function compileAndPublish(
  context: TriageContext,
  specialization: string,
  cases: readonly LabeledCase[],
  limits: { maxBootstrapped: number; maxLabeled: number },
  signal?: AbortSignal
): Promise<{ version: string; path: string; poolSize: number; exemplarCount: number }> {
  const set = await context.selector.compile(
    specialization,
    cases,
    limits.maxBootstrapped,
    limits.maxLabeled,
    { signal }
  );
  const path = await context.store.save(set);
  context.exemplars.publish(set);
  return {
    version: set.version,
    path,
    poolSize: set.bootstrapPool.length,
    exemplarCount: set.exemplars.length,
  };
}
