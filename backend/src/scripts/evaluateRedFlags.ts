/**
 * Red-flag stress test: every case in the red-flag file must come back as
 * Emergency. Exits non-zero otherwise.
 */

import dotenv from 'dotenv';
dotenv.config();

import { loadEnv } from '../config/env';
import {
  formatEvaluationSummary,
  runEvaluation,
  saveEvaluationResults,
} from '../evaluation/evaluationHarness';
import { loadCases } from '../services/dataLoader';
import { createOpenAIClassifier } from '../services/openaiClassifier';
import { createSafetyScorer } from '../services/safetyMetric';
import { loadTriageContext } from '../services/triageContext';
import { logAppEvent, logError } from '../utils/logger';

async function main(): Promise<number> {
  const env = loadEnv();
  const classifier = createOpenAIClassifier(env);
  const context = await loadTriageContext(env, classifier, classifier.model);
  const cases = loadCases(env.RED_FLAG_CASES_PATH);

  const summary = await runEvaluation(
    cases,
    symptoms => context.session.triage(symptoms),
    createSafetyScorer({
      overTriageScore: env.SAFETY_OVER_TRIAGE_SCORE,
      underTriageScore: env.SAFETY_UNDER_TRIAGE_SCORE,
    })
  );

  process.stdout.write(formatEvaluationSummary(summary));
  const reportPath = saveEvaluationResults(summary);
  logAppEvent('Red-flag evaluation saved', { path: reportPath, passed: summary.passed });

  return summary.passed ? 0 : 1;
}

main()
  .then(code => process.exit(code))
  .catch((error: unknown) => {
    logError('Red-flag evaluation failed', error instanceof Error ? error : new Error(String(error)));
    process.exit(1);
  });
