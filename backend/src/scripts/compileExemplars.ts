/**
 * Compile few-shot exemplar sets for one or every specialization.
 *
 *   npm run compile -- --specialization chf_nurse --max-bootstrapped 8 --max-labeled 4
 */

import dotenv from 'dotenv';
dotenv.config();

import { parseArgs } from 'util';
import { loadEnv } from '../config/env';
import { InsufficientDataError } from '../middleware/errorHandler';
import { loadCases } from '../services/dataLoader';
import { createOpenAIClassifier } from '../services/openaiClassifier';
import { compileAndPublish, loadTriageContext } from '../services/triageContext';
import { logAppEvent, logError, logger } from '../utils/logger';

function nonNegativeInt(value: string | undefined, fallback: number, flag: string): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`--${flag} must be a non-negative integer`);
  }
  return parsed;
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      specialization: { type: 'string', short: 's' },
      'max-bootstrapped': { type: 'string' },
      'max-labeled': { type: 'string' },
    },
  });

  const env = loadEnv();
  const classifier = createOpenAIClassifier(env);
  const context = await loadTriageContext(env, classifier, classifier.model);
  const cases = loadCases(env.CASES_PATH);

  const limits = {
    maxBootstrapped: nonNegativeInt(values['max-bootstrapped'], env.MAX_BOOTSTRAPPED_DEMOS, 'max-bootstrapped'),
    maxLabeled: nonNegativeInt(values['max-labeled'], env.MAX_LABELED_DEMOS, 'max-labeled'),
  };

  const targets = values.specialization
    ? [context.specializations.get(values.specialization).id]
    : context.specializations.list().map(p => p.id);

  // Ctrl+C discards the in-progress compilation; published sets stay intact
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  let failures = 0;
  for (const specialization of targets) {
    if (controller.signal.aborted) break;
    try {
      const result = await compileAndPublish(context, specialization, cases, limits, controller.signal);
      logAppEvent('Compiled specialization', { specialization, ...result });
    } catch (error) {
      failures++;
      if (error instanceof InsufficientDataError) {
        logger.warn(`Skipped ${specialization}: ${error.message}`);
      } else {
        logError(`Failed to compile ${specialization}`, error instanceof Error ? error : new Error(String(error)));
      }
    }
  }

  logAppEvent('Compilation summary', {
    requested: targets.length,
    failed: failures,
    ready: context.exemplars.readySpecializations(),
  });
  return failures > 0 ? 1 : 0;
}

main()
  .then(code => process.exit(code))
  .catch((error: unknown) => {
    logError('Compilation run failed', error instanceof Error ? error : new Error(String(error)));
    process.exit(1);
  });
