/**
 * Evaluation Harness for the triage engine
 * Runs labeled cases through a triage function and measures exact accuracy,
 * safety score and, above all, emergency (red-flag) recall.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AcuityLevel, LabeledCase, TriageResult } from '../types/triage';
import { errorMessage } from '../utils/retryLogic';
import { SafetyScorer, TriageOutcome, classifyOutcome, createSafetyScorer } from '../services/safetyMetric';

export interface CaseEvaluation {
  caseId: string;
  expected: AcuityLevel;
  predicted: AcuityLevel | null;
  outcome: TriageOutcome | 'error';
  score: number;
  latencyMs: number;
  error?: string;
}

export interface EvaluationSummary {
  totalCases: number;
  exact: number;
  accuracy: number;
  averageScore: number;
  averageLatency: number;
  emergencyCases: number;
  emergenciesDetected: number;
  redFlagRecall: number;
  /** True only when every emergency case was classified Emergency */
  passed: boolean;
  byOutcome: Record<TriageOutcome | 'error', number>;
  failures: CaseEvaluation[];
}

export type TriageFn = (symptoms: string) => Promise<TriageResult>;

async function evaluateCase(testCase: LabeledCase, triage: TriageFn, scorer: SafetyScorer): Promise<CaseEvaluation> {
  const startTime = Date.now();
  try {
    const result = await triage(testCase.symptoms);
    return {
      caseId: testCase.id,
      expected: testCase.goldLevel,
      predicted: result.level,
      outcome: classifyOutcome(testCase.goldLevel, result.level),
      score: scorer(testCase.goldLevel, result.level),
      latencyMs: Date.now() - startTime,
    };
  } catch (error) {
    // An unanswered case counts as a miss, never as a pass
    return {
      caseId: testCase.id,
      expected: testCase.goldLevel,
      predicted: null,
      outcome: 'error',
      score: 0,
      latencyMs: Date.now() - startTime,
      error: errorMessage(error),
    };
  }
}

export function summarize(results: readonly CaseEvaluation[]): EvaluationSummary {
  const byOutcome: EvaluationSummary['byOutcome'] = {
    exact: 0,
    'over-triage': 0,
    'under-triage': 0,
    'missed-emergency': 0,
    error: 0,
  };
  for (const r of results) byOutcome[r.outcome]++;

  const total = results.length;
  const emergencies = results.filter(r => r.expected === 'Emergency');
  const detected = emergencies.filter(r => r.predicted === 'Emergency').length;

  return {
    totalCases: total,
    exact: byOutcome.exact,
    accuracy: total ? byOutcome.exact / total : 0,
    averageScore: total ? results.reduce((sum, r) => sum + r.score, 0) / total : 0,
    averageLatency: total ? results.reduce((sum, r) => sum + r.latencyMs, 0) / total : 0,
    emergencyCases: emergencies.length,
    emergenciesDetected: detected,
    redFlagRecall: emergencies.length ? detected / emergencies.length : 1,
    passed: detected === emergencies.length,
    byOutcome,
    failures: results.filter(r => r.outcome !== 'exact'),
  };
}

/**
 * Cases run sequentially so latency numbers reflect one request at a time
 */
export async function runEvaluation(
  cases: readonly LabeledCase[],
  triage: TriageFn,
  scorer: SafetyScorer = createSafetyScorer()
): Promise<EvaluationSummary> {
  const results: CaseEvaluation[] = [];
  for (const testCase of cases) {
    results.push(await evaluateCase(testCase, triage, scorer));
  }
  return summarize(results);
}

export function saveEvaluationResults(summary: EvaluationSummary, filepath?: string): string {
  const outputPath = filepath || path.join(process.cwd(), 'evaluation_results', `red_flag_${Date.now()}.json`);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify({ timestamp: new Date().toISOString(), ...summary }, null, 2));
  return outputPath;
}

/**
 * Format evaluation summary for display
 */
export function formatEvaluationSummary(summary: EvaluationSummary): string {
  let output = '\n=== Red-Flag Evaluation ===\n\n';
  output += `Total Cases: ${summary.totalCases}\n`;
  output += `Exact: ${summary.exact} (${(summary.accuracy * 100).toFixed(1)}%)\n`;
  output += `Average Safety Score: ${summary.averageScore.toFixed(2)}\n`;
  output += `Emergencies Detected: ${summary.emergenciesDetected}/${summary.emergencyCases}\n`;
  output += `Average Latency: ${Math.round(summary.averageLatency)}ms\n`;
  output += `Status: ${summary.passed ? 'PASS' : 'FAIL'}\n`;

  if (summary.failures.length > 0) {
    output += '\nFailed Cases:\n';
    for (const failure of summary.failures.slice(0, 10)) {
      const got = failure.predicted ?? `ERROR (${failure.error ?? 'unknown'})`;
      output += `  - ${failure.caseId}: expected ${failure.expected}, got ${got} [${failure.outcome}]\n`;
    }
    if (summary.failures.length > 10) {
      output += `  ... and ${summary.failures.length - 10} more\n`;
    }
  }

  return output;
}
