import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  formatEvaluationSummary,
  runEvaluation,
  saveEvaluationResults,
} from '../../evaluation/evaluationHarness';
import { AcuityLevel, TriageResult } from '../../types/triage';
import { makeCase } from '../helpers/fixtures';

function triageFrom(predictions: Record<string, AcuityLevel>) {
  return async (symptoms: string): Promise<TriageResult> => {
    const level = predictions[symptoms];
    if (!level) {
      throw new Error('classifier down');
    }
    return { level, justification: 'test', confidence: 0.9, matchedProtocols: [], specialization: 'general' };
  };
}

const cases = [
  makeCase('e1', 'Emergency', undefined, 'crushing chest pain'),
  makeCase('e2', 'Emergency', undefined, 'vomiting blood'),
  makeCase('u1', 'Urgent', undefined, 'deep cut'),
  makeCase('m1', 'Moderate', undefined, 'earache'),
];

const predictions: Record<string, AcuityLevel> = {
  'crushing chest pain': 'Emergency',
  'vomiting blood': 'Urgent',
  'deep cut': 'Emergency',
};

describe('Evaluation Harness', () => {
  it('should summarize accuracy, safety score and red-flag recall', async () => {
    const summary = await runEvaluation(cases, triageFrom(predictions));

    expect(summary.totalCases).toBe(4);
    expect(summary.exact).toBe(1);
    expect(summary.accuracy).toBe(0.25);
    // 1 + 0 (missed emergency) + 0.7 (over-triage) + 0 (error)
    expect(summary.averageScore).toBeCloseTo(0.425, 10);
    expect(summary.emergencyCases).toBe(2);
    expect(summary.emergenciesDetected).toBe(1);
    expect(summary.redFlagRecall).toBe(0.5);
    expect(summary.passed).toBe(false);
    expect(summary.byOutcome).toEqual({
      exact: 1,
      'over-triage': 1,
      'under-triage': 0,
      'missed-emergency': 1,
      error: 1,
    });
    expect(summary.failures.map(f => f.caseId)).toEqual(['e2', 'u1', 'm1']);
    expect(summary.failures[2]).toMatchObject({ predicted: null, outcome: 'error', score: 0, error: 'classifier down' });
  });

  it('should pass when every emergency is detected', async () => {
    const summary = await runEvaluation(cases.slice(0, 1), triageFrom(predictions));

    expect(summary.passed).toBe(true);
    expect(summary.redFlagRecall).toBe(1);
  });

  it('should treat a run without emergencies as full recall', async () => {
    const summary = await runEvaluation([], triageFrom(predictions));

    expect(summary.totalCases).toBe(0);
    expect(summary.accuracy).toBe(0);
    expect(summary.redFlagRecall).toBe(1);
    expect(summary.passed).toBe(true);
  });

  it('should format failures for display', async () => {
    const output = formatEvaluationSummary(await runEvaluation(cases, triageFrom(predictions)));

    expect(output).toContain('Emergencies Detected: 1/2\n');
    expect(output).toContain('Status: FAIL\n');
    expect(output).toContain('  - e2: expected Emergency, got Urgent [missed-emergency]\n');
    expect(output).toContain('  - m1: expected Moderate, got ERROR (classifier down) [error]\n');
  });

  it('should save results as JSON', async () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'evaluation-'));
    try {
      const summary = await runEvaluation(cases, triageFrom(predictions));
      const file = saveEvaluationResults(summary, path.join(directory, 'out', 'result.json'));

      const saved: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
      expect(saved).toMatchObject({ totalCases: 4, emergenciesDetected: 1, passed: false });
    } finally {
      fs.rmSync(directory, { recursive: true, force: true });
    }
  });
});
