import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Server } from 'http';
import { createApp } from '../../app';
import { loadEnv } from '../../config/env';
import { TriageContext, buildTriageContext } from '../../services/triageContext';
import { FakeClassifier, answer, fixtureProtocols, fixtureRegistry, makeCase, makeExemplarSet } from '../helpers/fixtures';

const CARDIAC = 'Crushing chest pain, shortness of breath and diaphoresis';

describe('Triage API', () => {
  let directory: string;
  let context: TriageContext;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'triage-api-'));
    const classifier = new FakeClassifier(request => {
      if (request.symptomText.includes('boom')) {
        throw new Error('boom');
      }
      return request.protocolContext.some(p => p.title === 'Chest Pain')
        ? answer('Emergency', 0.95)
        : answer('HomeCare', 0.8);
    });
    context = buildTriageContext(
      loadEnv({ EXEMPLARS_DIR: directory }),
      classifier,
      fixtureProtocols(),
      fixtureRegistry(),
      'fake'
    );

    server = createApp(context).listen(0, '127.0.0.1');
    await new Promise<void>(resolve => server.once('listening', () => resolve()));
    const address = server.address();
    if (typeof address !== 'object' || address === null) {
      throw new Error('Server did not bind to a port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    fs.rmSync(directory, { recursive: true, force: true });
  });

  const post = (body: string) =>
    fetch(`${baseUrl}/api/triage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });

  describe('POST /api/triage', () => {
    it('should return the triage result', async () => {
      const res = await post(JSON.stringify({ symptoms: CARDIAC }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'success',
        data: {
          level: 'Emergency',
          justification: 'classified as Emergency',
          confidence: 0.95,
          matchedProtocols: ['chest_pain', 'shortness_of_breath'],
          specialization: 'chf_nurse',
        },
      });
    });

    it('should honor a specialization hint', async () => {
      const res = await post(JSON.stringify({ symptoms: 'runny nose', specialization: 'respiratory_nurse' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { level: 'HomeCare', specialization: 'respiratory_nurse', matchedProtocols: ['cold_symptoms'] },
      });
    });

    it('should reject empty symptoms', async () => {
      const res = await post(JSON.stringify({ symptoms: '   ' }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status: 'error',
        code: 'VALIDATION_FAILED',
        message: 'Validation failed',
        details: [{ field: 'symptoms', message: 'Symptoms cannot be empty' }],
      });
    });

    it('should reject malformed JSON', async () => {
      const res = await post('{"symptoms":');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ status: 'error', code: 'INVALID_REQUEST' });
    });

    it('should return 404 for an unknown specialization', async () => {
      const res = await post(JSON.stringify({ symptoms: 'cough', specialization: 'oncology_nurse' }));

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        status: 'error',
        code: 'UNKNOWN_SPECIALIZATION',
        message: 'Specialization "oncology_nurse" not found',
      });
    });

    it('should return 503 when the classifier fails', async () => {
      const res = await post(JSON.stringify({ symptoms: 'boom' }));

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        status: 'error',
        code: 'CLASSIFICATION_UNAVAILABLE',
        message: 'Classifier failed: boom',
      });
    });
  });

  describe('GET /api/specializations', () => {
    it('should list profiles with their readiness', async () => {
      context.exemplars.publish(makeExemplarSet('chf_nurse', 'chf_nurse-1', [makeCase('chf_1', 'Urgent', 'chf_nurse')]));

      const res = await fetch(`${baseUrl}/api/specializations`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'success',
        data: {
          total: 5,
          specializations: [
            {
              id: 'chf_nurse',
              focusKeywords: ['chest pain', 'shortness of breath', 'diaphoresis', 'edema'],
              ready: true,
              version: 'chf_nurse-1',
              compiledAt: '2024-05-01T10:00:00.000Z',
            },
            { id: 'ed_nurse', ready: false, version: null, compiledAt: null },
            { id: 'respiratory_nurse' },
            { id: 'pediatric_nurse' },
            { id: 'general', focusKeywords: [] },
          ],
        },
      });
    });

    it('should describe one profile', async () => {
      const res = await fetch(`${baseUrl}/api/specializations/ed_nurse`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'success',
        data: {
          id: 'ed_nurse',
          displayName: 'ed_nurse',
          description: 'ed_nurse profile',
          focusKeywords: ['chest pain', 'unconscious', 'head injury', 'severe pain'],
          focusProtocolIds: ['chest_pain', 'head_injury'],
          minTrainingCases: 3,
          ready: false,
          version: null,
          compiledAt: null,
          exemplarCount: 0,
          bootstrapPoolSize: 0,
        },
      });
    });

    it('should return 404 for an unknown profile and 400 for a malformed id', async () => {
      expect((await fetch(`${baseUrl}/api/specializations/oncology_nurse`)).status).toBe(404);

      const res = await fetch(`${baseUrl}/api/specializations/Bad-Id`);
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: 'VALIDATION_FAILED', message: 'Invalid URL parameters' });
    });
  });

  describe('GET /health', () => {
    it('should report corpus and readiness', async () => {
      const res = await fetch(`${baseUrl}/health`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'ok',
        protocols: 5,
        specializations: 5,
      });
    });
  });
});
