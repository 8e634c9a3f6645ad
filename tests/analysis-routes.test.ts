import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../server/app';
import { loadConfig } from '../server/config';
import {
  createTestDependencies,
  resetDependencies,
  setDependencies,
} from '../server/services/analysis/dependencies';

const SCENARIO_TEXT = 'The basement shows severe cracks and the kitchen has mold growth.';

function buildApp(env: Record<string, string> = {}): Express {
  return createApp(loadConfig({ NODE_ENV: 'test', ...env }));
}

describe('Analysis API', () => {
  let app: Express;

  beforeEach(() => {
    setDependencies(createTestDependencies());
    app = buildApp();
  });

  afterEach(() => {
    resetDependencies();
  });

  describe('GET /health', () => {
    it('should report service and classifier status', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 'ok',
        service: 'Survey Defect Analyzer',
        version: '1.0.0',
        classifier: { name: 'none', available: false },
      });
    });
  });

  describe('POST /api/analyses/text', () => {
    it('should analyse text and store the result', async () => {
      const res = await request(app)
        .post('/api/analyses/text')
        .send({ filename: 'survey.txt', text: SCENARIO_TEXT });

      expect(res.status).toBe(201);
      expect(res.body.duplicateOf).toBeNull();
      expect(res.body.truncated).toBe(false);
      expect(res.body.report).toEqual({
        filename: 'survey.txt',
        defects: [
          { type: 'Structural', keyword: 'crack', sentence: SCENARIO_TEXT, severity: 'High', confidence: 0.88, area: 'basement' },
          { type: 'Mold & Fungus', keyword: 'mold', sentence: SCENARIO_TEXT, severity: 'High', confidence: 0.88, area: 'kitchen' },
        ],
        summary: { Structural: 1, 'Mold & Fungus': 1 },
        total_defects: 2,
        timestamp: '2024-01-15T10:00:00.000Z',
      });
    });

    it('should reject an invalid request body', async () => {
      const res = await request(app).post('/api/analyses/text').send({ filename: '', text: SCENARIO_TEXT });

      expect(res.status).toBe(400);
      expect(res.body.type).toBe('urn:survey-defect-analyzer:problem:validation-error');
      expect(res.body.errors).toEqual([
        { path: 'filename', message: 'String must contain at least 1 character(s)' },
      ]);
    });

    it('should reject malformed JSON', async () => {
      const res = await request(app)
        .post('/api/analyses/text')
        .set('Content-Type', 'application/json')
        .send('{"filename": "survey.txt",');

      expect(res.status).toBe(400);
      expect(res.body.detail).toBe('Malformed JSON body');
    });

    it.each([
      ['text without defects', 'The property was painted blue.'],
      ['empty text', ''],
    ])('should store an analysis with no defects for %s', async (_label, text) => {
      const res = await request(app).post('/api/analyses/text').send({ filename: 'clean.txt', text });

      expect(res.status).toBe(201);
      expect(res.body.truncated).toBe(false);
      expect(res.body.report).toMatchObject({
        filename: 'clean.txt',
        defects: [],
        summary: {},
        total_defects: 0,
      });
    });
  });

  describe('POST /api/analyses', () => {
    it('should analyse an uploaded text document', async () => {
      const res = await request(app)
        .post('/api/analyses')
        .set('Content-Type', 'text/plain')
        .set('X-Filename', encodeURIComponent('Flat 3 survey.txt'))
        .send(Buffer.from(SCENARIO_TEXT));

      expect(res.status).toBe(201);
      expect(res.body.report.filename).toBe('Flat 3 survey.txt');
      expect(res.body.report.total_defects).toBe(2);
    });

    it('should accept the filename as a query parameter and strip directories', async () => {
      const res = await request(app)
        .post('/api/analyses?filename=reports%2Fsurvey.txt')
        .set('Content-Type', 'text/plain')
        .send(Buffer.from(SCENARIO_TEXT));

      expect(res.status).toBe(201);
      expect(res.body.report.filename).toBe('survey.txt');
    });

    it('should link a repeated upload to the first analysis', async () => {
      const upload = () =>
        request(app)
          .post('/api/analyses')
          .set('Content-Type', 'text/plain')
          .set('X-Filename', 'survey.txt')
          .send(Buffer.from(SCENARIO_TEXT));

      const first = await upload();
      const second = await upload();

      expect(second.status).toBe(201);
      expect(second.body.duplicateOf).toBe(first.body.id);
    });

    it('should require a filename', async () => {
      const res = await request(app).post('/api/analyses').set('Content-Type', 'text/plain').send(Buffer.from(SCENARIO_TEXT));

      expect(res.status).toBe(400);
      expect(res.body.detail).toBe('A filename is required in the X-Filename header or the filename query parameter');
    });

    it('should require a document body', async () => {
      const res = await request(app).post('/api/analyses').set('X-Filename', 'survey.txt');

      expect(res.status).toBe(400);
      expect(res.body.detail).toBe('The request body must contain the document bytes');
    });

    it('should reject unsupported document types', async () => {
      const res = await request(app)
        .post('/api/analyses')
        .set('Content-Type', 'image/png')
        .set('X-Filename', 'photo.png')
        .send(Buffer.from('not really a png'));

      expect(res.status).toBe(415);
      expect(res.body.type).toBe('urn:survey-defect-analyzer:problem:unsupported-media-type');
    });

    it('should reject text that is not valid UTF-8', async () => {
      const res = await request(app)
        .post('/api/analyses')
        .set('Content-Type', 'text/plain')
        .set('X-Filename', 'broken.txt')
        .send(Buffer.from([0xff, 0xfe, 0xfd]));

      expect(res.status).toBe(422);
      expect(res.body.type).toBe('urn:survey-defect-analyzer:problem:document-decoding-error');
    });

    it('should reject uploads above the size limit', async () => {
      const smallApp = buildApp({ MAX_UPLOAD_BYTES: '32' });
      const res = await request(smallApp)
        .post('/api/analyses')
        .set('Content-Type', 'text/plain')
        .set('X-Filename', 'survey.txt')
        .send(Buffer.from(SCENARIO_TEXT));

      expect(res.status).toBe(413);
      expect(res.body.title).toBe('Payload Too Large');
    });
  });

  describe('POST /api/predict', () => {
    it('should return the report without storing it', async () => {
      const res = await request(app)
        .post('/api/predict')
        .set('Content-Type', 'text/plain')
        .set('X-Filename', 'survey.txt')
        .send(Buffer.from(SCENARIO_TEXT));

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 'success',
        filename: 'survey.txt',
        summary: { Structural: 1, 'Mold & Fungus': 1 },
        total_defects: 2,
        processing_method: 'rule_based',
        truncated: false,
      });

      const list = await request(app).get('/api/analyses');
      expect(list.body.analyses).toEqual([]);
    });
  });

  describe('stored analyses', () => {
    async function storeScenario(filename = 'survey.txt'): Promise<string> {
      const res = await request(app).post('/api/analyses/text').send({ filename, text: SCENARIO_TEXT });
      return res.body.id;
    }

    it('should list analyses up to the limit', async () => {
      await storeScenario('first.txt');
      await storeScenario('second.txt');

      const res = await request(app).get('/api/analyses?limit=1');

      expect(res.status).toBe(200);
      expect(res.body.limit).toBe(1);
      expect(res.body.analyses.map((a: { filename: string }) => a.filename)).toEqual(['second.txt']);
    });

    it('should reject an out-of-range limit', async () => {
      const res = await request(app).get('/api/analyses?limit=500');
      expect(res.status).toBe(400);
    });

    it('should return one analysis with its defects', async () => {
      const id = await storeScenario();
      const res = await request(app).get(`/api/analyses/${id}`);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id, filename: 'survey.txt', totalDefects: 2, processingMethod: 'rule_based' });
      expect(res.body.defects.map((d: { keyword: string }) => d.keyword)).toEqual(['crack', 'mold']);
    });

    it('should return 404 with the request id for an unknown analysis', async () => {
      const res = await request(app).get('/api/analyses/missing').set('X-Correlation-Id', 'test-correlation-1');

      expect(res.status).toBe(404);
      expect(res.headers['x-correlation-id']).toBe('test-correlation-1');
      expect(res.body).toMatchObject({
        type: 'urn:survey-defect-analyzer:problem:not-found',
        title: 'Not Found',
        status: 404,
        detail: 'Analysis not found',
        instance: '/api/analyses/missing',
        traceId: 'test-correlation-1',
      });
    });

    it('should export defects as CSV', async () => {
      const id = await storeScenario();
      const res = await request(app).get(`/api/analyses/${id}/export.csv`);

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(res.headers['content-disposition']).toBe('attachment; filename="defect_analysis_survey.csv"');
      expect(res.text).toBe(
        [
          '"Type","Keyword","Severity","Confidence","Area","Sentence"',
          `"Structural","crack","High","0.880","basement","${SCENARIO_TEXT}"`,
          `"Mold & Fungus","mold","High","0.880","kitchen","${SCENARIO_TEXT}"`,
        ].join('\n') + '\n'
      );
    });

    it('should delete an analysis', async () => {
      const id = await storeScenario();
      const res = await request(app).delete(`/api/analyses/${id}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        id,
        filename: 'survey.txt',
        deletedDefects: 2,
        message: 'Deleted analysis of "survey.txt" and 2 defect(s)',
      });
      expect((await request(app).get(`/api/analyses/${id}`)).status).toBe(404);
      expect((await request(app).delete(`/api/analyses/${id}`)).status).toBe(404);
    });

    it('should report aggregate statistics', async () => {
      await storeScenario();
      const res = await request(app).get('/api/stats');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        totalAnalyses: 1,
        totalDefects: 2,
        averageDefectsPerAnalysis: 2,
        averageConfidence: 0.88,
        defectsByCategory: { Structural: 1, 'Mold & Fungus': 1 },
        defectsBySeverity: { High: 2 },
        defectsByArea: { basement: 1, kitchen: 1 },
        analysesByMethod: { rule_based: 1 },
      });
    });
  });

  describe('cross-cutting behaviour', () => {
    it('should return RFC 7807 problems for unknown routes', async () => {
      const res = await request(app).get('/api/unknown');

      expect(res.status).toBe(404);
      expect(res.headers['content-type']).toMatch(/application\/json/);
      expect(res.body.detail).toBe('Route GET /api/unknown not found');
    });

    it('should generate a correlation id when none is sent', async () => {
      const res = await request(app).get('/health');
      expect(res.headers['x-correlation-id']).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should rate limit API requests', async () => {
      const limitedApp = buildApp({ RATE_LIMIT_MAX: '2' });

      await request(limitedApp).get('/api/stats');
      await request(limitedApp).get('/api/stats');
      const res = await request(limitedApp).get('/api/stats');

      expect(res.status).toBe(429);
      expect(res.body).toMatchObject({ status: 429, title: 'Too Many Requests', retryAfter: 60 });
    });
  });
});
