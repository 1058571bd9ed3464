import request from 'supertest';
import { createApp } from '../../src/app';
import { HealthSource } from '../../src/routes/health-routes';

function source(ready: boolean): HealthSource {
  return {
    isReady: () => ready,
    vocabularySize: () => (ready ? 5 : 0),
    pendingWrites: () => 2,
    activeRounds: () => 1
  };
}

describe('Health endpoints', () => {
  it('reports service status and counters', async () => {
    const res = await request(createApp(source(true))).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
    expect(res.body.service).toBe('quiz-bot');
    expect(res.body.checks).toEqual({ vocabularyItems: 5, activeRounds: 1, pendingWrites: 2 });
  });

  it('is not ready until the vocabulary is loaded', async () => {
    const res = await request(createApp(source(false))).get('/health/ready');

    expect(res.status).toBe(503);
    expect(res.body.status).toBe('not_ready');
    expect(res.body.reason).toBe('vocabulary not loaded');
  });

  it('is ready once words are available', async () => {
    const res = await request(createApp(source(true))).get('/health/ready');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ready');
  });

  it('answers the liveness probe', async () => {
    const res = await request(createApp(source(false))).get('/health/live');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('alive');
  });

  it('exposes Prometheus metrics', async () => {
    const res = await request(createApp(source(true))).get('/metrics');

    expect(res.status).toBe(200);
    expect(res.text).toContain('# TYPE quiz_bot_answers_total counter');
  });

  it('returns JSON 404 for unknown routes', async () => {
    const res = await request(createApp(source(true))).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found' });
  });
});
