/**
 * Integration Tests — Health Endpoint
 *
 * `GET /api/v1/health` through the full middleware chain via Supertest's
 * in-memory connection; no port is bound.
 */
import { createApp } from '@interfaces/http/app';
import request from 'supertest';

describe('GET /api/v1/health', () => {
  const app = createApp();

  it('should return 200 with status "ok"', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('should include an uptime value and a valid ISO 8601 timestamp', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(typeof res.body.uptime).toBe('number');
    expect(new Date(res.body.timestamp).toISOString()).toBe(res.body.timestamp);
  });

  it('should report which capture phases are enabled', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.body.capture).toEqual({ request: true, response: true });
  });

  it('should return JSON content type', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.headers['content-type']).toMatch(/application\/json/);
  });
});
