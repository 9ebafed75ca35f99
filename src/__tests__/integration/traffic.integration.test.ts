/**
 * Integration Tests — Traffic Logging through Express
 *
 * Drives real requests through createApp() with Supertest and watches the
 * events reaching the container's log sink. Capture limits come from
 * jest.setup.ts: both phases on, 1000-byte ceilings, a 10kb body limit.
 *
 * What these pin down beyond the unit tests: the body parsers keep the raw
 * bytes for capture, the buffered response still reaches the client intact,
 * and host-supplied identity ends up in the ambient fields.
 */
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { LogEvent } from '@domain/entities/LogEvent';
import type { ILogEventSink } from '@domain/interfaces/ILogEventSink';
import { createApp } from '@interfaces/http/app';
import type { RequestHandler } from 'express';
import request from 'supertest';
import { gzipSync } from 'node:zlib';

describe('traffic logging', () => {
  const sink = container.resolve<ILogEventSink>(TOKENS.LogEventSink);
  let events: LogEvent[];

  beforeEach(() => {
    events = [];
    jest.spyOn(sink, 'write').mockImplementation((event: LogEvent) => {
      events.push(event);
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('POST /api/v1/diagnostics/echo', () => {
    const app = createApp();
    const payload = '{"name":"widget","qty":2}';

    it('should capture the request and response bodies and still echo the payload', async () => {
      const res = await request(app)
        .post('/api/v1/diagnostics/echo')
        .set('Content-Type', 'application/json')
        .set('User-Agent', 'traffic-test/1.0')
        .send(payload);

      expect(res.status).toBe(200);
      expect(res.text).toBe(payload);
      expect(events.map((event) => event.template)).toEqual(['RequestCaptured', 'ResponseCaptured']);

      const [requestEvent, responseEvent] = events;
      expect(requestEvent.fields.RequestBody).toBe(payload);
      expect(requestEvent.fields.RequestMethod).toBe('POST');
      expect(requestEvent.fields.RequestPath).toBe('/api/v1/diagnostics/echo');
      expect(requestEvent.fields.RequestHeaders).toEqual(
        expect.objectContaining({ 'content-type': 'application/json', 'user-agent': 'traffic-test/1.0' }),
      );
      expect(responseEvent.fields.ResponseBody).toBe(payload);
      expect(responseEvent.fields.StatusCode).toBe(200);
      expect(typeof responseEvent.fields.ElapsedMs).toBe('number');
    });

    it('should attach anonymous identity, peer address and user agent to both events', async () => {
      await request(app)
        .post('/api/v1/diagnostics/echo')
        .set('Content-Type', 'text/plain')
        .set('User-Agent', 'traffic-test/1.0')
        .send('ping');

      for (const event of events) {
        expect(event.fields.UserName).toBe('*');
        expect(String(event.fields.IP)).toMatch(/127\.0\.0\.1|::1/);
        expect(event.fields.UserAgent).toBe('traffic-test/1.0');
      }
    });

    it('should skip both bodies at the 1000-byte ceiling and deliver the response unchanged', async () => {
      const big = 'z'.repeat(1000);

      const res = await request(app)
        .post('/api/v1/diagnostics/echo')
        .set('Content-Type', 'text/plain')
        .send(big);

      expect(res.text).toBe(big);
      expect(events.map((event) => event.template)).toEqual(['RequestSkipped', 'ResponseSkipped']);
      expect(events[1].fields.StatusCode).toBe(200);
    });

    it('should capture a 999-byte body', async () => {
      const body = 'y'.repeat(999);

      await request(app).post('/api/v1/diagnostics/echo').set('Content-Type', 'text/plain').send(body);

      expect(events[0].template).toBe('RequestCaptured');
      expect(events[0].fields.RequestBody).toBe(body);
    });
  });

  describe('requests the app refuses', () => {
    const app = createApp();

    it('should log the body of a malformed JSON request and the 400 answering it', async () => {
      const res = await request(app)
        .post('/api/v1/diagnostics/echo')
        .set('Content-Type', 'application/json')
        .send('{"name":');

      expect(res.status).toBe(400);
      expect(events.map((event) => event.template)).toEqual(['RequestCaptured', 'ResponseCaptured']);
      expect(events[0].fields.RequestBody).toBe('{"name":');
      expect(events[1].fields.StatusCode).toBe(400);
    });

    it('should log a CORS preflight answered before routing', async () => {
      const res = await request(app)
        .options('/api/v1/diagnostics/echo')
        .set('Origin', 'http://client.test')
        .set('Access-Control-Request-Method', 'POST');

      expect(res.status).toBe(204);
      expect(events.map((event) => event.template)).toEqual(['RequestSkipped', 'ResponseSkipped']);
      expect(events[0].fields.RequestMethod).toBe('OPTIONS');
      expect(events[1].fields.StatusCode).toBe(204);
    });

    it('should skip a body over the parser limit and log the 413', async () => {
      const res = await request(app)
        .post('/api/v1/diagnostics/echo')
        .set('Content-Type', 'text/plain')
        .send('x'.repeat(20 * 1024));

      expect(res.status).toBe(413);
      expect(events.map((event) => event.template)).toEqual(['RequestSkipped', 'ResponseCaptured']);
      expect(events[1].fields.StatusCode).toBe(413);
      expect(events[1].fields.ResponseBody).toBe('{"status":"error","message":"request entity too large"}');
    });
  });

  it('should capture the decoded text of a gzip-encoded request in full', async () => {
    const app = createApp();
    const text = 'traffic '.repeat(60);
    const compressed = gzipSync(Buffer.from(text, 'utf8'));

    const res = await request(app)
      .post('/api/v1/diagnostics/echo')
      .set('Content-Type', 'text/plain')
      .set('Content-Encoding', 'gzip')
      .send(compressed);

    expect(text).toHaveLength(480);
    expect(compressed.length).toBeLessThan(480);
    expect(res.text).toBe(text);
    expect(events.map((event) => event.template)).toEqual(['RequestCaptured', 'ResponseCaptured']);
    expect(events[0].fields.RequestBody).toBe(text);
  });

  it('should skip a request without a body and a streamed response without a length', async () => {
    const app = createApp();

    const res = await request(app).get('/api/v1/diagnostics/stream');

    expect(res.status).toBe(200);
    expect(res.text).toBe('chunk-1\nchunk-2\n');
    expect(events.map((event) => event.template)).toEqual(['RequestSkipped', 'ResponseSkipped']);
    expect(events[1].message).toBe('HTTP Response: GET /api/v1/diagnostics/stream 200 (Body Skipped)');
  });

  it('should log the error handler\'s 500 as the response', async () => {
    const app = createApp();

    const res = await request(app).get('/api/v1/diagnostics/fail');

    expect(res.status).toBe(500);
    expect(events[1].template).toBe('ResponseCaptured');
    expect(events[1].fields.StatusCode).toBe(500);
    expect(events[1].fields.ResponseBody).toBe('{"status":"error","message":"Internal server error"}');
  });

  it('should log a 404 for an unknown route', async () => {
    const app = createApp();

    const res = await request(app).get('/api/v1/nowhere');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 'error', message: 'Route not found: GET /api/v1/nowhere' });
    expect(events[1].fields.StatusCode).toBe(404);
  });

  it('should log the name of the principal set by the host authentication step', async () => {
    const authentication: RequestHandler = (req, _res, next) => {
      req.user = { name: 'alice', isAuthenticated: true };
      next();
    };
    const app = createApp({ authentication });

    await request(app).get('/api/v1/health');

    expect(events).toHaveLength(2);
    expect(events.every((event) => event.fields.UserName === 'alice')).toBe(true);
  });
});
