/**
 * Unit Tests — LogEventEmitter
 *
 * Message rendering, ambient-field merging and precedence, immutability of
 * the composed event, and a failing sink not escaping.
 */
import { LogEventEmitter, renderTemplate } from '@application/services/LogEventEmitter';
import { LogScope } from '@infrastructure/logging/LogScope';
import pino from 'pino';

import { RecordingSink } from '../helpers/recordingSink';

describe('renderTemplate()', () => {
  it('should substitute known tokens and leave unknown ones', () => {
    expect(
      renderTemplate('HTTP Response: {RequestMethod} {RequestPath} {StatusCode} {Missing}', {
        RequestMethod: 'GET',
        RequestPath: '/a',
        StatusCode: 204,
      }),
    ).toBe('HTTP Response: GET /a 204 {Missing}');
  });

  it('should render object values as JSON', () => {
    expect(renderTemplate('{RequestHeaders}', { RequestHeaders: { host: 'x' } })).toBe('{"host":"x"}');
  });
});

describe('LogEventEmitter', () => {
  let sink: RecordingSink;
  let scope: LogScope;
  let emitter: LogEventEmitter;
  const logger = pino({ level: 'silent' });

  beforeEach(() => {
    sink = new RecordingSink();
    scope = new LogScope();
    emitter = new LogEventEmitter(sink, scope, logger);
  });

  it('should hand one composed event to the sink', () => {
    const event = emitter.emit('RequestSkipped', { RequestMethod: 'GET', RequestPath: '/health' });

    expect(sink.events).toEqual([event]);
    expect(event).toEqual({
      template: 'RequestSkipped',
      message: 'HTTP Request: GET /health (Body Skipped)',
      fields: { RequestMethod: 'GET', RequestPath: '/health' },
    });
  });

  it('should merge the ambient scope fields, letting event fields win', async () => {
    const event = await scope.run({ UserName: 'alice', IP: '10.1.1.1' }, async () =>
      emitter.emit('ResponseSkipped', {
        RequestMethod: 'GET',
        RequestPath: '/x',
        StatusCode: 404,
        IP: 'overridden',
      }),
    );

    expect(event.fields).toEqual({
      UserName: 'alice',
      IP: 'overridden',
      RequestMethod: 'GET',
      RequestPath: '/x',
      StatusCode: 404,
    });
  });

  it('should freeze the event and its fields', () => {
    const event = emitter.emit('RequestSkipped', { RequestMethod: 'GET', RequestPath: '/' });

    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.fields)).toBe(true);
  });

  it('should report a failing sink on the logger and still return the event', () => {
    jest.spyOn(sink, 'write').mockImplementation(() => {
      throw new Error('sink offline');
    });
    const warnSpy = jest.spyOn(logger, 'warn');

    const event = emitter.emit('RequestSkipped', { RequestMethod: 'GET', RequestPath: '/' });

    expect(event.template).toBe('RequestSkipped');
    expect(warnSpy).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'RequestSkipped' }),
      'Traffic log event could not be written',
    );
  });
});
