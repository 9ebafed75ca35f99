/**
 * Unit Tests — parseCaptureConfig
 *
 * The capture settings are required and strictly typed; anything missing
 * or malformed must stop startup with a ConfigurationError naming the key.
 */
import { parseCaptureConfig } from '@core/captureConfig';
import { ConfigurationError } from '@shared/errors/AppError';

describe('parseCaptureConfig()', () => {
  const valid = {
    LOG_REQUEST_BODY: 'true',
    LOG_REQUEST_BODY_MAX_SIZE: '4096',
    LOG_RESPONSE_BODY: 'false',
    LOG_RESPONSE_BODY_MAX_SIZE: '2048',
  };

  it('should parse and coerce a complete set of settings', () => {
    expect(parseCaptureConfig(valid)).toEqual({
      requestCaptureEnabled: true,
      requestMaxBytes: 4096,
      responseCaptureEnabled: false,
      responseMaxBytes: 2048,
    });
  });

  it('should return a frozen config', () => {
    expect(Object.isFrozen(parseCaptureConfig(valid))).toBe(true);
  });

  it('should fail when a setting is missing', () => {
    const { LOG_RESPONSE_BODY: _omitted, ...rest } = valid;

    expect(() => parseCaptureConfig(rest)).toThrow(ConfigurationError);
  });

  it('should reject a boolean that is not a recognised boolean string', () => {
    try {
      parseCaptureConfig({ ...valid, LOG_REQUEST_BODY: 'sometimes' });
      throw new Error('expected parseCaptureConfig to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect((err as ConfigurationError).issues).toHaveLength(1);
      expect((err as ConfigurationError).issues[0]).toMatch(/^LOG_REQUEST_BODY: /);
      expect((err as ConfigurationError).isOperational).toBe(false);
    }
  });

  it.each(['abc', '1.5', '0', '-10'])('should reject max size %p', (value) => {
    expect(() => parseCaptureConfig({ ...valid, LOG_RESPONSE_BODY_MAX_SIZE: value })).toThrow(
      /LOG_RESPONSE_BODY_MAX_SIZE/,
    );
  });
});
