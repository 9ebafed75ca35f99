/**
 * Capture Settings Parser
 * Layer: Core
 *
 * The traffic logger's four settings are the only ones with no sensible
 * default: a missing or malformed value stops startup instead of silently
 * capturing (or not capturing) bodies. The schema lives apart from
 * config.ts so it can be exercised without the process-level fail-fast.
 *
 *   LOG_REQUEST_BODY            → requestCaptureEnabled
 *   LOG_REQUEST_BODY_MAX_SIZE   → requestMaxBytes (exclusive)
 *   LOG_RESPONSE_BODY           → responseCaptureEnabled
 *   LOG_RESPONSE_BODY_MAX_SIZE  → responseMaxBytes (exclusive)
 */
import type { CaptureConfig } from '@domain/entities/CaptureConfig';
import { ConfigurationError } from '@shared/errors/AppError';
import { z } from 'zod/v4';

export const captureEnvShape = {
  LOG_REQUEST_BODY: z.stringbool(),
  LOG_REQUEST_BODY_MAX_SIZE: z.coerce.number().int().positive(),
  LOG_RESPONSE_BODY: z.stringbool(),
  LOG_RESPONSE_BODY_MAX_SIZE: z.coerce.number().int().positive(),
};

const captureEnvSchema = z.object(captureEnvShape);

export type CaptureEnv = z.infer<typeof captureEnvSchema>;

export function toCaptureConfig(env: CaptureEnv): CaptureConfig {
  return Object.freeze({
    requestCaptureEnabled: env.LOG_REQUEST_BODY,
    requestMaxBytes: env.LOG_REQUEST_BODY_MAX_SIZE,
    responseCaptureEnabled: env.LOG_RESPONSE_BODY,
    responseMaxBytes: env.LOG_RESPONSE_BODY_MAX_SIZE,
  });
}

export function parseCaptureConfig(source: Record<string, string | undefined>): CaptureConfig {
  const parsed = captureEnvSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return toCaptureConfig(parsed.data);
}
