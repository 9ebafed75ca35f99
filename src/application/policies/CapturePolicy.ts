/**
 * Capture Policy
 * Layer: Application
 *
 * Decides from the declared content length alone whether a body is copied
 * into the log. Kept free of I/O so the thresholds can be tested directly.
 * The enable flags are not consulted here: when a phase is disabled the
 * TrafficLogger never asks.
 */
import { TOKENS } from '@core/types';
import type { CaptureConfig } from '@domain/entities/CaptureConfig';
import { inject, injectable } from 'tsyringe';

/** True for 0 < length < maxBytes; an undeclared length never qualifies. */
export function isWithinCeiling(contentLength: number | undefined, maxBytes: number): boolean {
  return contentLength !== undefined && contentLength > 0 && contentLength < maxBytes;
}

@injectable()
export class CapturePolicy {
  constructor(@inject(TOKENS.CaptureConfig) private readonly captureConfig: CaptureConfig) {}

  get requestCaptureEnabled(): boolean {
    return this.captureConfig.requestCaptureEnabled;
  }

  get responseCaptureEnabled(): boolean {
    return this.captureConfig.responseCaptureEnabled;
  }

  shouldCaptureRequest(contentLength: number | undefined): boolean {
    return isWithinCeiling(contentLength, this.captureConfig.requestMaxBytes);
  }

  shouldCaptureResponse(contentLength: number | undefined): boolean {
    return isWithinCeiling(contentLength, this.captureConfig.responseMaxBytes);
  }
}
