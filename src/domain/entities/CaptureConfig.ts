/**
 * Capture Configuration
 * Layer: Domain
 *
 * The four knobs that decide whether bodies are copied into the log. Both
 * ceilings are exclusive: a body whose declared length equals the max is
 * skipped. Loaded once at startup (see core/config.ts) and frozen.
 */
export interface CaptureConfig {
  readonly requestCaptureEnabled: boolean;
  readonly requestMaxBytes: number;
  readonly responseCaptureEnabled: boolean;
  readonly responseMaxBytes: number;
}
