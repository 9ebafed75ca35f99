/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * One Symbol per injectable seam, grouped by layer. Register a new seam here
 * before wiring it in container.ts.
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),
  LogScope: Symbol.for('LogScope'),
  LogEventSink: Symbol.for('LogEventSink'),
  BufferPool: Symbol.for('BufferPool'),

  // Configuration
  CaptureConfig: Symbol.for('CaptureConfig'),

  // Services
  CapturePolicy: Symbol.for('CapturePolicy'),
  LogEventEmitter: Symbol.for('LogEventEmitter'),
  BodyCaptureService: Symbol.for('BodyCaptureService'),
  TrafficLogger: Symbol.for('TrafficLogger'),
} as const;
