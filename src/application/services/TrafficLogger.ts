/**
 * Traffic Logger — The Interceptor
 * Layer: Application
 *
 * Sits in front of the rest of the handler chain. For every request:
 *
 *   1. derive the RequestContext and open the ambient log scope
 *   2. request phase (when enabled): RequestCaptured | RequestSkipped
 *   3. run the downstream chain
 *   4. response phase (when enabled): ResponseCaptured | ResponseSkipped
 *   5. scope closes as `invoke` settles, on success or failure
 *
 * The two events of one request are ordered by the awaits below and by
 * nothing else, so concurrent requests cannot reorder them.
 *
 * If the downstream chain throws, the error is rethrown unchanged after a
 * ResponseSkipped event that carries the failure (see
 * BodyCaptureService.reportFailedResponse).
 */
import { CapturePolicy } from '@application/policies/CapturePolicy';
import { TOKENS } from '@core/types';
import type { HttpExchange, NextHandler } from '@domain/interfaces/IHttpExchange';
import type { LogScope } from '@infrastructure/logging/LogScope';
import { inject, injectable } from 'tsyringe';

import { BodyCaptureService } from './BodyCaptureService';
import { deriveRequestContext, toScopeFields } from './ContextEnricher';

@injectable()
export class TrafficLogger {
  constructor(
    @inject(TOKENS.CapturePolicy) private readonly policy: CapturePolicy,
    @inject(TOKENS.BodyCaptureService) private readonly capture: BodyCaptureService,
    @inject(TOKENS.LogScope) private readonly scope: LogScope,
  ) {}

  invoke(exchange: HttpExchange, next: NextHandler): Promise<void> {
    const context = deriveRequestContext(exchange.request);

    return this.scope.run(toScopeFields(context), async () => {
      if (this.policy.requestCaptureEnabled) {
        await this.capture.captureRequest(exchange, context);
      }

      try {
        await next();
      } catch (err) {
        if (this.policy.responseCaptureEnabled) {
          this.capture.reportFailedResponse(exchange, context, err);
        }
        throw err;
      }

      if (this.policy.responseCaptureEnabled) {
        await this.capture.captureResponse(exchange, context);
      }
    });
  }
}
