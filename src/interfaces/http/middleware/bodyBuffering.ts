/**
 * Request Body Buffering
 * Layer: Interfaces (HTTP)
 *
 * The traffic logger needs a request body it can read and rewind, so the
 * host reads the body up front. Each parser keeps the exact bytes it read on
 * `req.rawBody` through its `verify` hook; whichever parser matches the
 * content type first wins, and `raw` takes everything the others did not.
 *
 * The traffic logger middleware runs these itself and holds their errors
 * back (413 over `limit`, 400 for malformed JSON) until its request phase
 * has logged the body, so they are not mounted on the app directly.
 */
import type { IncomingMessage } from 'node:http';

import express from 'express';
import type { RequestHandler } from 'express';

function retainRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  req.rawBody = buf;
}

export function bodyBuffering(limit: string): RequestHandler[] {
  return [
    express.json({ limit, verify: retainRawBody }),
    express.urlencoded({ extended: false, limit, verify: retainRawBody }),
    express.text({ type: 'text/*', limit, verify: retainRawBody }),
    express.raw({ type: () => true, limit, verify: retainRawBody }),
  ];
}
