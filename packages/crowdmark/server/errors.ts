/**
 * Error type shared by the stores and the HTTP layer.
 */

import type { Response } from 'express';

export type ErrorPayload = Record<string, number | string>;

export class ResourceError extends Error {
  status: number;
  code: string;
  payload: ErrorPayload;

  constructor(code: string, message: string, status = 400, payload: ErrorPayload = {}) {
    super(message);
    this.name = 'ResourceError';
    this.code = code;
    this.status = status;
    this.payload = payload;
  }
}

/** Map a thrown error onto an HTTP response. Unknown errors are logged and become 500s. */
export function sendError(res: Response, err: unknown, tag: string): void {
  if (err instanceof ResourceError) {
    res.status(err.status).json({ error: err.code, message: err.message, ...err.payload });
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[${tag}] Error:`, message);
  res.status(500).json({ error: 'internal', message });
}
