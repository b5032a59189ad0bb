/**
 * Response helpers shared by the route modules: request ids, the
 * failure-code to HTTP status map and the `{ error, code, requestId }` body.
 */

import type { NextFunction, Request, Response } from 'express';
import { nanoid } from 'nanoid';
import type { SchedulingFailure, SchedulingFailureCode, SchedulingResult } from '../core/types.js';

const FAILURE_STATUS: Record<SchedulingFailureCode, number> = {
  not_found: 404,
  not_pending: 409,
  slot_taken: 409,
  no_slots_configured: 422,
  no_available_slot: 422,
  not_in_future: 422,
  content_missing: 422,
  credential_unavailable: 422,
  publish_rejected: 422,
  invalid_request: 400,
};

export function statusForFailure(code: SchedulingFailureCode): number {
  return FAILURE_STATUS[code];
}

export function resolveRequestId(incoming: string | undefined): string {
  const trimmed = incoming?.trim();
  if (trimmed && trimmed.length > 0 && trimmed.length <= 128) {
    return trimmed;
  }
  return `req_${nanoid(10)}`;
}

export function getRequestId(res: Response): string {
  const header = res.getHeader('x-request-id');
  return typeof header === 'string' && header ? header : 'unknown';
}

export function sendError(res: Response, status: number, message: string, code?: string): void {
  res.status(status).json(code
    ? { error: message, code, requestId: getRequestId(res) }
    : { error: message, requestId: getRequestId(res) });
}

export function sendFailure(res: Response, failure: SchedulingFailure): void {
  sendError(res, statusForFailure(failure.code), failure.message, failure.code);
}

export function sendResult<T>(res: Response, result: SchedulingResult<T>, successStatus: number = 200): void {
  if (!result.ok) {
    sendFailure(res, result);
    return;
  }
  res.status(successStatus).json(result.value);
}

type AsyncHandler = (req: Request, res: Response) => Promise<void> | void;

/** Forwards sync throws and rejected promises to the error middleware. */
export function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}
