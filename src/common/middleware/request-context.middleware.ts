import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { randomUUID } from 'node:crypto';

const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Assigns the request id (echoed back in the response) and the request
 * deadline signal that bounds upstream work started on behalf of the request.
 */
export function createRequestContextMiddleware(options: { deadlineMs: number }): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const headerValue = req.header(REQUEST_ID_HEADER);
    const requestId =
      headerValue && headerValue.trim().length > 0 ? headerValue.trim().slice(0, 128) : randomUUID();

    req.requestId = requestId;
    req.deadline = AbortSignal.timeout(options.deadlineMs);
    res.setHeader(REQUEST_ID_HEADER, requestId);

    next();
  };
}
