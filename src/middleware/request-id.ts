import { randomUUID } from "node:crypto";
import type { NextFunction, Request, Response } from "express";

export const REQUEST_ID_HEADER = "X-Request-Id";

const ACCEPTED_REQUEST_ID = /^[A-Za-z0-9._-]{1,128}$/;

export const requestId = (req: Request, res: Response, next: NextFunction) => {
  const incoming = req.get(REQUEST_ID_HEADER);
  const id = incoming && ACCEPTED_REQUEST_ID.test(incoming) ? incoming : randomUUID();
  res.locals.requestId = id;
  res.setHeader(REQUEST_ID_HEADER, id);
  next();
};

export const getRequestId = (res: Response): string | undefined => {
  const value: unknown = res.locals.requestId;
  return typeof value === "string" ? value : undefined;
};
