import type { IncomingHttpHeaders } from "http";
import type { Request, Response, NextFunction } from "express";
import { forbiddenError, unauthorizedError } from "../errors.js";
import { type Caller, hasAdminAccess, normalizeCallerRole } from "./roles.js";

/** Identity headers as received, forwarded verbatim to producer services. */
export type ForwardedAuth = {
  authorization?: string;
  userId: string;
  role?: string;
};

export type CallerRequest = Request & { caller?: Caller; forwarded?: ForwardedAuth };

function firstHeader(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Identity is established upstream by the gateway; this service only reads the
 * headers it injects and never verifies the bearer token itself.
 */
export function readCallerHeaders(
  headers: IncomingHttpHeaders
): { caller: Caller; forwarded: ForwardedAuth } | null {
  const userId = firstHeader(headers["x-user-id"]);
  if (!userId) return null;
  const role = firstHeader(headers["x-user-role"]);
  const authorization = firstHeader(headers.authorization);
  return {
    caller: { subjectId: userId, role: normalizeCallerRole(role) },
    forwarded: {
      userId,
      ...(role ? { role } : {}),
      ...(authorization ? { authorization } : {})
    }
  };
}

export function requireCaller() {
  return (req: CallerRequest, _res: Response, next: NextFunction) => {
    const identity = readCallerHeaders(req.headers);
    if (!identity) return next(unauthorizedError());
    req.caller = identity.caller;
    req.forwarded = identity.forwarded;
    return next();
  };
}

export function requireAdmin(message: string) {
  return (req: CallerRequest, _res: Response, next: NextFunction) => {
    if (!hasAdminAccess(req.caller)) {
      return next(forbiddenError(message));
    }
    return next();
  };
}
