export type CallerRole = "ADMIN" | "MANAGER" | "USER" | "NONE";

export type Caller = {
  subjectId: string;
  role: CallerRole;
};

// The gateway sends authorities as "ROLE_ADMIN"; bare names are accepted too.
export function normalizeCallerRole(input: unknown): CallerRole {
  const raw = typeof input === "string" ? input.trim().toUpperCase() : "";
  const name = raw.startsWith("ROLE_") ? raw.slice("ROLE_".length) : raw;
  if (name === "ADMIN") return "ADMIN";
  if (name === "MANAGER") return "MANAGER";
  if (name === "USER") return "USER";
  return "NONE";
}

/** Trusted producers: only these roles may submit events. */
export function hasProducerAccess(caller: Caller | undefined): boolean {
  if (!caller) return false;
  return caller.role === "ADMIN" || caller.role === "MANAGER";
}

export function hasAdminAccess(caller: Caller | undefined): boolean {
  return caller?.role === "ADMIN";
}

export function canAccessRecipient(caller: Caller | undefined, userId: string): boolean {
  if (!caller) return false;
  return hasAdminAccess(caller) || caller.subjectId === userId;
}
