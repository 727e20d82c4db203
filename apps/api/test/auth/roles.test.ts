import { describe, expect, it } from "vitest";
import { readCallerHeaders } from "../../src/auth/middleware.js";
import {
  canAccessRecipient,
  hasAdminAccess,
  hasProducerAccess,
  normalizeCallerRole
} from "../../src/auth/roles.js";

describe("normalizeCallerRole", () => {
  it("accepts prefixed and bare role names in any case", () => {
    expect(normalizeCallerRole("ROLE_ADMIN")).toBe("ADMIN");
    expect(normalizeCallerRole("role_manager")).toBe("MANAGER");
    expect(normalizeCallerRole(" user ")).toBe("USER");
  });

  it("maps anything else to NONE", () => {
    expect(normalizeCallerRole("ROLE_GUEST")).toBe("NONE");
    expect(normalizeCallerRole(undefined)).toBe("NONE");
    expect(normalizeCallerRole(42)).toBe("NONE");
  });
});

describe("access checks", () => {
  const admin = { subjectId: "A1", role: "ADMIN" as const };
  const manager = { subjectId: "M1", role: "MANAGER" as const };
  const user = { subjectId: "U1", role: "USER" as const };

  it("lets administrators and managers produce events", () => {
    expect(hasProducerAccess(admin)).toBe(true);
    expect(hasProducerAccess(manager)).toBe(true);
    expect(hasProducerAccess(user)).toBe(false);
    expect(hasProducerAccess(undefined)).toBe(false);
  });

  it("reserves admin access for administrators", () => {
    expect(hasAdminAccess(admin)).toBe(true);
    expect(hasAdminAccess(manager)).toBe(false);
  });

  it("lets owners and administrators read a recipient's history", () => {
    expect(canAccessRecipient(user, "U1")).toBe(true);
    expect(canAccessRecipient(admin, "U1")).toBe(true);
    expect(canAccessRecipient(manager, "U1")).toBe(false);
    expect(canAccessRecipient(undefined, "U1")).toBe(false);
  });
});

describe("readCallerHeaders", () => {
  it("reads identity and keeps the raw values for forwarding", () => {
    expect(
      readCallerHeaders({
        "x-user-id": " U1 ",
        "x-user-role": "ROLE_MANAGER",
        authorization: "Bearer test-token"
      })
    ).toEqual({
      caller: { subjectId: "U1", role: "MANAGER" },
      forwarded: { userId: "U1", role: "ROLE_MANAGER", authorization: "Bearer test-token" }
    });
  });

  it("returns null without a user id", () => {
    expect(readCallerHeaders({ "x-user-role": "ROLE_ADMIN" })).toBeNull();
    expect(readCallerHeaders({ "x-user-id": "  " })).toBeNull();
  });

  it("treats a missing role as NONE", () => {
    expect(readCallerHeaders({ "x-user-id": "U1" })).toEqual({
      caller: { subjectId: "U1", role: "NONE" },
      forwarded: { userId: "U1" }
    });
  });
});
