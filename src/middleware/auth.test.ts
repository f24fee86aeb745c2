import { describe, it, expect, vi } from "vitest";
import type { Response } from "express";
import jwt from "jsonwebtoken";
import { requireAuth, signToken } from "./auth";
import type { AuthRequest } from "../lib/auth-types";

function fakeResponse() {
  const res = {
    statusCode: 200,
    body: undefined as unknown,
    status(code: number) {
      res.statusCode = code;
      return res;
    },
    json(payload: unknown) {
      res.body = payload;
      return res;
    },
  };
  return res;
}

function run(authorization?: string) {
  const req = { headers: { authorization } } as unknown as AuthRequest;
  const res = fakeResponse();
  const next = vi.fn();
  requireAuth(req, res as unknown as Response, next);
  return { req, res, next };
}

describe("requireAuth", () => {
  it("accepts a signed token and exposes the uid", () => {
    const { req, res, next } = run(`Bearer ${signToken("user-42")}`);
    expect(next).toHaveBeenCalledOnce();
    expect(req.uid).toBe("user-42");
    expect(res.statusCode).toBe(200);
  });

  it("rejects a missing header", () => {
    const { res, next } = run();
    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ error: "Missing or invalid authorization header" });
  });

  it("rejects a token signed with another secret", () => {
    const forged = jwt.sign({ uid: "user-42" }, "test-other-secret");
    const { res, next } = run(`Bearer ${forged}`);
    expect(next).not.toHaveBeenCalled();
    expect(res.body).toEqual({ error: "Invalid or expired token" });
  });
});
