import type { Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import type { AuthRequest, TokenPayload } from "../lib/auth-types";

const JWT_SECRET = process.env.JWT_SECRET || "pantry-chef-dev-secret-change-me";

function isTokenPayload(payload: unknown): payload is TokenPayload {
  return typeof payload === "object" && payload !== null && "uid" in payload && typeof payload.uid === "string";
}

export function requireAuth(req: AuthRequest, res: Response, next: NextFunction) {
  const header = req.headers.authorization;

  if (!header?.startsWith("Bearer ")) {
    res.status(401).json({ error: "Missing or invalid authorization header" });
    return;
  }

  const token = header.slice(7);

  let payload: unknown;
  try {
    payload = jwt.verify(token, JWT_SECRET);
  } catch {
    res.status(401).json({ error: "Invalid or expired token" });
    return;
  }

  if (!isTokenPayload(payload)) {
    res.status(401).json({ error: "Invalid or expired token" });
    return;
  }
  req.uid = payload.uid;
  next();
}

export function signToken(uid: string): string {
  return jwt.sign({ uid }, JWT_SECRET, { expiresIn: "7d" });
}
