import type { Request } from "express";

export interface AuthRequest extends Request {
  uid?: string;
}

export interface TokenPayload {
  uid: string;
}
