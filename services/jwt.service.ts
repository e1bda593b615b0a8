import jwt, { type JwtPayload } from "jsonwebtoken";
import env from "../config/env";
import type { AuthenticatedUser } from "../types";

interface DecodeResult {
  payload: AuthenticatedUser | null;
  isExpired: boolean;
  error?: string;
}

function toAuthenticatedUser(decoded: string | JwtPayload): AuthenticatedUser | null {
  if (typeof decoded === "string" || typeof decoded.id !== "string" || !decoded.id) return null;
  return typeof decoded.role === "string" ? { id: decoded.id, role: decoded.role } : { id: decoded.id };
}

export class JwtService {
  constructor(private readonly secret: string) {}

  generateToken(payload: AuthenticatedUser, expiresInSeconds: number = 30 * 24 * 60 * 60): string {
    if (!this.secret) throw new Error("JWT_SECRET is not configured");
    return jwt.sign({ ...payload }, this.secret, { expiresIn: expiresInSeconds });
  }

  decodeTokenWithDetails(token: string): DecodeResult {
    if (!this.secret) {
      return { payload: null, isExpired: false, error: "JWT_SECRET is not configured" };
    }
    try {
      const payload = toAuthenticatedUser(jwt.verify(token, this.secret));
      return payload ? { payload, isExpired: false } : { payload: null, isExpired: false, error: "token has no user id" };
    } catch (error) {
      return {
        payload: null,
        isExpired: error instanceof jwt.TokenExpiredError,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

export const jwtService = new JwtService(env.JWT_SECRET);
