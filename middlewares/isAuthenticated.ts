import { Response, NextFunction, Request } from "express";
import { jwtService } from "../services/jwt.service";
import type { AuthenticatedUser } from "../types";
import { logger } from "../utils/logger";

declare global {
  namespace Express {
    interface Request {
      currentUser?: AuthenticatedUser;
    }
  }
}

export const isAuthenticated = (req: Request, res: Response, next: NextFunction): void => {
  const token = req.headers.authorization?.split(" ")[1];

  if (!token) {
    res.status(401).json({ message: "Authorization token missing" });
    return;
  }

  const tokenResult = jwtService.decodeTokenWithDetails(token);
  if (!tokenResult.payload) {
    if (tokenResult.isExpired) {
      logger.warn(`Expired token attempt: ${tokenResult.error}`);
      res.status(401).json({ message: "Token expired", code: "TOKEN_EXPIRED", expired: true });
    } else {
      logger.warn(`Invalid token attempt: ${tokenResult.error}`);
      res.status(401).json({ message: "Invalid token", code: "INVALID_TOKEN" });
    }
    return;
  }

  req.currentUser = tokenResult.payload;
  next();
};
