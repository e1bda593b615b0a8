import { Response, NextFunction, Request } from "express";
import env from "../config/env";
import type { AuthenticatedUser } from "../types";
import { logger } from "../utils/logger";

export const isAdministrator = (user: AuthenticatedUser, adminIds: string[] = env.ADMIN_USER_IDS): boolean =>
  user.role === "admin" || adminIds.includes(user.id);

/**
 * Admin gate: token role "admin" or an id listed in ADMIN_USER_IDS.
 * Should be used AFTER isAuthenticated.
 */
export const isAdmin = (req: Request, res: Response, next: NextFunction): void => {
  const currentUser = req.currentUser;

  if (!currentUser) {
    res.status(401).json({ message: "Not authenticated" });
    return;
  }

  if (!isAdministrator(currentUser)) {
    logger.warn(`Admin access denied for user ${currentUser.id} (role: ${currentUser.role ?? "none"})`);
    res.status(403).json({ message: "Admin access required" });
    return;
  }

  next();
};
