import { type RequestHandler } from "express";
import session from "express-session";
import connectPg from "connect-pg-simple";
import type { UserRole } from "../shared/schema";
import type { IStorage } from "./storage";
import { safeLogger } from "./safe_logger";
import { errorMessage } from "./utils/pipelineErrors";

export interface AuthenticatedUser {
  id: string;
  role: UserRole;
}

// Extend Express Request to include user
declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

// The sign-in flow (outside this service) stores the user id in the session
declare module "express-session" {
  interface SessionData {
    userId: string;
  }
}

export interface AuthMiddleware {
  isAuthenticated: RequestHandler;
  isAdmin: RequestHandler;
}

// Session configuration
export function getSession(maxAge?: number): RequestHandler {
  const isProduction = process.env.NODE_ENV === "production";
  const sessionTtl = maxAge || (1 * 24 * 60 * 60 * 1000); // Default 1 day in milliseconds

  // Postgres-backed sessions when DATABASE_URL is configured, in-memory otherwise (dev only)
  let store: session.Store;
  if (process.env.DATABASE_URL) {
    const PgStore = connectPg(session);
    store = new PgStore({
      conString: process.env.DATABASE_URL,
      createTableIfMissing: true,
      tableName: "sessions",
    });
  } else {
    safeLogger.warn("[SESSION] DATABASE_URL not set - using MemoryStore (dev only). Sessions won't persist across restarts.");
    store = new session.MemoryStore();
  }

  const sessionConfig = session({
    secret: process.env.SESSION_SECRET || "dev-insecure-secret",
    store,
    resave: false,
    saveUninitialized: false,
    name: "cropcare.sid",
    proxy: true,
    cookie: {
      httpOnly: true,
      secure: isProduction,
      sameSite: "lax",
      maxAge: sessionTtl,
      path: "/",
    },
  });

  safeLogger.info(`[SESSION] Session configured - secure: ${isProduction}, sameSite: lax, store: ${store.constructor.name}`);

  return sessionConfig;
}

export function createAuthMiddleware(storage: Pick<IStorage, "getUser">): AuthMiddleware {
  // Checks session for userId and sets req.user
  const isAuthenticated: RequestHandler = async (req, res, next) => {
    const userId = req.session?.userId;
    if (!userId) {
      safeLogger.debug("[AUTH] Unauthorized - no session or userId");
      res.status(401).json({ message: "Unauthorized" });
      return;
    }

    try {
      const user = await storage.getUser(userId);
      if (!user) {
        safeLogger.warn("[AUTH] User not found for session", { userId });
        res.status(401).json({ message: "Unauthorized" });
        return;
      }

      req.user = { id: user.id, role: user.role };
      next();
    } catch (error) {
      safeLogger.error("[AUTH] User lookup failed", { error: errorMessage(error) });
      res.status(500).json({ message: "Failed to authenticate" });
    }
  };

  // Must run after isAuthenticated
  const isAdmin: RequestHandler = (req, res, next) => {
    if (!req.user) {
      res.status(401).json({ message: "Unauthorized" });
      return;
    }
    if (req.user.role !== "admin") {
      res.status(403).json({ message: "Access denied. Admin role required." });
      return;
    }
    next();
  };

  return { isAuthenticated, isAdmin };
}
