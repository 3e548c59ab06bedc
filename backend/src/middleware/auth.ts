import type { NextFunction, Request, RequestHandler, Response } from 'express';
import bcrypt from 'bcryptjs';
import type { TeamCredentials } from '../engines/TeamDirectory';
import type { Actor } from '../types';
import { HttpError } from './errorHandler';

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

export interface AuthHeaders {
  adminPassword?: string;
  teamUsername?: string;
  teamPassword?: string;
}

export interface AuthOptions {
  /** Bcrypt hash or plaintext. Empty disables admin access. */
  adminPassword: string;
  findCredentials: (username: string) => Promise<TeamCredentials | null>;
}

function isBcryptHash(value: string): boolean {
  return value.startsWith('$2a$') || value.startsWith('$2b$') || value.startsWith('$2y$');
}

// Stored value may be a bcrypt hash or plaintext
export async function checkPassword(provided: string, stored: string): Promise<boolean> {
  if (isBcryptHash(stored)) {
    return bcrypt.compare(provided, stored);
  }
  return provided === stored;
}

/**
 * Works out who is calling. Admin credentials win when both sets are sent.
 * Returns null when no credentials were sent at all.
 */
export async function resolveActor(headers: AuthHeaders, options: AuthOptions): Promise<Actor | null> {
  if (headers.adminPassword !== undefined) {
    if (!options.adminPassword) {
      throw new HttpError(401, 'Admin access is not configured');
    }
    if (!(await checkPassword(headers.adminPassword, options.adminPassword))) {
      throw new HttpError(401, 'Incorrect admin password');
    }
    return { role: 'admin' };
  }

  if (headers.teamUsername !== undefined) {
    if (!headers.teamPassword) {
      throw new HttpError(401, 'Team password required');
    }
    const credentials = await options.findCredentials(headers.teamUsername);
    if (!credentials || !(await bcrypt.compare(headers.teamPassword, credentials.passwordHash))) {
      throw new HttpError(401, 'Incorrect username or password');
    }
    return { role: 'team', teamId: credentials.teamId };
  }

  return null;
}

/** Sets `req.actor` from the x-admin-password or x-team-username/x-team-password headers. */
export function authenticate(options: AuthOptions): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = await resolveActor(
        {
          adminPassword: req.header('x-admin-password'),
          teamUsername: req.header('x-team-username'),
          teamPassword: req.header('x-team-password'),
        },
        options
      );
      if (actor) req.actor = actor;
      next();
    } catch (error) {
      next(error);
    }
  };
}

/** The authenticated caller, or a 401. */
export function actorOf(req: Request): Actor {
  if (!req.actor) {
    throw new HttpError(401, 'Authentication required');
  }
  return req.actor;
}

export function requireActor(req: Request, _res: Response, next: NextFunction): void {
  if (!req.actor) {
    next(new HttpError(401, 'Authentication required'));
    return;
  }
  next();
}

export function requireAdmin(req: Request, _res: Response, next: NextFunction): void {
  if (!req.actor) {
    next(new HttpError(401, 'Admin authentication required'));
    return;
  }
  if (req.actor.role !== 'admin') {
    next(new HttpError(403, 'Admin access required'));
    return;
  }
  next();
}
