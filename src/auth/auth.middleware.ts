import { Response, NextFunction } from 'express';

import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability';

import { authService } from './auth.service';
import { AuthRequest } from './auth.types';

/**
 * Resolve the bearer token into the caller address the ledgers run as.
 */
export const authMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      throw ApiError.unauthorized('No authorization header provided');
    }

    if (!authHeader.startsWith('Bearer ')) {
      throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
    }

    const token = authHeader.substring(7);

    if (!token) {
      throw ApiError.unauthorized('No token provided');
    }

    const payload = authService.verifyToken(token);

    req.caller = payload.address;
    addLogContext({ caller: payload.address });
    next();
  } catch (error) {
    next(error);
  }
};

/**
 * Caller of an authenticated request; authMiddleware must have run.
 */
export const requireCaller = (req: AuthRequest): string => {
  if (!req.caller) {
    throw ApiError.unauthorized('Not authenticated');
  }
  return req.caller;
};
