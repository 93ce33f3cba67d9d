/**
 * Rate Limiting Middleware
 *
 * Limits are counted in Redis when the service runs with persistence, so
 * every instance shares them; otherwise each process keeps its own count.
 *
 * - RATE_LIMIT_DISABLED=true turns every limiter into a pass-through
 * - X-Load-Test-Token matching RATE_LIMIT_BYPASS_SECRET skips the limiters
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit, { Store } from 'express-rate-limit';
import RedisStore from 'rate-limit-redis';

import { AuthRequest } from '../auth/auth.types';
import { config } from '../config';
import { getRedisClient } from '../config/redis';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';

import { ApiError } from './errorHandler';

type StoreReply = string | number | Array<string | number>;

const toStoreReply = (reply: unknown): StoreReply => {
  if (typeof reply === 'string' || typeof reply === 'number') {
    return reply;
  }
  if (Array.isArray(reply)) {
    return reply.map((item: unknown) => {
      if (typeof item === 'string' || typeof item === 'number') {
        return item;
      }
      throw new Error(`Unexpected Redis reply element: ${String(item)}`);
    });
  }
  throw new Error(`Unexpected Redis reply: ${String(reply)}`);
};

/**
 * Redis store with its own key prefix, or undefined for the in-process store.
 */
const createStore = (prefix: string): Store | undefined => {
  if (config.isTest || !config.ledger.persistenceEnabled) {
    return undefined;
  }

  const client = getRedisClient();
  return new RedisStore({
    sendCommand: async (...args: string[]) => {
      const [command, ...rest] = args;
      return toStoreReply(await client.call(command, ...rest));
    },
    prefix: `rl:${prefix}:`,
  });
};

const hasBypassHeader = (req: Request): boolean => {
  if (!config.rateLimit.bypassSecret) return false;
  return req.get('X-Load-Test-Token') === config.rateLimit.bypassSecret;
};

export interface RateLimiterOptions {
  name: string;
  windowMs: number;
  maxRequests: number;
  errorCode: ErrorCode;
  message: string;
  keyGenerator?: (req: AuthRequest) => string;
  skip?: (req: Request) => boolean;
}

/**
 * A limiter whose rejections go through the error handler like any other
 * ApiError.
 */
export const createRateLimiter = (options: RateLimiterOptions): RequestHandler => {
  if (config.rateLimit.disabled) {
    logger.warn({ limiter: options.name }, 'Rate limiting is disabled via RATE_LIMIT_DISABLED');
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const limiter = rateLimit({
    store: createStore(options.name),
    windowMs: options.windowMs,
    limit: options.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: options.keyGenerator,
    skip: options.skip,
    validate: false,
    handler: (_req: Request, _res: Response, next: NextFunction) => {
      next(new ApiError(options.errorCode, options.message));
    },
  });

  return (req: Request, res: Response, next: NextFunction) => {
    if (hasBypassHeader(req)) {
      next();
      return;
    }
    limiter(req, res, next);
  };
};

const callerOrIp = (req: AuthRequest): string => req.caller ?? req.ip ?? 'unknown';

export const globalLimiter = createRateLimiter({
  name: 'global',
  windowMs: config.rateLimit.global.windowMs,
  maxRequests: config.rateLimit.global.maxRequests,
  errorCode: ErrorCode.RATE_LIMIT_EXCEEDED,
  message: 'Too many requests, please try again later',
  skip: (req) => req.path.startsWith('/health') || req.path === '/metrics',
});

/**
 * Token issuance, keyed by IP and requested address.
 */
export const authLimiter = createRateLimiter({
  name: 'auth',
  windowMs: config.rateLimit.auth.windowMs,
  maxRequests: config.rateLimit.auth.maxRequests,
  errorCode: ErrorCode.TOO_MANY_TOKEN_REQUESTS,
  message: 'Too many token requests, please try again later',
  keyGenerator: (req) => {
    const address: unknown = req.body?.address;
    return `${req.ip ?? 'unknown'}:${typeof address === 'string' ? address.toLowerCase() : ''}`;
  },
});

/**
 * State-changing ledger calls, keyed by caller. Mount after authMiddleware;
 * reads are not counted.
 */
export const ledgerCallLimiter = createRateLimiter({
  name: 'ledger',
  windowMs: config.rateLimit.ledgerCall.windowMs,
  maxRequests: config.rateLimit.ledgerCall.maxRequests,
  errorCode: ErrorCode.TOO_MANY_LEDGER_CALLS,
  message: 'Too many ledger calls, please try again later',
  keyGenerator: callerOrIp,
  skip: (req) => req.method === 'GET',
});
