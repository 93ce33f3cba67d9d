import { Request } from 'express';

import { Address } from '../runtime';

/**
 * Claims of a caller token. `address` is the ledger identity every entry
 * point runs as.
 */
export interface JWTPayload {
  address: Address;
  iat?: number;
  exp?: number;
}

export interface AuthRequest extends Request {
  caller?: Address;
}

export interface IssueTokenDTO {
  address: string;
}

export interface AuthResponse {
  address: Address;
  accessToken: string;
  expiresIn: string;
}
