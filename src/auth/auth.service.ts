import jwt, { SignOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';
import { isAddress, toAddress } from '../runtime';

import { AuthResponse, JWTPayload } from './auth.types';

export class AuthService {
  issueToken(address: string): AuthResponse {
    const caller = toAddress(address);
    const payload: JWTPayload = { address: caller };

    const options: SignOptions = {
      expiresIn: config.jwt.accessTokenExpiresIn as jwt.SignOptions['expiresIn'],
    };

    return {
      address: caller,
      accessToken: jwt.sign(payload, config.jwt.secret, options),
      expiresIn: config.jwt.accessTokenExpiresIn,
    };
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, config.jwt.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.unauthorized('Token verification failed');
    }

    if (typeof decoded === 'string' || !isAddress(decoded.address)) {
      throw ApiError.invalidToken('Token does not carry a caller address');
    }

    return { address: toAddress(decoded.address), iat: decoded.iat, exp: decoded.exp };
  }
}

export const authService = new AuthService();
