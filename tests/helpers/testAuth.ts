import request from 'supertest';
import { Application } from 'express';

import { authService } from '../../src/auth/auth.service';
import { Address } from '../../src/runtime';

export const tokenFor = (address: Address): string => authService.issueToken(address).accessToken;

/**
 * Requests signed as `address`.
 */
export const authenticatedRequest = (app: Application, address: Address) => {
  const token = tokenFor(address);
  return {
    get: (url: string) => request(app).get(url).set('Authorization', `Bearer ${token}`),
    post: (url: string) => request(app).post(url).set('Authorization', `Bearer ${token}`),
    put: (url: string) => request(app).put(url).set('Authorization', `Bearer ${token}`),
    delete: (url: string) => request(app).delete(url).set('Authorization', `Bearer ${token}`),
  };
};
