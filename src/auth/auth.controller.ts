import { Request, Response, NextFunction } from 'express';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';

import { authService } from './auth.service';
import { IssueTokenDTO } from './auth.types';

export class AuthController {
  /**
   * Issue a caller token for an address
   * POST /auth/token (development and test only)
   */
  async issueToken(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!config.jwt.allowTokenIssuance) {
        throw ApiError.forbidden('Token issuance is disabled in this environment');
      }

      const dto: IssueTokenDTO = { address: req.body.address };
      const result = authService.issueToken(dto.address);

      res.status(201).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }
}

export const authController = new AuthController();
