import { Router, Request, Response, NextFunction } from 'express';

import { authLimiter } from '../middlewares/rateLimiter';
import { validateRequest } from '../middlewares/validateRequest';

import { authController } from './auth.controller';
import { issueTokenValidation } from './auth.validation';

const router = Router();

router.post('/token', authLimiter, issueTokenValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => authController.issueToken(req, res, next));

export default router;
