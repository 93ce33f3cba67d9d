import { Request, Response, NextFunction } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import { requireCaller } from '../../auth/auth.middleware';
import { ApiError } from '../../middlewares/errorHandler';
import { parseUint256, toAddress } from '../../runtime';
import { LedgerService } from '../ledger/ledger.service';

import { LegacyToken } from './legacy-token.service';

/**
 * The legacy token is only reachable while migration is configured.
 */
export class LegacyController {
  constructor(private readonly service: LedgerService) {}

  /**
   * GET /legacy
   */
  async getLegacyToken(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const legacy = this.requireLegacy();

      res.status(200).json({
        success: true,
        data: {
          token: {
            address: legacy.address,
            name: legacy.name(),
            symbol: legacy.symbol(),
            decimals: legacy.decimals(),
            totalSupply: legacy.totalSupply().toString(),
            owner: legacy.owner(),
          },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /legacy/balances/:account
   */
  async getBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const legacy = this.requireLegacy();
      const account = toAddress(req.params.account);

      res.status(200).json({
        success: true,
        data: { account, balance: legacy.balanceOf(account).toString() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Owner mint
   * POST /legacy/mint
   */
  async mint(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const legacy = this.requireLegacy();
      const to = toAddress(req.body.to);
      const amount = parseUint256(req.body.amount);

      await this.service.submit(caller, 'legacy.mint', (ctx) => legacy.mint(ctx, to, amount));

      res.status(200).json({
        success: true,
        data: { to, amount: amount.toString(), balance: legacy.balanceOf(to).toString() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Approve the token ledger (or anyone) to pull legacy tokens
   * POST /legacy/approve
   */
  async approve(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const legacy = this.requireLegacy();
      const spender = toAddress(req.body.spender);
      const amount = parseUint256(req.body.amount);

      await this.service.submit(caller, 'legacy.approve', (ctx) => legacy.approve(ctx, spender, amount));

      res.status(200).json({
        success: true,
        data: { owner: caller, spender, allowance: legacy.allowance(caller, spender).toString() },
      });
    } catch (error) {
      next(error);
    }
  }

  private requireLegacy(): LegacyToken {
    const { legacy } = this.service;
    if (!legacy) {
      throw ApiError.migrationNotConfigured();
    }
    return legacy;
  }
}
