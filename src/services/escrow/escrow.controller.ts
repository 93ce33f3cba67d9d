import { Request, Response, NextFunction } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import { requireCaller } from '../../auth/auth.middleware';
import { ApiError } from '../../middlewares/errorHandler';
import { isAddress, isUint256String, parseUint256, toAddress } from '../../runtime';
import { LedgerService } from '../ledger/ledger.service';

const addressList = (value: unknown): string[] => {
  if (!Array.isArray(value) || !value.every(isAddress)) {
    throw ApiError.validationError('recipients must be an array of addresses');
  }
  return value.map(toAddress);
};

const amountList = (value: unknown): bigint[] => {
  if (!Array.isArray(value) || !value.every(isUint256String)) {
    throw ApiError.validationError('amounts must be an array of decimal strings');
  }
  return value.map(parseUint256);
};

export class EscrowController {
  constructor(private readonly service: LedgerService) {}

  /**
   * Escrow configuration
   * GET /escrow
   */
  async getEscrow(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { escrow } = this.service;

      res.status(200).json({
        success: true,
        data: {
          escrow: {
            address: escrow.address,
            owner: escrow.owner(),
            disbursalAddress: escrow.disbursalAddress(),
            renderTokenAddress: escrow.renderTokenAddress(),
            totalEscrowed: escrow.totalEscrowed().toString(),
          },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /escrow/users/:userId/balance
   */
  async getUserBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId } = req.params;

      res.status(200).json({
        success: true,
        data: {
          userId,
          balance: this.service.escrow.userBalance(userId).toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Direct credit; only the token ledger's own address may call it
   * POST /escrow/users/:userId/fund
   */
  async fundUser(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const { userId } = req.params;
      const amount = parseUint256(req.body.amount);
      const { escrow } = this.service;

      await this.service.submit(caller, 'escrow.fundUser', (ctx) => escrow.fundUser(ctx, userId, amount));

      res.status(200).json({
        success: true,
        data: { userId, balance: escrow.userBalance(userId).toString() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Pay recipients out of a user's escrow balance
   * POST /escrow/users/:userId/disburse
   *
   * Payouts are made in order; if one fails, earlier payouts stay made.
   */
  async disburseFunds(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const { userId } = req.params;
      const recipients = addressList(req.body.recipients);
      const amounts = amountList(req.body.amounts);
      const { escrow } = this.service;

      await this.service.submit(caller, 'escrow.disburseFunds', (ctx) =>
        escrow.disburseFunds(ctx, userId, recipients, amounts)
      );

      res.status(200).json({
        success: true,
        data: {
          userId,
          recipients,
          amounts: amounts.map((amount) => amount.toString()),
          balance: escrow.userBalance(userId).toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /escrow/disbursal-address
   */
  async changeDisbursalAddress(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const address = toAddress(req.body.address);
      const { escrow } = this.service;

      await this.service.submit(caller, 'escrow.changeDisbursalAddress', (ctx) =>
        escrow.changeDisbursalAddress(ctx, address)
      );

      res.status(200).json({ success: true, data: { disbursalAddress: escrow.disbursalAddress() } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /escrow/token-address
   */
  async changeRenderTokenAddress(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const address = toAddress(req.body.address);
      const { escrow } = this.service;

      await this.service.submit(caller, 'escrow.changeRenderTokenAddress', (ctx) =>
        escrow.changeRenderTokenAddress(ctx, address)
      );

      res.status(200).json({ success: true, data: { renderTokenAddress: escrow.renderTokenAddress() } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /escrow/owner
   */
  async transferOwnership(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const newOwner = toAddress(req.body.newOwner);
      const { escrow } = this.service;

      await this.service.submit(caller, 'escrow.transferOwnership', (ctx) =>
        escrow.transferOwnership(ctx, newOwner)
      );

      res.status(200).json({ success: true, data: { owner: escrow.owner() } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /escrow/owner
   */
  async renounceOwnership(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const { escrow } = this.service;

      await this.service.submit(caller, 'escrow.renounceOwnership', (ctx) => escrow.renounceOwnership(ctx));

      res.status(200).json({ success: true, data: { owner: escrow.owner() } });
    } catch (error) {
      next(error);
    }
  }
}
