import { Request, Response, NextFunction } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import { requireCaller } from '../../auth/auth.middleware';
import { parseUint256, toAddress } from '../../runtime';
import { LedgerService } from '../ledger/ledger.service';

export class TokenController {
  constructor(private readonly service: LedgerService) {}

  /**
   * Token metadata and configuration
   * GET /token
   */
  async getToken(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { token } = this.service;

      res.status(200).json({
        success: true,
        data: {
          token: {
            address: token.address,
            name: token.name(),
            symbol: token.symbol(),
            decimals: token.decimals(),
            totalSupply: token.totalSupply().toString(),
            owner: token.owner(),
            escrowContractAddress: token.escrowContractAddress(),
            bridgeManager: token.bridgeManager(),
            legacyTokenAddress: token.legacyTokenAddress(),
          },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /token/balances/:account
   */
  async getBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = toAddress(req.params.account);

      res.status(200).json({
        success: true,
        data: {
          account,
          balance: this.service.token.balanceOf(account).toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /token/allowances/:owner/:spender
   */
  async getAllowance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const owner = toAddress(req.params.owner);
      const spender = toAddress(req.params.spender);

      res.status(200).json({
        success: true,
        data: {
          owner,
          spender,
          allowance: this.service.token.allowance(owner, spender).toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /token/transfer
   */
  async transfer(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const to = toAddress(req.body.to);
      const amount = parseUint256(req.body.amount);
      const { token } = this.service;

      await this.service.submit(caller, 'token.transfer', (ctx) => token.transfer(ctx, to, amount));

      res.status(200).json({
        success: true,
        data: {
          from: caller,
          to,
          amount: amount.toString(),
          balance: token.balanceOf(caller).toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /token/approve
   */
  async approve(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.changeAllowance(req, res, next, 'approve');
  }

  /**
   * POST /token/increase-allowance
   */
  async increaseAllowance(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.changeAllowance(req, res, next, 'increaseAllowance');
  }

  /**
   * POST /token/decrease-allowance
   * Decreasing below zero leaves the allowance at zero.
   */
  async decreaseAllowance(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.changeAllowance(req, res, next, 'decreaseAllowance');
  }

  /**
   * POST /token/transfer-from
   */
  async transferFrom(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const from = toAddress(req.body.from);
      const to = toAddress(req.body.to);
      const amount = parseUint256(req.body.amount);
      const { token } = this.service;

      await this.service.submit(caller, 'token.transferFrom', (ctx) =>
        token.transferFrom(ctx, from, to, amount)
      );

      res.status(200).json({
        success: true,
        data: {
          from,
          to,
          amount: amount.toString(),
          remainingAllowance: token.allowance(from, caller).toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Move tokens into escrow under a user/job id
   * POST /token/escrow
   */
  async holdInEscrow(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const userId: string = req.body.userId;
      const amount = parseUint256(req.body.amount);
      const { token, escrow } = this.service;

      await this.service.submit(caller, 'token.holdInEscrow', (ctx) =>
        token.holdInEscrow(ctx, userId, amount)
      );

      res.status(200).json({
        success: true,
        data: {
          userId,
          amount: amount.toString(),
          escrowBalance: escrow.userBalance(userId).toString(),
          balance: token.balanceOf(caller).toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /token/escrow-address
   */
  async setEscrowContractAddress(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const address = toAddress(req.body.address);
      const { token } = this.service;

      await this.service.submit(caller, 'token.setEscrowContractAddress', (ctx) =>
        token.setEscrowContractAddress(ctx, address)
      );

      res.status(200).json({
        success: true,
        data: { escrowContractAddress: token.escrowContractAddress() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Bridge credit
   * POST /token/deposit
   */
  async deposit(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const user = toAddress(req.body.user);
      const depositData: string = req.body.depositData;
      const { token } = this.service;

      const amount = await this.service.submit(caller, 'token.deposit', (ctx) =>
        token.deposit(ctx, user, depositData)
      );

      res.status(200).json({
        success: true,
        data: {
          user,
          amount: amount.toString(),
          balance: token.balanceOf(user).toString(),
          totalSupply: token.totalSupply().toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Burn own tokens
   * POST /token/withdraw
   */
  async withdraw(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const amount = parseUint256(req.body.amount);
      const { token } = this.service;

      await this.service.submit(caller, 'token.withdraw', (ctx) => token.withdraw(ctx, amount));

      res.status(200).json({
        success: true,
        data: {
          amount: amount.toString(),
          balance: token.balanceOf(caller).toString(),
          totalSupply: token.totalSupply().toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Migrate the caller's legacy balance
   * POST /token/migrate
   */
  async migrate(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const { token } = this.service;

      const amount = await this.service.submit(caller, 'token.migrate', (ctx) => token.migrate(ctx));

      res.status(200).json({
        success: true,
        data: {
          account: caller,
          migrated: amount.toString(),
          balance: token.balanceOf(caller).toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /token/bridge-manager
   */
  async updateBridgeManager(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const address = toAddress(req.body.address);
      const { token } = this.service;

      await this.service.submit(caller, 'token.updateBridgeManager', (ctx) =>
        token.updateBridgeManager(ctx, address)
      );

      res.status(200).json({
        success: true,
        data: { bridgeManager: token.bridgeManager() },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /token/owner
   */
  async transferOwnership(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const newOwner = toAddress(req.body.newOwner);
      const { token } = this.service;

      await this.service.submit(caller, 'token.transferOwnership', (ctx) =>
        token.transferOwnership(ctx, newOwner)
      );

      res.status(200).json({ success: true, data: { owner: token.owner() } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /token/owner
   */
  async renounceOwnership(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requireCaller(req);
      const { token } = this.service;

      await this.service.submit(caller, 'token.renounceOwnership', (ctx) => token.renounceOwnership(ctx));

      res.status(200).json({ success: true, data: { owner: token.owner() } });
    } catch (error) {
      next(error);
    }
  }

  private async changeAllowance(
    req: AuthRequest,
    res: Response,
    next: NextFunction,
    operation: 'approve' | 'increaseAllowance' | 'decreaseAllowance'
  ): Promise<void> {
    try {
      const caller = requireCaller(req);
      const spender = toAddress(req.body.spender);
      const amount = parseUint256(req.body.amount);
      const { token } = this.service;

      await this.service.submit(caller, `token.${operation}`, (ctx) => token[operation](ctx, spender, amount));

      res.status(200).json({
        success: true,
        data: {
          owner: caller,
          spender,
          allowance: token.allowance(caller, spender).toString(),
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
