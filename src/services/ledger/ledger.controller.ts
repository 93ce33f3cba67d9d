/**
 * Ledger Controller
 *
 * Read-only views over the whole system: the committed notification log and
 * the conservation audit.
 */

import { Request, Response, NextFunction } from 'express';

import { config } from '../../config';
import { NotificationFilter, toAddress } from '../../runtime';
import { LedgerNotification, isEventType } from '../../types/events';

import { LedgerService } from './ledger.service';

const asString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

export const serializeNotification = (notification: LedgerNotification) => ({
  sequence: notification.sequence,
  logIndex: notification.logIndex,
  contract: notification.contract,
  eventType: notification.eventType,
  payload: notification.payload,
  timestamp: notification.timestamp.toISOString(),
});

export class LedgerController {
  constructor(private readonly service: LedgerService) {}

  /**
   * Committed notifications, oldest first
   * GET /ledger/notifications
   */
  async getNotifications(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const eventType = req.query.eventType;
      const contract = asString(req.query.contract);
      const fromSequence = asString(req.query.fromSequence);
      const limit = asString(req.query.limit);

      const filter: NotificationFilter = {
        eventType: isEventType(eventType) ? eventType : undefined,
        contract: contract ? toAddress(contract) : undefined,
        fromSequence: fromSequence ? parseInt(fromSequence, 10) : undefined,
        limit: Math.min(
          limit ? parseInt(limit, 10) : config.ledger.notificationPageLimit,
          config.ledger.notificationPageLimit
        ),
      };

      const notifications = await this.service.notifications(filter);

      res.status(200).json({
        success: true,
        data: {
          notifications: notifications.map(serializeNotification),
          count: notifications.length,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Supply vs. balances vs. escrow
   * GET /ledger/conservation
   */
  async getConservation(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const report = this.service.conservation();

      res.status(200).json({
        success: true,
        data: {
          totalSupply: report.totalSupply.toString(),
          sumOfBalances: report.sumOfBalances.toString(),
          escrowAccountBalance: report.escrowAccountBalance.toString(),
          totalEscrowed: report.totalEscrowed.toString(),
          circulating: report.circulating.toString(),
          holds: report.holds,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
