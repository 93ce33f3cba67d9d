/**
 * Escrow API Validation Rules
 *
 * recipients/amounts lengths are compared by the escrow ledger, which
 * raises LENGTH_MISMATCH.
 */

import { body } from 'express-validator';

import { isUint256String } from '../../runtime';
import { addressBody, amountBody, ethereumAddress, userIdParam } from '../ledger/ledger.validation';

export const userBalanceValidation = [userIdParam()];

export const fundValidation = [userIdParam(), amountBody()];

export const disburseValidation = [
  userIdParam(),

  body('recipients')
    .isArray()
    .withMessage('recipients must be an array'),

  ethereumAddress(body('recipients.*'), 'Each recipient'),

  body('amounts')
    .isArray()
    .withMessage('amounts must be an array'),

  body('amounts.*')
    .custom((value) => isUint256String(value))
    .withMessage('Each amount must be a decimal string between 0 and 2^256 - 1'),
];

export const addressChangeValidation = [addressBody('address')];

export const ownershipValidation = [addressBody('newOwner')];
