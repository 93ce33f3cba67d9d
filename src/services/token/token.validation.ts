/**
 * Token API Validation Rules
 */

import { body } from 'express-validator';

import { addressBody, addressParam, amountBody } from '../ledger/ledger.validation';

export const balanceValidation = [addressParam('account')];

export const allowanceValidation = [addressParam('owner'), addressParam('spender')];

export const transferValidation = [addressBody('to'), amountBody()];

export const allowanceChangeValidation = [addressBody('spender'), amountBody()];

export const transferFromValidation = [addressBody('from'), addressBody('to'), amountBody()];

export const holdInEscrowValidation = [
  body('userId')
    .isString()
    .isLength({ min: 1, max: 256 })
    .withMessage('userId must be between 1 and 256 characters'),
  amountBody(),
];

export const depositValidation = [
  addressBody('user'),
  body('depositData')
    .isString()
    .withMessage('depositData must be a hex string'),
];

export const withdrawValidation = [amountBody()];

export const addressChangeValidation = [addressBody('address')];

export const ownershipValidation = [addressBody('newOwner')];
