/**
 * Ledger API Validation Rules
 *
 * Addresses are `0x` + 40 hex digits, with a valid EIP-55 checksum when
 * mixed-case; amounts are decimal strings within the unsigned 256-bit range
 * (JSON numbers cannot carry them).
 */

import { body, param, query, ValidationChain } from 'express-validator';

import { isAddress, isUint256String } from '../../runtime';
import { EventType } from '../../types/events';

const ADDRESS_MESSAGE = 'must be 0x followed by 40 hex digits';
const CHECKSUM_MESSAGE = 'has an invalid EIP-55 checksum';
const AMOUNT_MESSAGE = 'must be a decimal string between 0 and 2^256 - 1';

/**
 * Shape first, then the checksum of mixed-case input. `subject` starts both
 * messages (e.g. "to", "Each recipient").
 */
export const ethereumAddress = (chain: ValidationChain, subject: string): ValidationChain =>
  chain
    .isEthereumAddress()
    .withMessage(`${subject} ${ADDRESS_MESSAGE}`)
    .bail()
    .custom((value) => isAddress(value))
    .withMessage(`${subject} ${CHECKSUM_MESSAGE}`);

export const addressBody = (field: string): ValidationChain => ethereumAddress(body(field), field);

export const addressParam = (field: string): ValidationChain => ethereumAddress(param(field), field);

export const amountBody = (field = 'amount'): ValidationChain =>
  body(field)
    .custom((value) => isUint256String(value))
    .withMessage(`${field} ${AMOUNT_MESSAGE}`);

export const userIdParam = (field = 'userId'): ValidationChain =>
  param(field)
    .isString()
    .isLength({ min: 1, max: 256 })
    .withMessage(`${field} must be between 1 and 256 characters`);

export const notificationsQueryValidation = [
  query('eventType')
    .optional()
    .isIn(Object.values(EventType))
    .withMessage('eventType must be a known ledger event type'),

  ethereumAddress(query('contract').optional(), 'contract'),

  query('fromSequence')
    .optional()
    .isInt({ min: 0 })
    .withMessage('fromSequence must be a non-negative integer'),

  query('limit')
    .optional()
    .isInt({ min: 1 })
    .withMessage('limit must be a positive integer'),
];
