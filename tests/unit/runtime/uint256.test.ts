import { ethers } from 'ethers';

import { ApiError } from '../../../src/middlewares/errorHandler';
import {
  MAX_UINT256,
  checkedAdd,
  checkedSub,
  decodeUint256Word,
  isUint256String,
  parseUint256,
  saturatingSub,
} from '../../../src/runtime';
import { ErrorCode } from '../../../src/types/errors';
import { errorCodeOf } from '../../helpers';

describe('uint256 arithmetic', () => {
  describe('parseUint256', () => {
    it('should parse zero and the maximum value', () => {
      expect(parseUint256('0')).toBe(0n);
      expect(parseUint256(MAX_UINT256.toString())).toBe(MAX_UINT256);
    });

    it.each(['-1', '1.5', '01', '', '0x10', '1e3'])('should reject %p', (value) => {
      expect(errorCodeOf(() => parseUint256(value))).toBe(ErrorCode.INVALID_AMOUNT);
    });

    it('should reject values above 2^256 - 1', () => {
      expect(isUint256String((MAX_UINT256 + 1n).toString())).toBe(false);
      expect(errorCodeOf(() => parseUint256((MAX_UINT256 + 1n).toString()))).toBe(
        ErrorCode.INVALID_AMOUNT
      );
    });
  });

  describe('checked operations', () => {
    it('should add within range', () => {
      expect(checkedAdd(MAX_UINT256 - 1n, 1n)).toBe(MAX_UINT256);
    });

    it('should fail on overflow instead of wrapping', () => {
      expect(errorCodeOf(() => checkedAdd(MAX_UINT256, 1n))).toBe(ErrorCode.ARITHMETIC_OVERFLOW);
    });

    it('should raise the caller-chosen error on underflow', () => {
      expect(checkedSub(5n, 5n, () => ApiError.insufficientBalance())).toBe(0n);
      expect(errorCodeOf(() => checkedSub(1n, 2n, () => ApiError.insufficientBalance()))).toBe(
        ErrorCode.INSUFFICIENT_BALANCE
      );
    });

    it('should saturate at zero', () => {
      expect(saturatingSub(3n, 5n)).toBe(0n);
      expect(saturatingSub(5n, 3n)).toBe(2n);
    });
  });

  describe('ABI words', () => {
    it('should decode a 32-byte word', () => {
      expect(decodeUint256Word(`0x${'0'.repeat(61)}3e8`)).toBe(1000n);
    });

    it('should decode what the ABI coder encodes', () => {
      const word = ethers.AbiCoder.defaultAbiCoder().encode(['uint256'], [MAX_UINT256]);
      expect(decodeUint256Word(word)).toBe(MAX_UINT256);
    });

    it.each(['0x1234', '1000', `0x${'g'.repeat(64)}`, `0x${'0'.repeat(65)}`])(
      'should reject malformed deposit data %p',
      (data) => {
        expect(errorCodeOf(() => decodeUint256Word(data))).toBe(ErrorCode.INVALID_INPUT);
      }
    );
  });
});
