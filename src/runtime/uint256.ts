import { ethers } from 'ethers';

import { ApiError } from '../middlewares/errorHandler';

export const MAX_UINT256: bigint = ethers.MaxUint256;

const DECIMAL_PATTERN = /^(0|[1-9]\d*)$/;

export const isUint256String = (value: unknown): value is string =>
  typeof value === 'string' && DECIMAL_PATTERN.test(value) && BigInt(value) <= MAX_UINT256;

export const parseUint256 = (value: string): bigint => {
  if (!isUint256String(value)) {
    throw ApiError.invalidAmount(`Not an unsigned 256-bit integer: ${value}`);
  }
  return BigInt(value);
};

export const checkedAdd = (a: bigint, b: bigint): bigint => {
  const sum = a + b;
  if (sum > MAX_UINT256) {
    throw ApiError.arithmeticOverflow();
  }
  return sum;
};

/**
 * Subtract `b` from `a`, raising `onUnderflow()` instead of going negative.
 */
export const checkedSub = (a: bigint, b: bigint, onUnderflow: () => ApiError): bigint => {
  if (b > a) {
    throw onUnderflow();
  }
  return a - b;
};

export const saturatingSub = (a: bigint, b: bigint): bigint => (b > a ? 0n : a - b);

const DEPOSIT_DATA_MESSAGE = 'Deposit data must be a 32-byte ABI-encoded uint256';

/**
 * Decode a single ABI-encoded uint256 word (`0x` + 64 hex digits).
 */
export const decodeUint256Word = (data: string): bigint => {
  if (!ethers.isHexString(data, 32)) {
    throw ApiError.invalidInput(DEPOSIT_DATA_MESSAGE);
  }
  const [value] = ethers.AbiCoder.defaultAbiCoder().decode(['uint256'], data);
  if (typeof value !== 'bigint') {
    throw ApiError.invalidInput(DEPOSIT_DATA_MESSAGE);
  }
  return value;
};
