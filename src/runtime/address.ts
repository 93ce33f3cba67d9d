import { ethers } from 'ethers';

/**
 * Account or contract identifier: `0x` followed by 40 lower-case hex digits.
 */
export type Address = string;

export const ZERO_ADDRESS: Address = ethers.ZeroAddress;

/**
 * Hex addresses only (no ICAP). Mixed-case input must carry a valid EIP-55
 * checksum; all-lower or all-upper input is taken as is.
 */
export const isAddress = (value: unknown): value is Address =>
  typeof value === 'string' && ethers.isHexString(value, 20) && ethers.isAddress(value);

/**
 * Lower-case an address so map keys and equality checks are case-insensitive.
 */
export const toAddress = (value: string): Address => {
  if (!isAddress(value)) {
    throw new TypeError(`Not an address: ${value}`);
  }
  return ethers.getAddress(value).toLowerCase();
};

export const isZeroAddress = (address: Address): boolean => address === ZERO_ADDRESS;

/**
 * CREATE address for the `nonce`-th deployment by `deployer`, so a runtime
 * rebuilt from the same configuration lands on the same addresses.
 */
export const deriveContractAddress = (deployer: Address, nonce: number): Address =>
  ethers.getCreateAddress({ from: deployer, nonce }).toLowerCase();
