/**
 * TokenLedger Unit Tests
 */

import { LedgerSystem } from '../../../src/services/ledger/ledger.system';
import { EventType } from '../../../src/types/events';
import { ErrorCode } from '../../../src/types/errors';
import { MAX_UINT256 } from '../../../src/runtime';
import {
  ALICE,
  BOB,
  BRIDGE,
  CAROL,
  DAVE,
  OWNER,
  ZERO,
  call,
  createTestSystem,
  depositWord,
  errorCodeOf,
  mint,
} from '../../helpers';

describe('TokenLedger', () => {
  let system: LedgerSystem;

  beforeEach(() => {
    system = createTestSystem();
  });

  describe('metadata', () => {
    it('should expose name, symbol and decimals', () => {
      const { token } = system;

      expect(token.name()).toBe('RenderToken');
      expect(token.symbol()).toBe('RNDR');
      expect(token.decimals()).toBe(18);
      expect(token.totalSupply()).toBe(0n);
      expect(token.owner()).toBe(OWNER);
      expect(token.bridgeManager()).toBe(BRIDGE);
      expect(token.escrowContractAddress()).toBe(system.escrow.address);
    });
  });

  describe('transfer', () => {
    beforeEach(() => mint(system, ALICE, 100n));

    it('should move balance between accounts', () => {
      call(system, ALICE, (ctx) => system.token.transfer(ctx, BOB, 30n));

      expect(system.token.balanceOf(ALICE)).toBe(70n);
      expect(system.token.balanceOf(BOB)).toBe(30n);
      expect(system.token.totalSupply()).toBe(100n);
    });

    it('should reject the zero recipient without changing state', () => {
      const before = system.runtime.notifications().length;

      expect(errorCodeOf(() => call(system, ALICE, (ctx) => system.token.transfer(ctx, ZERO, 10n)))).toBe(
        ErrorCode.INVALID_RECIPIENT
      );
      expect(system.token.balanceOf(ALICE)).toBe(100n);
      expect(system.token.balanceOf(ZERO)).toBe(0n);
      expect(system.runtime.notifications()).toHaveLength(before);
    });

    it('should reject amounts above the balance', () => {
      expect(errorCodeOf(() => call(system, ALICE, (ctx) => system.token.transfer(ctx, BOB, 101n)))).toBe(
        ErrorCode.INSUFFICIENT_BALANCE
      );
      expect(system.token.balanceOf(BOB)).toBe(0n);
    });

    it('should emit a notification for a zero-amount transfer', () => {
      call(system, BOB, (ctx) => system.token.transfer(ctx, CAROL, 0n));

      const [last] = system.runtime.notifications({ fromSequence: system.runtime.currentSequence() });
      expect(last).toMatchObject({
        eventType: EventType.TRANSFER,
        contract: system.token.address,
        payload: { from: BOB, to: CAROL, value: '0' },
      });
    });

    it('should leave a self-transfer balance unchanged', () => {
      call(system, ALICE, (ctx) => system.token.transfer(ctx, ALICE, 40n));

      expect(system.token.balanceOf(ALICE)).toBe(100n);
    });
  });

  describe('allowances', () => {
    beforeEach(() => mint(system, ALICE, 100n));

    it('should overwrite an allowance on approve', () => {
      call(system, ALICE, (ctx) => system.token.approve(ctx, CAROL, 50n));
      call(system, ALICE, (ctx) => system.token.approve(ctx, CAROL, 20n));

      expect(system.token.allowance(ALICE, CAROL)).toBe(20n);
    });

    it('should reject approving the zero address', () => {
      expect(errorCodeOf(() => call(system, ALICE, (ctx) => system.token.approve(ctx, ZERO, 1n)))).toBe(
        ErrorCode.INVALID_ADDRESS
      );
    });

    it('should add and saturate relative changes', () => {
      call(system, ALICE, (ctx) => system.token.approve(ctx, CAROL, 10n));
      call(system, ALICE, (ctx) => system.token.increaseAllowance(ctx, CAROL, 5n));
      expect(system.token.allowance(ALICE, CAROL)).toBe(15n);

      call(system, ALICE, (ctx) => system.token.decreaseAllowance(ctx, CAROL, 20n));
      expect(system.token.allowance(ALICE, CAROL)).toBe(0n);

      const [approval] = system.runtime.notifications({
        eventType: EventType.APPROVAL,
        fromSequence: system.runtime.currentSequence(),
      });
      expect(approval.payload).toEqual({ owner: ALICE, spender: CAROL, value: '0' });
    });

    it('should fail an increase past 2^256 - 1', () => {
      call(system, ALICE, (ctx) => system.token.approve(ctx, CAROL, MAX_UINT256));

      expect(
        errorCodeOf(() => call(system, ALICE, (ctx) => system.token.increaseAllowance(ctx, CAROL, 1n)))
      ).toBe(ErrorCode.ARITHMETIC_OVERFLOW);
      expect(system.token.allowance(ALICE, CAROL)).toBe(MAX_UINT256);
    });
  });

  describe('transferFrom', () => {
    beforeEach(() => {
      mint(system, ALICE, 100n);
      call(system, ALICE, (ctx) => system.token.approve(ctx, CAROL, 50n));
    });

    it('should spend the allowance and move the balance', () => {
      call(system, CAROL, (ctx) => system.token.transferFrom(ctx, ALICE, DAVE, 20n));

      expect(system.token.allowance(ALICE, CAROL)).toBe(30n);
      expect(system.token.balanceOf(ALICE)).toBe(80n);
      expect(system.token.balanceOf(DAVE)).toBe(20n);
    });

    it('should reject amounts above the allowance', () => {
      expect(
        errorCodeOf(() => call(system, CAROL, (ctx) => system.token.transferFrom(ctx, ALICE, DAVE, 60n)))
      ).toBe(ErrorCode.INSUFFICIENT_ALLOWANCE);
      expect(system.token.allowance(ALICE, CAROL)).toBe(50n);
      expect(system.token.balanceOf(ALICE)).toBe(100n);
      expect(system.token.balanceOf(DAVE)).toBe(0n);
    });

    it('should reject amounts above the owner balance', () => {
      call(system, ALICE, (ctx) => system.token.transfer(ctx, BOB, 90n));

      expect(
        errorCodeOf(() => call(system, CAROL, (ctx) => system.token.transferFrom(ctx, ALICE, DAVE, 20n)))
      ).toBe(ErrorCode.INSUFFICIENT_BALANCE);
      expect(system.token.allowance(ALICE, CAROL)).toBe(50n);
    });

    it('should check the recipient before the allowance', () => {
      expect(
        errorCodeOf(() => call(system, CAROL, (ctx) => system.token.transferFrom(ctx, ALICE, ZERO, 60n)))
      ).toBe(ErrorCode.INVALID_RECIPIENT);
    });

    it('should reject the zero address as source', () => {
      expect(
        errorCodeOf(() => call(system, CAROL, (ctx) => system.token.transferFrom(ctx, ZERO, DAVE, 1n)))
      ).toBe(ErrorCode.INVALID_ADDRESS);
    });
  });

  describe('deposit and withdraw', () => {
    it('should mint the decoded amount when called by the bridge manager', () => {
      const amount = call(system, BRIDGE, (ctx) => system.token.deposit(ctx, ALICE, depositWord(1000n)));

      expect(amount).toBe(1000n);
      expect(system.token.balanceOf(ALICE)).toBe(1000n);
      expect(system.token.totalSupply()).toBe(1000n);
      expect(system.runtime.notifications()[0].payload).toEqual({ from: ZERO, to: ALICE, value: '1000' });
    });

    it('should reject any other caller', () => {
      expect(
        errorCodeOf(() => call(system, OWNER, (ctx) => system.token.deposit(ctx, ALICE, depositWord(1n))))
      ).toBe(ErrorCode.NOT_AUTHORIZED);
    });

    it('should reject malformed deposit data', () => {
      expect(errorCodeOf(() => call(system, BRIDGE, (ctx) => system.token.deposit(ctx, ALICE, '0x01')))).toBe(
        ErrorCode.INVALID_INPUT
      );
    });

    it('should reject minting to the zero address', () => {
      expect(
        errorCodeOf(() => call(system, BRIDGE, (ctx) => system.token.deposit(ctx, ZERO, depositWord(1n))))
      ).toBe(ErrorCode.INVALID_RECIPIENT);
    });

    it('should fail when total supply would overflow', () => {
      mint(system, ALICE, MAX_UINT256);

      expect(
        errorCodeOf(() => call(system, BRIDGE, (ctx) => system.token.deposit(ctx, BOB, depositWord(1n))))
      ).toBe(ErrorCode.ARITHMETIC_OVERFLOW);
      expect(system.token.balanceOf(BOB)).toBe(0n);
    });

    it('should burn the caller balance on withdraw', () => {
      mint(system, ALICE, 100n);
      call(system, ALICE, (ctx) => system.token.withdraw(ctx, 40n));

      expect(system.token.balanceOf(ALICE)).toBe(60n);
      expect(system.token.totalSupply()).toBe(60n);

      const [burn] = system.runtime.notifications({ fromSequence: system.runtime.currentSequence() });
      expect(burn.payload).toEqual({ from: ALICE, to: ZERO, value: '40' });
    });

    it('should reject withdrawing more than the balance', () => {
      mint(system, ALICE, 100n);

      expect(errorCodeOf(() => call(system, ALICE, (ctx) => system.token.withdraw(ctx, 101n)))).toBe(
        ErrorCode.INSUFFICIENT_BALANCE
      );
      expect(system.token.totalSupply()).toBe(100n);
    });
  });

  describe('administration', () => {
    it('should let only the owner set the escrow address', () => {
      expect(
        errorCodeOf(() => call(system, ALICE, (ctx) => system.token.setEscrowContractAddress(ctx, BOB)))
      ).toBe(ErrorCode.NOT_OWNER);
      expect(
        errorCodeOf(() => call(system, OWNER, (ctx) => system.token.setEscrowContractAddress(ctx, ZERO)))
      ).toBe(ErrorCode.INVALID_ADDRESS);

      call(system, OWNER, (ctx) => system.token.setEscrowContractAddress(ctx, BOB));

      expect(system.token.escrowContractAddress()).toBe(BOB);
      expect(system.runtime.notifications({ eventType: EventType.ESCROW_CONTRACT_ADDRESS_UPDATED })[0].payload).toEqual({
        escrowAddress: BOB,
      });
    });

    it('should hand minting over to a new bridge manager', () => {
      call(system, OWNER, (ctx) => system.token.updateBridgeManager(ctx, BOB));

      call(system, BOB, (ctx) => system.token.deposit(ctx, ALICE, depositWord(5n)));
      expect(system.token.balanceOf(ALICE)).toBe(5n);
      expect(
        errorCodeOf(() => call(system, BRIDGE, (ctx) => system.token.deposit(ctx, ALICE, depositWord(5n))))
      ).toBe(ErrorCode.NOT_AUTHORIZED);
    });

    it('should reject a zero bridge manager', () => {
      expect(
        errorCodeOf(() => call(system, OWNER, (ctx) => system.token.updateBridgeManager(ctx, ZERO)))
      ).toBe(ErrorCode.INVALID_ADDRESS);
    });

    it('should transfer and renounce ownership', () => {
      call(system, OWNER, (ctx) => system.token.transferOwnership(ctx, ALICE));
      expect(system.token.owner()).toBe(ALICE);
      expect(
        errorCodeOf(() => call(system, OWNER, (ctx) => system.token.setEscrowContractAddress(ctx, BOB)))
      ).toBe(ErrorCode.NOT_OWNER);

      call(system, ALICE, (ctx) => system.token.renounceOwnership(ctx));
      expect(system.token.owner()).toBe(ZERO);

      const transfers = system.runtime.notifications({ eventType: EventType.OWNERSHIP_TRANSFERRED });
      expect(transfers.map((n) => n.payload)).toEqual([
        { previousOwner: OWNER, newOwner: ALICE },
        { previousOwner: ALICE, newOwner: ZERO },
      ]);
    });

    it('should reject transferring ownership to the zero address', () => {
      expect(
        errorCodeOf(() => call(system, OWNER, (ctx) => system.token.transferOwnership(ctx, ZERO)))
      ).toBe(ErrorCode.INVALID_ADDRESS);
    });
  });
});
