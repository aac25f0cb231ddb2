import { describe, it, expect, beforeEach } from '@jest/globals';
import { parseEther } from 'ethers';
import { NativeLedger } from '../../src/blockchain/native-ledger';
import { ValidationError } from '../../src/utils/error-handler';
import { PLAYER_1, PLAYER_2 } from '../utils/test-helpers';

describe('NativeLedger', () => {
  let ledger: NativeLedger;

  beforeEach(() => {
    ledger = new NativeLedger();
    ledger.credit(PLAYER_1, parseEther('1'));
  });

  it('should report zero for unknown accounts', () => {
    expect(ledger.balanceOf(PLAYER_2)).toBe(0n);
  });

  it('should treat address case as irrelevant', () => {
    const lower = '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd';
    ledger.credit(lower, 5n);

    expect(ledger.balanceOf(lower.toUpperCase().replace('0X', '0x'))).toBe(5n);
  });

  it('should move funds between accounts', () => {
    expect(ledger.transfer(PLAYER_1, PLAYER_2, parseEther('0.25'))).toBe(true);

    expect(ledger.balanceOf(PLAYER_1)).toBe(parseEther('0.75'));
    expect(ledger.balanceOf(PLAYER_2)).toBe(parseEther('0.25'));
  });

  it('should refuse a transfer the payer cannot cover', () => {
    expect(ledger.transfer(PLAYER_1, PLAYER_2, parseEther('2'))).toBe(false);

    expect(ledger.balanceOf(PLAYER_1)).toBe(parseEther('1'));
    expect(ledger.balanceOf(PLAYER_2)).toBe(0n);
  });

  it('should refuse a transfer to an account that rejects funds', () => {
    ledger.setRejectsFunds(PLAYER_2, true);
    expect(ledger.transfer(PLAYER_1, PLAYER_2, 1n)).toBe(false);

    ledger.setRejectsFunds(PLAYER_2, false);
    expect(ledger.transfer(PLAYER_1, PLAYER_2, 1n)).toBe(true);
  });

  it('should reject negative amounts', () => {
    expect(() => ledger.transfer(PLAYER_1, PLAYER_2, -1n)).toThrow(ValidationError);
    expect(() => ledger.credit(PLAYER_1, -1n)).toThrow(ValidationError);
  });

  it('should reject malformed addresses', () => {
    expect(() => ledger.balanceOf('not-an-address')).toThrow(ValidationError);
  });
});
