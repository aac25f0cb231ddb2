import { formatEther } from 'ethers';
import { createComponentLogger } from '../utils/logger';
import { normalizeAddress } from '../utils/address';
import { ValidationError } from '../utils/error-handler';

const log = createComponentLogger('ledger');

/**
 * Single native-currency balance book. Stands in for the chain's account
 * balances: the lottery's pot is whatever its own account holds.
 */
export class NativeLedger {
  private balances = new Map<string, bigint>();
  private rejecting = new Set<string>();

  balanceOf(account: string): bigint {
    return this.balances.get(normalizeAddress(account)) ?? 0n;
  }

  /**
   * Add funds out of thin air (faucet / test funding).
   */
  credit(account: string, amount: bigint): void {
    if (amount < 0n) {
      throw new ValidationError('Credit amount must not be negative', { account, amount });
    }
    const address = normalizeAddress(account);
    this.balances.set(address, this.balanceOf(address) + amount);
  }

  /**
   * Mark an account as refusing incoming transfers, like a contract
   * without a payable receive hook.
   */
  setRejectsFunds(account: string, rejects: boolean): void {
    const address = normalizeAddress(account);
    if (rejects) {
      this.rejecting.add(address);
    } else {
      this.rejecting.delete(address);
    }
  }

  /**
   * Move `amount` from one account to another. Returns false, leaving both
   * balances untouched, when the payer is short or the recipient refuses.
   */
  transfer(from: string, to: string, amount: bigint): boolean {
    if (amount < 0n) {
      throw new ValidationError('Transfer amount must not be negative', { from, to, amount });
    }

    const sender = normalizeAddress(from, 'from');
    const recipient = normalizeAddress(to, 'to');
    const senderBalance = this.balanceOf(sender);

    if (senderBalance < amount) {
      log.debug('Transfer refused: insufficient balance', { from: sender, balance: senderBalance, amount });
      return false;
    }
    if (this.rejecting.has(recipient)) {
      log.debug('Transfer refused by recipient', { to: recipient, amount });
      return false;
    }

    this.balances.set(sender, senderBalance - amount);
    this.balances.set(recipient, this.balanceOf(recipient) + amount);

    log.debug(`Transferred ${formatEther(amount)} ETH`, { from: sender, to: recipient });
    return true;
  }
}
