import { isHexString } from 'ethers';
import { DrawConfig } from '../types/lottery';
import { ConfigurationError } from '../utils/error-handler';
import { normalizeAddress } from '../utils/address';

/**
 * Check a DrawConfig and return a frozen, address-normalized copy.
 */
export function validateDrawConfig(config: DrawConfig): Readonly<DrawConfig> {
  const problems: string[] = [];

  if (config.entranceFee < 0n) problems.push('entranceFee must not be negative');
  if (!Number.isInteger(config.intervalSeconds) || config.intervalSeconds < 0) {
    problems.push('intervalSeconds must be a non-negative integer');
  }
  if (!Number.isInteger(config.requestConfirmations) || config.requestConfirmations < 1) {
    problems.push('requestConfirmations must be at least 1');
  }
  if (!Number.isInteger(config.numWords) || config.numWords < 1) {
    problems.push('numWords must be at least 1');
  }
  if (!Number.isInteger(config.callbackGasLimit) || config.callbackGasLimit <= 0) {
    problems.push('callbackGasLimit must be a positive integer');
  }
  if (!isHexString(config.keyHash, 32)) problems.push('keyHash must be a 32-byte hex string');
  if (config.subscriptionId < 0n) problems.push('subscriptionId must not be negative');

  let coordinatorAddress = config.coordinatorAddress;
  try {
    coordinatorAddress = normalizeAddress(config.coordinatorAddress, 'coordinatorAddress');
  } catch {
    problems.push('coordinatorAddress must be a valid address');
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid draw configuration: ${problems.join('; ')}`, { problems });
  }

  return Object.freeze({ ...config, coordinatorAddress });
}
