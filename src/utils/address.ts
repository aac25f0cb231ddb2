import { getAddress, isAddress } from 'ethers';
import { createValidationError } from './error-handler';

/**
 * Checksum an address, or throw a ValidationError naming the field.
 */
export function normalizeAddress(value: string, field: string = 'address'): string {
  if (!isAddress(value)) {
    throw createValidationError(field, value, 'a 20-byte hex address');
  }
  return getAddress(value);
}
