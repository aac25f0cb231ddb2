import { describe, it, expect } from '@jest/globals';
import { getAddress, parseEther } from 'ethers';
import { loadConfig, loadEnv } from '../../src/config';
import { ConfigurationError } from '../../src/utils/error-handler';
import { catchError } from '../utils/test-helpers';

describe('Configuration', () => {
  it('should fall back to defaults', () => {
    const env = loadEnv({});

    expect(env.ENTRANCE_FEE_ETH).toBe(parseEther('0.01'));
    expect(env.INTERVAL_SECONDS).toBe(30);
    expect(env.NUM_WORDS).toBe(1);
    expect(env.VRF_NATIVE_PAYMENT).toBe(false);
  });

  it('should build a draw configuration from the environment', () => {
    const config = loadConfig({
      ENTRANCE_FEE_ETH: '0.5',
      INTERVAL_SECONDS: '60',
      VRF_SUBSCRIPTION_ID: '42',
      REQUEST_CONFIRMATIONS: '5',
      VRF_NATIVE_PAYMENT: 'true',
      VRF_COORDINATOR: '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd',
    });

    expect(config.lottery.draw).toEqual({
      entranceFee: 500000000000000000n,
      intervalSeconds: 60,
      coordinatorAddress: getAddress('0xabcdefabcdefabcdefabcdefabcdefabcdefabcd'),
      keyHash: '0x474e34a077df58807dbe9c96d3c009b23b3c6d0cce433e59bbf5b34f823bc56c',
      subscriptionId: 42n,
      callbackGasLimit: 500000,
      requestConfirmations: 5,
      numWords: 1,
      nativePayment: true,
    });
    expect(Object.isFrozen(config.lottery.draw)).toBe(true);
  });

  it('should reject zero request confirmations', () => {
    expect(() => loadConfig({ REQUEST_CONFIRMATIONS: '0' })).toThrow(ConfigurationError);
  });

  it('should name every invalid variable', () => {
    const error = catchError(
      () => loadEnv({ ENTRANCE_FEE_ETH: 'lots', VRF_KEY_HASH: '0x1234' }),
      ConfigurationError
    );

    expect(error.context?.invalid).toEqual(['ENTRANCE_FEE_ETH', 'VRF_KEY_HASH']);
  });

  it('should reject a non-positive keeper interval', () => {
    expect(() => loadConfig({ KEEPER_POLL_MS: '0' })).toThrow(ConfigurationError);
  });
});
