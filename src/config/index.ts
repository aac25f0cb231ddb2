import dotenv from 'dotenv';
import { EnvError, bool, cleanEnv, makeValidator, num, str } from 'envalid';
import { isAddress, isHexString, parseEther } from 'ethers';
import { DrawConfig } from '../types/lottery';
import { ConfigurationError } from '../utils/error-handler';
import { validateDrawConfig } from './draw-config';

dotenv.config();

const etherAmount = makeValidator<bigint>((input) => {
  try {
    return parseEther(input.trim());
  } catch {
    throw new EnvError(`Invalid ether amount: "${input}"`);
  }
});

const uint = makeValidator<bigint>((input) => {
  if (!/^\d+$/.test(input.trim())) {
    throw new EnvError(`Invalid unsigned integer: "${input}"`);
  }
  return BigInt(input.trim());
});

const address = makeValidator<string>((input) => {
  if (!isAddress(input)) {
    throw new EnvError(`Invalid address: "${input}"`);
  }
  return input;
});

const bytes32 = makeValidator<string>((input) => {
  if (!isHexString(input, 32)) {
    throw new EnvError(`Invalid 32-byte hex string: "${input}"`);
  }
  return input;
});

const specs = {
  NODE_ENV: str({
    default: 'development',
    choices: ['development', 'test', 'production'],
  }),

  // Lottery
  LOTTERY_ADDRESS: address({
    default: '0x0000000000000000000000000000000000000002',
    desc: 'Account that holds the pot',
  }),
  ENTRANCE_FEE_ETH: etherAmount({ default: parseEther('0.01'), desc: 'Entrance fee in ether' }),
  INTERVAL_SECONDS: num({ default: 30, desc: 'Minimum seconds between draws' }),

  // Randomness oracle
  VRF_COORDINATOR: address({
    default: '0x0000000000000000000000000000000000000001',
    desc: 'Address the oracle fulfils from',
  }),
  VRF_KEY_HASH: bytes32({
    default: '0x474e34a077df58807dbe9c96d3c009b23b3c6d0cce433e59bbf5b34f823bc56c',
    desc: 'Key selector (gas lane)',
  }),
  VRF_SUBSCRIPTION_ID: uint({ default: 0n, desc: 'Billing subscription id' }),
  CALLBACK_GAS_LIMIT: num({ default: 500000 }),
  REQUEST_CONFIRMATIONS: num({ default: 3 }),
  NUM_WORDS: num({ default: 1 }),
  VRF_NATIVE_PAYMENT: bool({ default: false }),
  ORACLE_FULFILL_DELAY_MS: num({ default: 2000, desc: 'Local coordinator fulfillment delay' }),

  // Automation & monitoring
  KEEPER_POLL_MS: num({ default: 5000 }),
  STUCK_DRAW_SECONDS: num({ default: 3600 }),
  // Read by the logger at import; validated here so typos fail startup
  LOG_LEVEL: str({
    default: 'info',
    choices: ['error', 'warn', 'info', 'http', 'debug'],
  }),
  LOG_DIR: str({ default: '' }),
};

export type LotteryEnv = ReturnType<typeof loadEnv>;

/**
 * Validate raw environment variables. Throws ConfigurationError naming every
 * invalid key instead of exiting the process.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env) {
  return cleanEnv(source, specs, {
    reporter: ({ errors }) => {
      const entries = Object.entries(errors);
      if (entries.length > 0) {
        const invalid = entries.map(([key]) => key);
        throw new ConfigurationError(`Invalid environment: ${invalid.join(', ')}`, {
          invalid,
          messages: entries.map(([key, error]) => `${key}: ${error?.message ?? 'invalid'}`),
        });
      }
    },
  });
}

export function toDrawConfig(env: LotteryEnv): Readonly<DrawConfig> {
  return validateDrawConfig({
    entranceFee: env.ENTRANCE_FEE_ETH,
    intervalSeconds: env.INTERVAL_SECONDS,
    coordinatorAddress: env.VRF_COORDINATOR,
    keyHash: env.VRF_KEY_HASH,
    subscriptionId: env.VRF_SUBSCRIPTION_ID,
    callbackGasLimit: env.CALLBACK_GAS_LIMIT,
    requestConfirmations: env.REQUEST_CONFIRMATIONS,
    numWords: env.NUM_WORDS,
    nativePayment: env.VRF_NATIVE_PAYMENT,
  });
}

export interface AppConfig {
  environment: string;
  lottery: {
    address: string;
    draw: Readonly<DrawConfig>;
  };
  oracle: {
    fulfillDelayMs: number;
  };
  keeper: {
    pollIntervalMs: number;
  };
  monitoring: {
    stuckDrawSeconds: number;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = loadEnv(source);

  if (env.KEEPER_POLL_MS <= 0) {
    throw new ConfigurationError('KEEPER_POLL_MS must be positive', { KEEPER_POLL_MS: env.KEEPER_POLL_MS });
  }

  return {
    environment: env.NODE_ENV,
    lottery: {
      address: env.LOTTERY_ADDRESS,
      draw: toDrawConfig(env),
    },
    oracle: {
      fulfillDelayMs: env.ORACLE_FULFILL_DELAY_MS,
    },
    keeper: {
      pollIntervalMs: env.KEEPER_POLL_MS,
    },
    monitoring: {
      stuckDrawSeconds: env.STUCK_DRAW_SECONDS,
    },
  };
}
