/**
 * Trading Core Configuration
 *
 * Centralized configuration for the ledger, escrow and bonus services.
 * Environment variables are validated once at load time; everything downstream
 * receives the typed `config` object (or a slice of it) through its constructor.
 */

import { z } from 'zod';

const DEFAULT_CURRENCIES = [
  'BTC', 'ETH', 'OP', 'BNB', 'SOL', 'DOGE', 'TRX', 'USDT',
  'XRP', 'ADA', 'NEAR', 'LTC', 'BCH', 'XLM', 'LINK', 'MATIC',
];

const decimalString = z
  .string()
  .regex(/^\d+(\.\d+)?$/, 'must be a non-negative decimal');

const positiveDecimalString = decimalString.refine((value) => /[1-9]/.test(value), 'must be greater than zero');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  DATABASE_URL: z.string().default(''),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(50).default(10),
  DB_SERIALIZATION_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

  GAME_BASE_CURRENCY: z.string().regex(/^[A-Z0-9]{2,10}$/).default('USDT'),
  GAME_CURRENCIES: z
    .string()
    .optional()
    .transform((raw) =>
      raw
        ? raw.split(',').map((c) => c.trim().toUpperCase()).filter(Boolean)
        : DEFAULT_CURRENCIES
    ),
  GAME_INITIAL_BALANCE: positiveDecimalString.default('10000'),
  GAME_FEE_RATE: decimalString.default('0.001'),
  GAME_BONUS_AMOUNT: positiveDecimalString.default('50'),
  GAME_BONUS_COOLDOWN_HOURS: z.coerce.number().positive().default(24),
});

export type Env = z.infer<typeof envSchema>;

export interface GameConfig {
  baseCurrency: string;
  currencies: readonly string[];
  initialBalance: string;
  feeRate: string;
  bonusAmount: string;
  bonusCooldownMs: number;
}

export interface LedgerConfig {
  /** Fractional digits stored for every wallet amount. */
  scale: number;
}

export interface AppConfig {
  database: {
    url: string;
    maxConnections: number;
    serializationRetries: number;
  };
  game: GameConfig;
  ledger: LedgerConfig;
  app: {
    env: Env['NODE_ENV'];
    logLevel: string | undefined;
    isDevelopment: boolean;
    isProduction: boolean;
    isTest: boolean;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);

  const currencies = env.GAME_CURRENCIES.includes(env.GAME_BASE_CURRENCY)
    ? env.GAME_CURRENCIES
    : [...env.GAME_CURRENCIES, env.GAME_BASE_CURRENCY];

  return {
    database: {
      url: env.DATABASE_URL,
      maxConnections: env.DB_POOL_MAX,
      serializationRetries: env.DB_SERIALIZATION_RETRIES,
    },
    game: {
      baseCurrency: env.GAME_BASE_CURRENCY,
      currencies,
      initialBalance: env.GAME_INITIAL_BALANCE,
      feeRate: env.GAME_FEE_RATE,
      bonusAmount: env.GAME_BONUS_AMOUNT,
      bonusCooldownMs: env.GAME_BONUS_COOLDOWN_HOURS * 60 * 60 * 1000,
    },
    ledger: {
      scale: 8,
    },
    app: {
      env: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
    },
  };
}

export const config = loadConfig();

/**
 * Validate required configuration for running against Postgres
 */
export function validateConfig(cfg: AppConfig = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!cfg.database.url) {
    errors.push('DATABASE_URL is required');
  }

  if (new Set(cfg.game.currencies).size !== cfg.game.currencies.length) {
    errors.push('GAME_CURRENCIES contains duplicates');
  }

  return { valid: errors.length === 0, errors };
}

export default config;
