import fs from 'fs';
import path from 'path';

import yaml from 'js-yaml';
import { z } from 'zod';

export const CONFIG_FILE_NAME = 'trendbreak.config.yaml';

const TimeframeSchema = z.enum(['1m', '5m', '15m', '30m', '1h', '2h', '4h', '1d']);

// Exchange connection settings
const ExchangeConfigSchema = z
  .object({
    baseUrl: z.string().url().default('https://api.india.delta.exchange'),
    apiKeyEnvVar: z.string().default('DELTA_API_KEY'),
    apiSecretEnvVar: z.string().default('DELTA_API_SECRET'),
    userAgent: z.string().default('trendbreak/0.1'),
    timeoutMs: z.number().int().positive().default(20000),
    retries: z.number().int().min(0).max(10).default(2),
    retryDelayMs: z.number().int().min(0).default(600),
  })
  .default({});

// Account, risk and order settings
const TradingConfigSchema = z
  .object({
    live: z.boolean().default(false),
    watchlist: z.array(z.string().min(1)).min(1).default(['BTCUSD', 'ETHUSD', 'SOLUSD']),
    leverage: z.number().positive().default(100),
    riskUsd: z.number().positive().default(0.7),
    minTakeProfitUsd: z.number().min(0).default(1.0),
    maxNotionalBuffer: z.number().gt(0).lt(1).default(0.95),
    quantityStep: z.number().positive().default(1e-5),
    minBalanceUsd: z.number().min(0).default(0.01),
    maxTradesPerCycle: z.number().int().min(1).default(1),
    maxConcurrentSymbols: z.number().int().min(1).max(20).default(1),
  })
  .default({});

const MacroConfigSchema = z
  .object({
    timeframe: TimeframeSchema.default('4h'),
    candles: z.number().int().positive().default(250),
    emaPeriod: z.number().int().positive().default(200),
  })
  .default({});

const EntryVotingConfigSchema = z
  .object({
    timeframes: z.array(TimeframeSchema).min(1).default(['15m', '30m', '1h', '2h']),
    candles: z.number().int().positive().default(160),
    fastEma: z.number().int().positive().default(9),
    slowEma: z.number().int().positive().default(20),
    minAgreement: z.number().int().min(0).default(2),
  })
  .default({});

const FineConfigSchema = z
  .object({
    timeframe: TimeframeSchema.default('15m'),
    candles: z.number().int().positive().default(300),
    minBars: z.number().int().positive().default(50),
  })
  .default({});

const AtrConfigSchema = z
  .object({
    length: z.number().int().positive().default(14),
    entryMultiplier: z.number().min(0).default(0.5),
    stopMultiplier: z.number().positive().default(1.0),
  })
  .default({});

const StructureConfigSchema = z
  .object({
    swingLookback: z.number().int().positive().default(20),
    bodyRatio: z.number().min(0).max(1).default(0.6),
    minBars: z.number().int().positive().default(25),
  })
  .default({});

const StrategyConfigSchema = z
  .object({
    macro: MacroConfigSchema,
    entry: EntryVotingConfigSchema,
    fine: FineConfigSchema,
    atr: AtrConfigSchema,
    rewardRisk: z.number().positive().default(2.0),
    structure: StructureConfigSchema,
  })
  .default({});

const SchedulerConfigSchema = z
  .object({
    intervalMinutes: z.number().positive().default(15),
  })
  .default({});

const ConfigSchema = z.object({
  exchange: ExchangeConfigSchema,
  trading: TradingConfigSchema,
  strategy: StrategyConfigSchema,
  scheduler: SchedulerConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type ExchangeConfig = z.infer<typeof ExchangeConfigSchema>;
export type TradingConfig = z.infer<typeof TradingConfigSchema>;
export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;
export type Timeframe = z.infer<typeof TimeframeSchema>;

/**
 * Static parameters of the position sizer, a slice of the trading section.
 */
export type SizingConfig = Pick<
  TradingConfig,
  'riskUsd' | 'leverage' | 'maxNotionalBuffer' | 'minTakeProfitUsd' | 'quantityStep'
>;

export const defaultConfig = (): Config => ConfigSchema.parse({});

/**
 * Validate an already-loaded config object (YAML document or test fixture).
 */
export const parseConfig = (data: unknown): Config => ConfigSchema.parse(data ?? {});

/**
 * Load configuration from a YAML file
 *
 * @param configPath - Path to the configuration file
 * @returns Validated configuration object, or the defaults when the file is missing or invalid
 */
export const loadConfig = (configPath?: string): Config => {
  const configFilePath = configPath || path.join(process.cwd(), CONFIG_FILE_NAME);

  try {
    if (fs.existsSync(configFilePath)) {
      const fileContents = fs.readFileSync(configFilePath, 'utf8');
      return parseConfig(yaml.load(fileContents));
    }
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Invalid configuration file:');
      error.issues.forEach(issue => {
        console.error(`- ${issue.path.join('.')}: ${issue.message}`);
      });
    } else {
      console.error(
        `Error loading config file: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  console.log(`Using default configuration as ${CONFIG_FILE_NAME} was not found or was invalid.`);
  return defaultConfig();
};

/**
 * Creates a default configuration file if none exists
 *
 * @returns The path written, or undefined when a file was already there
 */
export const createDefaultConfigFile = (configPath?: string): string | undefined => {
  const target = configPath || path.join(process.cwd(), CONFIG_FILE_NAME);
  if (fs.existsSync(target)) {
    return undefined;
  }

  const yamlContent = yaml.dump(defaultConfig(), {
    indent: 2,
    lineWidth: 100,
    quotingType: '"',
  });

  fs.writeFileSync(target, yamlContent, 'utf8');
  console.log(`Created default configuration file: ${target}`);
  return target;
};

export interface CliOptions {
  live?: boolean;
  symbols?: string;
  interval?: string | number;
}

/**
 * Overlay command-line options on the loaded configuration
 */
export const mergeConfigWithCliOptions = (loadedConfig: Config, cliOptions: CliOptions): Config => {
  const watchlist = cliOptions.symbols
    ? cliOptions.symbols
        .split(',')
        .map(symbol => symbol.trim().toUpperCase())
        .filter(symbol => symbol.length > 0)
    : [];

  const interval =
    cliOptions.interval !== undefined ? Number(cliOptions.interval) : Number.NaN;

  return {
    ...loadedConfig,
    trading: {
      ...loadedConfig.trading,
      live: cliOptions.live ?? loadedConfig.trading.live,
      watchlist: watchlist.length > 0 ? watchlist : loadedConfig.trading.watchlist,
    },
    scheduler: {
      ...loadedConfig.scheduler,
      intervalMinutes:
        Number.isFinite(interval) && interval > 0
          ? interval
          : loadedConfig.scheduler.intervalMinutes,
    },
  };
};

export interface ApiCredentials {
  apiKey: string;
  apiSecret: string;
}

/**
 * Read API credentials from the environment variables named in the config
 */
export const resolveCredentials = (
  exchange: ExchangeConfig,
  env: NodeJS.ProcessEnv = process.env
): ApiCredentials => {
  const apiKey = env[exchange.apiKeyEnvVar];
  if (!apiKey) {
    throw new Error(`Environment variable ${exchange.apiKeyEnvVar} not set`);
  }
  const apiSecret = env[exchange.apiSecretEnvVar];
  if (!apiSecret) {
    throw new Error(`Environment variable ${exchange.apiSecretEnvVar} not set`);
  }
  return { apiKey, apiSecret };
};
