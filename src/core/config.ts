import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

const LlmSchema = z
  .object({
    model: z.string().min(1).default('claude-3-5-haiku-latest'),
    apiKey: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).default(0.7),
    maxTokens: z.number().int().positive().default(500),
    classifyMaxTokens: z.number().int().positive().default(20),
    synthesisMaxTokens: z.number().int().positive().default(600),
    timeoutMs: z.number().int().positive().default(20_000),
    contextWindowSize: z.number().int().min(1).default(10),
  })
  .default({});

const MemorySchema = z
  .object({
    enabled: z.boolean().default(true),
    dbPath: z.string().min(1).optional(),
    maxSummaryItems: z.number().int().positive().default(5),
  })
  .default({});

const RouterSchema = z
  .object({
    commandPrefix: z.string().min(1).default('/tm '),
    cooldownSeconds: z.number().min(0).default(600),
    conversationTimeoutSeconds: z.number().min(0).default(300),
    handlerTimeoutMs: z.number().int().positive().default(15_000),
    recentContextSize: z.number().int().min(0).default(10),
    ambientReplies: z.boolean().default(true),
  })
  .default({});

const WalletHandlerSchema = z
  .object({
    enabled: z.boolean().default(true),
    network: z.string().min(1).default('eth'),
    rpcUrl: z.string().url().optional(),
    rpcTimeoutMs: z.number().int().positive().default(8_000),
    etherscanApiKey: z.string().min(1).optional(),
  })
  .default({});

const MarketHandlerSchema = z
  .object({
    enabled: z.boolean().default(true),
    apiBaseUrl: z.string().url().default('https://api.coingecko.com/api/v3'),
    apiKey: z.string().min(1).optional(),
    cacheTtlSeconds: z.number().min(0).default(300),
    requestTimeoutMs: z.number().int().positive().default(8_000),
    retries: z.number().int().min(0).default(2),
    newsApiBaseUrl: z.string().url().default('https://newsapi.org/v2'),
    newsApiKey: z.string().min(1).optional(),
  })
  .default({});

const CritiqueHandlerSchema = z
  .object({
    enabled: z.boolean().default(true),
    recordTrades: z.boolean().default(true),
    suggestions: z.boolean().default(true),
  })
  .default({});

const GeneralHandlerSchema = z
  .object({
    enabled: z.boolean().default(true),
  })
  .default({});

const TradewatchConfigSchema = z.object({
  llm: LlmSchema,
  memory: MemorySchema,
  router: RouterSchema,
  handlers: z
    .object({
      wallet: WalletHandlerSchema,
      market: MarketHandlerSchema,
      critique: CritiqueHandlerSchema,
      general: GeneralHandlerSchema,
    })
    .default({}),
  gateway: z
    .object({
      typingDelayMaxMs: z.number().int().min(0).default(3_000),
    })
    .default({}),
});

export type TradewatchConfig = z.infer<typeof TradewatchConfigSchema>;
export type TradewatchConfigInput = z.input<typeof TradewatchConfigSchema>;

export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.TRADEWATCH_CONFIG_PATH ?? join(homedir(), '.tradewatch', 'config.yaml');
}

function applyEnvOverrides(config: TradewatchConfig, env: NodeJS.ProcessEnv): TradewatchConfig {
  const llmModel = env.TRADEWATCH_LLM_MODEL?.trim();
  const apiKey = env.ANTHROPIC_API_KEY?.trim();
  const dbPath = env.TRADEWATCH_DB_PATH?.trim();
  const rpcUrl = env.TRADEWATCH_RPC_URL?.trim();
  const marketKey = env.COINGECKO_API_KEY?.trim();
  const newsKey = env.NEWSAPI_KEY?.trim();
  const etherscanKey = env.ETHERSCAN_API_KEY?.trim();

  return {
    ...config,
    llm: {
      ...config.llm,
      ...(llmModel ? { model: llmModel } : {}),
      ...(!config.llm.apiKey && apiKey ? { apiKey } : {}),
    },
    memory: {
      ...config.memory,
      ...(dbPath ? { dbPath } : {}),
    },
    handlers: {
      ...config.handlers,
      wallet: {
        ...config.handlers.wallet,
        ...(!config.handlers.wallet.rpcUrl && rpcUrl ? { rpcUrl } : {}),
        ...(!config.handlers.wallet.etherscanApiKey && etherscanKey ? { etherscanApiKey: etherscanKey } : {}),
      },
      market: {
        ...config.handlers.market,
        ...(!config.handlers.market.apiKey && marketKey ? { apiKey: marketKey } : {}),
        ...(!config.handlers.market.newsApiKey && newsKey ? { newsApiKey: newsKey } : {}),
      },
    },
  };
}

/**
 * Parse an already-loaded config object. Throws a ZodError listing every invalid field.
 */
export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): TradewatchConfig {
  const parsed = TradewatchConfigSchema.parse(raw ?? {});
  return applyEnvOverrides(parsed, env);
}

export function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): TradewatchConfig {
  const configPath = path ?? getDefaultConfigPath(env);
  if (!existsSync(configPath)) {
    return parseConfig({}, env);
  }
  const text = readFileSync(configPath, 'utf-8');
  const raw: unknown = yaml.parse(text);
  return parseConfig(raw, env);
}
