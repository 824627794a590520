import type { TradewatchConfig } from '../core/config.js';
import type { LlmClient } from '../core/llm.js';
import type { Logger } from '../core/logger.js';
import { RpcBalanceSource, type BalanceSource } from '../data/evm_balances.js';
import { EtherscanTransactionSource, type TransactionSource } from '../data/evm_transactions.js';
import { CoinGeckoClient, type MarketDataSource, type PriceHistorySource } from '../data/market_data.js';
import { NewsApiClient, type NewsSource } from '../data/news.js';
import type { MemoryStore, TradeLedger } from '../memory/store.js';
import { ChannelContext } from './conversation/channel_context.js';
import { ConversationStateStore } from './conversation/state_store.js';
import { DispatchExecutor } from './dispatch/executor.js';
import { ResponseDecisionGate } from './gate/respond_gate.js';
import { CritiqueHandler } from './handlers/critique.js';
import { DisabledHandler } from './handlers/disabled.js';
import { GeneralHandler } from './handlers/general.js';
import { MarketHandler } from './handlers/market.js';
import { buildHandlerRegistry } from './handlers/registry.js';
import type { HandlerRegistry, IntentHandler } from './handlers/types.js';
import { WalletHandler } from './handlers/wallet.js';
import { IntentClassifier } from './intents/classifier.js';
import { WorkflowOrchestrator } from './orchestrator/workflow.js';
import { PERSONA } from './persona.js';
import { ProactiveCooldownGate } from './proactive/cooldown.js';
import { ResponseSynthesizer } from './synthesis/synthesizer.js';

export interface RoutingPipelineDeps {
  config: TradewatchConfig;
  logger: Logger;
  llm: LlmClient | null;
  memory: MemoryStore | null;
  ledger: TradeLedger | null;
  /** Replaces the configured handlers, e.g. with stubs in tests. */
  handlers?: IntentHandler[];
  marketSource?: MarketDataSource;
  historySource?: PriceHistorySource | null;
  newsSource?: NewsSource | null;
  balanceSource?: BalanceSource | null;
  transactionSource?: TransactionSource | null;
  now?: () => number;
}

export interface RoutingPipeline {
  orchestrator: WorkflowOrchestrator;
  conversations: ConversationStateStore;
  cooldown: ProactiveCooldownGate;
  registry: HandlerRegistry;
}

export function createDefaultHandlers(deps: RoutingPipelineDeps): IntentHandler[] {
  const { config, logger } = deps;
  const handlers = config.handlers;
  const walletSettings = handlers.wallet;
  const marketSettings = handlers.market;

  const wallet = walletSettings.enabled
    ? new WalletHandler({
        network: walletSettings.network,
        balances:
          deps.balanceSource !== undefined
            ? deps.balanceSource
            : walletSettings.rpcUrl
              ? new RpcBalanceSource(walletSettings.rpcUrl, walletSettings.network, walletSettings.rpcTimeoutMs)
              : null,
        transactions:
          deps.transactionSource !== undefined
            ? deps.transactionSource
            : walletSettings.etherscanApiKey
              ? new EtherscanTransactionSource(
                  walletSettings.etherscanApiKey,
                  walletSettings.network,
                  walletSettings.rpcTimeoutMs
                )
              : null,
        memory: deps.memory,
      })
    : new DisabledHandler('wallet');

  let market: IntentHandler = new DisabledHandler('market');
  if (marketSettings.enabled) {
    const coinGecko = deps.marketSource
      ? null
      : new CoinGeckoClient(
            {
              baseUrl: marketSettings.apiBaseUrl,
              apiKey: marketSettings.apiKey,
              cacheTtlSeconds: marketSettings.cacheTtlSeconds,
              requestTimeoutMs: marketSettings.requestTimeoutMs,
              retries: marketSettings.retries,
            },
          logger.child('market-data')
        );
    const news =
      deps.newsSource !== undefined
        ? deps.newsSource
        : marketSettings.newsApiKey
          ? new NewsApiClient(
              {
                baseUrl: marketSettings.newsApiBaseUrl,
                apiKey: marketSettings.newsApiKey,
                cacheTtlSeconds: marketSettings.cacheTtlSeconds,
                requestTimeoutMs: marketSettings.requestTimeoutMs,
                retries: marketSettings.retries,
              },
              logger.child('news')
            )
          : null;
    const quotes = deps.marketSource ?? coinGecko;
    if (quotes) {
      market = new MarketHandler(quotes, {
        history: deps.historySource !== undefined ? deps.historySource : coinGecko,
        news,
      });
    }
  }

  const critique = handlers.critique.enabled
    ? new CritiqueHandler({
        ledger: deps.ledger,
        recordTrades: handlers.critique.recordTrades,
        coach:
          deps.llm && handlers.critique.suggestions
            ? { llm: deps.llm, timeoutMs: config.llm.timeoutMs, logger: logger.child('critique') }
            : null,
      })
    : new DisabledHandler('critique');

  const general = handlers.general.enabled ? new GeneralHandler() : new DisabledHandler('general');

  return [wallet, market, critique, general];
}

export function createRoutingPipeline(deps: RoutingPipelineDeps): RoutingPipeline {
  const { config, logger, llm } = deps;

  const registry = buildHandlerRegistry(deps.handlers ?? createDefaultHandlers(deps));
  const conversations = new ConversationStateStore({
    windowSize: config.llm.contextWindowSize,
    initialSystemMessage: PERSONA,
  });
  const cooldown = new ProactiveCooldownGate({ cooldownMs: config.router.cooldownSeconds * 1000 });

  const orchestrator = new WorkflowOrchestrator({
    gate: new ResponseDecisionGate(
      llm,
      {
        ambientReplies: config.router.ambientReplies,
        conversationTimeoutSeconds: config.router.conversationTimeoutSeconds,
        timeoutMs: config.llm.timeoutMs,
      },
      logger.child('gate')
    ),
    classifier: new IntentClassifier(
      llm,
      { timeoutMs: config.llm.timeoutMs, maxTokens: config.llm.classifyMaxTokens },
      logger.child('classifier')
    ),
    executor: new DispatchExecutor(
      registry,
      { handlerTimeoutMs: config.router.handlerTimeoutMs },
      logger.child('dispatch')
    ),
    synthesizer: new ResponseSynthesizer({
      llm,
      conversations,
      memory: deps.memory,
      options: {
        maxTokens: config.llm.synthesisMaxTokens,
        temperature: config.llm.temperature,
        timeoutMs: config.llm.timeoutMs,
      },
      logger: logger.child('synthesis'),
    }),
    cooldown,
    conversations,
    channels: new ChannelContext(config.router.recentContextSize),
    memory: deps.memory,
    logger: logger.child('workflow'),
    now: deps.now,
  });

  return { orchestrator, conversations, cooldown, registry };
}
