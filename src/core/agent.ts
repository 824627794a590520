import type { TradewatchConfig } from './config.js';
import { createLlmClient } from './llm.js';
import type { LlmClient } from './llm.js';
import { Logger } from './logger.js';
import { createRoutingPipeline, type RoutingPipeline, type RoutingPipelineDeps } from '../agent/pipeline.js';
import type { WorkflowOutcome } from '../agent/orchestrator/workflow.js';
import type { InboundMessage } from '../agent/types.js';
import { createIncomingHandler } from '../gateway/incoming.js';
import type { ChatTransport } from '../interface/types.js';
import { closeDatabase } from '../memory/db.js';
import {
  SqliteMemoryStore,
  SqliteTradeLedger,
  type MemoryStore,
  type TradeLedger,
} from '../memory/store.js';

export interface TradewatchOptions {
  logger?: Logger;
  /** Overrides the client built from config; pass null to force rule-based mode. */
  llm?: LlmClient | null;
  memory?: MemoryStore | null;
  ledger?: TradeLedger | null;
  pipeline?: Omit<RoutingPipelineDeps, 'config' | 'logger' | 'llm' | 'memory' | 'ledger'>;
}

/**
 * Owns one routing pipeline and the transport it serves. Storage and the LLM
 * client are built from config unless injected.
 */
export class Tradewatch {
  private readonly logger: Logger;
  private readonly llm: LlmClient | null;
  private readonly memory: MemoryStore | null;
  private readonly ledger: TradeLedger | null;
  private readonly pipeline: RoutingPipeline;
  private transport: ChatTransport | null = null;

  constructor(
    private readonly config: TradewatchConfig,
    options: TradewatchOptions = {}
  ) {
    this.logger = options.logger ?? new Logger('info');
    this.llm = options.llm !== undefined ? options.llm : createLlmClient(config);
    if (!this.llm) {
      this.logger.warn('No LLM API key configured; running with keyword routing and raw handler replies.');
    }

    const storageEnabled = config.memory.enabled;
    this.memory =
      options.memory !== undefined
        ? options.memory
        : storageEnabled
          ? new SqliteMemoryStore({ dbPath: config.memory.dbPath, maxSummaryItems: config.memory.maxSummaryItems })
          : null;
    this.ledger =
      options.ledger !== undefined
        ? options.ledger
        : storageEnabled
          ? new SqliteTradeLedger({ dbPath: config.memory.dbPath })
          : null;

    this.pipeline = createRoutingPipeline({
      ...options.pipeline,
      config,
      logger: this.logger,
      llm: this.llm,
      memory: this.memory,
      ledger: this.ledger,
    });

    this.pipeline.orchestrator.on('handler_failed', (failure) => {
      this.logger.warn(`Handler ${failure.intent} ${failure.kind}: ${failure.message}`);
    });
    this.pipeline.orchestrator.on('suppressed', (reason, message) => {
      this.logger.debug(`Suppressed reply to ${message.id} (${reason})`);
    });
  }

  get orchestrator(): RoutingPipeline['orchestrator'] {
    return this.pipeline.orchestrator;
  }

  getMemory(): MemoryStore | null {
    return this.memory;
  }

  getLedger(): TradeLedger | null {
    return this.ledger;
  }

  handle(message: InboundMessage): Promise<WorkflowOutcome> {
    return this.pipeline.orchestrator.handle(message);
  }

  /** Connects the transport and resolves once it stops taking input. */
  async start(transport: ChatTransport): Promise<void> {
    if (this.transport) {
      throw new Error(`Already serving ${this.transport.name}`);
    }
    this.transport = transport;
    transport.onMessage(
      createIncomingHandler({
        transport,
        orchestrator: this.pipeline.orchestrator,
        memory: this.memory,
        ledger: this.ledger,
        commandPrefix: this.config.router.commandPrefix,
        typingDelayMaxMs: this.config.gateway.typingDelayMaxMs,
        logger: this.logger.child(transport.name),
      })
    );
    this.logger.info(`Serving ${transport.name} (llm: ${this.llm?.model ?? 'none'})`);
    await transport.start();
  }

  async stop(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    if (transport) {
      await transport.stop();
    }
    if (this.config.memory.enabled) {
      closeDatabase(this.config.memory.dbPath);
    }
  }
}
