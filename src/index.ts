export const VERSION = '0.1.0';

export { Tradewatch, type TradewatchOptions } from './core/agent.js';
export { loadConfig, parseConfig, type TradewatchConfig, type TradewatchConfigInput } from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export {
  createLlmClient,
  LlmRateLimitError,
  LlmUnavailableError,
  type ChatMessage,
  type LlmClient,
} from './core/llm.js';
export { err, ok, type Result } from './core/result.js';
export { TimeoutError } from './core/retry.js';

export { createRoutingPipeline, type RoutingPipeline } from './agent/pipeline.js';
export { FALLBACK_REPLY, WorkflowOrchestrator, type WorkflowOutcome } from './agent/orchestrator/workflow.js';
export { ResponseDecisionGate, type RespondDecision } from './agent/gate/respond_gate.js';
export { IntentClassifier, parseClassifierReply } from './agent/intents/classifier.js';
export { detectIntent } from './agent/intents/heuristics.js';
export { INTENTS, type Intent, type IntentClassification } from './agent/intents/types.js';
export { DispatchExecutor, type HandlerFailure } from './agent/dispatch/executor.js';
export { ResponseSynthesizer } from './agent/synthesis/synthesizer.js';
export { ConversationStateStore } from './agent/conversation/state_store.js';
export { ProactiveCooldownGate } from './agent/proactive/cooldown.js';
export { buildHandlerRegistry } from './agent/handlers/registry.js';
export type { HandlerRegistry, IntentHandler } from './agent/handlers/types.js';
export type { InboundMessage, Requester } from './agent/types.js';

export type { ChatTransport, IncomingChatMessage } from './interface/types.js';
export { InProcessTransport } from './interface/in_process.js';
export { ConsoleTransport } from './interface/console.js';

export {
  SqliteMemoryStore,
  SqliteTradeLedger,
  type MemoryStore,
  type TradeLedger,
} from './memory/store.js';
