// src/index.ts: public surface of the engine
export { createEngine, runPipeline, UNCLEAR_REQUEST_QUESTION } from './services/orchestrator';
export type { Engine, OrchestratorDeps, PipelineResponse, PipelineResult } from './services/orchestrator';

export { loadEngineConfig, resolveEngineConfig, ConfigValidationError } from './config/app.config';
export type { AutonomyPolicy, EngineConfig, EngineConfigOverrides, RetryPolicy } from './config/app.config';

export { requestContextSchema, validateRequestContext } from './agent/agent.validation';
export type { RequestContextInput } from './agent/agent.validation';

export { analyzeQuery } from './services/query-understanding';
export { decomposeQuery } from './services/query-decomposition';
export { buildExecutionPlan, detectCycle, routeSteps } from './services/step-planner';
export type { ToolReroute } from './services/step-planner';
export { evaluateAutonomy, effectiveConfidence } from './services/autonomy-gate';
export { StepExecutor } from './services/step-plan-executor';
export { ReasoningRecorder } from './services/reasoning-recorder';
export { PlanRefiner } from './refinement/plan-refiner';
export { critiqueExecution } from './services/critique-agent';
export { reflectOnExecution } from './services/reflection-agent';
export { synthesizeAnswer } from './services/answer-synthesizer';
export type { SynthesizedAnswer } from './services/answer-synthesizer';

export { SimpleModelRouter } from './services/model-router';
export type { LlmCallOptions, LlmClient, LlmTask, ModelName } from './services/model-router';
export { createRouterFromConfig, OpenAiLlmClient } from './services/llm-client';
export { extractJsonObject, safeParseJson } from './services/safe-parse-json';
export { configureLogger, logger } from './services/logger';

export { CollectingEventSink, WorkflowEventEmitter } from './services/workflow-events';
export type { EventSink, EventSinkLike, WorkflowEvent, WorkflowEventType } from './services/workflow-events';
export { SseEventSink } from './utils/sse';

export { InMemoryMemoryStore } from './memory/InMemoryMemoryStore';
export { RedisMemoryStore, ioredisCommands } from './memory/RedisMemoryStore';
export type { RedisCommands } from './memory/RedisMemoryStore';
export { createMemoryStore } from './memory/createMemoryStore';
export { buildPattern, computeConfidence, patternSimilarity } from './memory/pattern';
export type { ExecutionRecord, MemoryContext, MemoryEntry, MemoryStore } from './memory/MemoryStore';

export { ToolRegistry } from './tools/registry';
export { isEmptyPayload, payloadItems } from './tools/tool-contract';
export type { DomainTool, ToolContext } from './tools/tool-contract';

export { retryWithBackoff, RetryExhaustedError } from './stability/retryWithBackoff';
export { withTimeout } from './stability/withTimeout';

export {
  EngineError,
  PlanningError,
  ReasoningGenerationError,
  RequestValidationError,
  SynthesisError,
  TimeoutError,
  ToolExecutionError,
} from './utils/errors';
export { createErrorResponse, toErrorResponse } from './utils/errorResponse';
export type { ErrorResponse } from './utils/errorResponse';

export type * from './types/core';
export type * from './types/planning';
