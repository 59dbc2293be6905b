export * from "./errors.js";
export * from "./types/values.js";
export * from "./types/tasks.js";
export * from "./types/handlers.js";
export { ExpressionEngine, type ConditionEngine } from "./expressions/engine.js";
export { WorkflowContext, linkedController, type Capabilities, type ContextOptions, type ExpressionScope } from "./orchestrator/context.js";
export { TaskExecutor, type ExecutorOptions } from "./orchestrator/executor.js";
export { TaskPosition } from "./orchestrator/position.js";
export { combineObservers, type ExecutionObserver, type TaskEvent } from "./orchestrator/observer.js";
export { TraceRecorder, canTransition, isTerminal, type TaskRecord, type TaskStatus } from "./orchestrator/trace.js";
export { ConsoleObserver, type ConsoleObserverOptions } from "./orchestrator/log.js";
export { runWorkflow, type RunOptions, type RunResult } from "./orchestrator/run.js";
export { compileWorkflow, compileTask, loadWorkflow, readWorkflowFile } from "./orchestrator/compiler.js";
export { toMilliseconds, sleep } from "./orchestrator/duration.js";
export { retryDelay } from "./orchestrator/try.js";
export { builtinHandlers } from "./tasks/registry.js";
export { EventBus, eventToValue, type WorkflowEvent } from "./capabilities/events.js";
export { createFetchClient, type HttpClient, type HttpRequest, type HttpResponse } from "./capabilities/http.js";
export { createShellRunner, type ProcessRunner, type ProcessRequest, type ProcessResult } from "./capabilities/process.js";
export type { FunctionCall, FunctionRegistry, WorkflowFunction } from "./capabilities/functions.js";
export { loadConfig, type EngineConfig } from "./config.js";
