// Config
export { getConfig, configure, resetConfig, defaults, configFromEnv } from "./config.js";
export type { EngineConfig, ConfigOverrides } from "./config.js";

// Errors
export {
  EngineError,
  ValidationError,
  InvalidTransitionError,
  DelegateError,
  ParseError,
  ConfigError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  parseJsonOrThrow,
  RawTaskSchema,
  RawTaskListSchema,
  PlannerResponseSchema,
  ProjectRequestSchema,
  ShedParamsSchema,
  ConfigOverridesSchema,
} from "./schemas.js";
export type { ProjectRequest, ShedParams } from "./schemas.js";

// Graph
export { TaskGraph, DEFAULT_PHASE } from "./planner/task-graph.js";
export type { TaskInit } from "./planner/task-graph.js";
export { buildTaskGraph, isAcyclic, topologicalOrder } from "./planner/builder.js";
export type { BuildResult } from "./planner/builder.js";
export type {
  Task,
  RawTask,
  TaskResult,
  TaskStatus,
  EngineWarning,
  WarningKind,
  TransitionRecord,
  GraphSnapshot,
  PhaseProgress,
} from "./planner/types.js";
export { TASK_STATUSES } from "./planner/types.js";

// Templates and planning
export {
  PHASE_ORDER,
  SHED_TEMPLATE,
  listTemplates,
  projectTasks,
  shedTasks,
  taskBreakdown,
} from "./planner/templates.js";
export type { TemplateInfo, TaskBreakdown, PhaseGroup } from "./planner/templates.js";
export { Planner } from "./planner/planner.js";
export type { PlannerOptions } from "./planner/planner.js";

// Scheduler
export { Scheduler, runGraph } from "./scheduler/scheduler.js";
export type {
  Delegate,
  DelegateContext,
  SchedulerConfig,
  RunCallbacks,
  RunOptions,
  RunOutcome,
  ReportTask,
  FinalReport,
  StepOptions,
  PassResult,
} from "./scheduler/types.js";
export { UsageTracker, TokenUsageSchema } from "./scheduler/usage.js";
export type { TokenUsage, UsageSummary } from "./scheduler/usage.js";

// Agents
export type { AgentAdapter } from "./agents/adapter.js";
export { AgentRegistry } from "./agents/registry.js";
export type { AgentHealth } from "./agents/registry.js";
export { FunctionAdapter } from "./agents/function-adapter.js";
export type { AgentFunction, AgentFunctionContext, FunctionAdapterOptions } from "./agents/function-adapter.js";
export { registryDelegate } from "./agents/delegate.js";
export { createSimulatedCrew } from "./agents/simulated-crew.js";
export type { SimulatedCrewOptions } from "./agents/simulated-crew.js";

// Activity
export { ActivityRecorder } from "./activity/recorder.js";
export type { ActivityEvent, ActivityType, ActivityListener } from "./activity/recorder.js";

// Orchestrator
export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, PreparedProject, ProjectSource } from "./orchestrator.js";

// Persistence
export { ReportStore } from "./persistence/store.js";
export type { ArchivedReport } from "./persistence/store.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry, backoffDelay } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export { withTimeout, TimeoutExpired } from "./utils/timeout.js";
