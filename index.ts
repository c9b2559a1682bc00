/**
 * @file index.ts
 * @description Entry point for the task-pipeline package.
 */

// Core Runnable contract
export {Runnable} from "./runnable.js";
export type {RunnableOptions} from "./runnable.js";

// Task nodes and parameter binding
export {TaskNode, task} from "./task.js";
export type {NodeStatus, TaskBody, TaskInputs, TaskNodeOptions, TaskOutput} from "./task.js";
export {bindParameters, describeParameters} from "./binding.js";
export type {BindingResult, TaskParameter} from "./binding.js";
export {ExecutionContext} from "./context.js";

// Pipelines
export {Pipeline} from "./graph.js";
export type {ExecuteOptions, GraphEdge, PipelineOptions, TaskFactory} from "./graph.js";
export {PipelineBuilder, createLinearPipeline} from "./graphBuilder.js";
export {Scheduler} from "./scheduler.js";
export type {
  ExecutionLogEntry,
  NodeReport,
  PipelineStructure,
  RunReport,
  RunStatus,
  SchedulerOptions,
} from "./scheduler.js";

// Reporting and structural export
export {
  createConsoleListener,
  eventLevel,
  exportPipeline,
  formatEvent,
  formatSummary,
  loadDefinition,
  parsePipelineDefinition,
  pipelineDefinitionSchema,
  saveDefinition,
  serializeDefinition,
  visualizePipeline,
} from "./reporter.js";
export type {ConsoleLike, ConsoleListenerOptions, NodeDefinition, PipelineDefinition} from "./reporter.js";

// Static validation
export {
  extractSchemaInfo,
  formatZodSchema,
  validatePipeline,
  validateZodTypeCompatibility,
} from "./schema-validator.js";
export type {PipelineValidationOptions, SchemaInfo, ValidationResult} from "./schema-validator.js";

// Errors
export {
  BodyError,
  DuplicateNodeError,
  InvalidInputError,
  InvalidOutputError,
  MissingBodyError,
  MissingInputError,
  NodeError,
  PipelineError,
  UnknownNodeError,
  formatIssues,
} from "./errors.js";
export type {ErrorInfo, NodeErrorCode, PipelineErrorCode} from "./errors.js";

// Events and helpers
export {ErrorEvent, LOG_LEVELS, LogEvent, NodeEvent, isLevelEnabled} from "./events.js";
export type {BaseRunnableEvent, EventMetadata, LogLevel, PipelineEvent} from "./events.js";
export {createPerformanceTimer, debug, error, info, PerformanceTimer, warning} from "./helpers.js";
export type {Clock, PerformanceStats} from "./helpers.js";

// Export zod for schema definitions
export {z} from "zod";
