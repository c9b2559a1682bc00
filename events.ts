/**
 * @file events.ts
 * @description Event types yielded by a Runnable's `invoke` generator while a
 *              task or a pipeline runs.
 */

import type { NodeStatus } from "./task.js";

/**
 * Severity of a log event, lowest first.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Base properties for all events yielded by a Runnable.
 */
export type BaseRunnableEvent = {
    /**
     * The specific type of the event (e.g., 'log', 'node').
     */
    type: string;
    /**
     * The name of the Runnable instance that yielded this event.
     */
    runnableName?: string;
    /**
     * The pipeline node the event belongs to, when emitted during a node's execution.
     */
    nodeName?: string;
    /**
     * Unix timestamp (milliseconds) of when the event occurred.
     */
    timestamp: number;
};

/**
 * Metadata accepted by every event constructor.
 */
export type EventMetadata = Partial<Pick<BaseRunnableEvent, "runnableName" | "nodeName">>;

/**
 * Union of every event a pipeline run can yield.
 */
export type PipelineEvent = LogEvent | ErrorEvent | NodeEvent;

// Base class providing timestamp handling and metadata
abstract class BaseEvent implements BaseRunnableEvent {
    abstract readonly type: string;
    /** Unix timestamp (milliseconds) of when the event occurred */
    timestamp: number;
    runnableName?: string;
    nodeName?: string;

    constructor(metadata: EventMetadata = {}) {
        this.timestamp = Date.now();
        this.runnableName = metadata.runnableName;
        this.nodeName = metadata.nodeName;
    }
}

/**
 * LogEvent class representing a log message.
 */
export class LogEvent extends BaseEvent {
    readonly type = "log";
    /** The severity level of the log */
    level: LogLevel;
    /** The log message */
    message: string;
    /** Structured data attached to the message */
    details?: Record<string, unknown>;

    constructor(
        level: LogLevel,
        message: string,
        metadata: EventMetadata & { details?: Record<string, unknown> } = {}
    ) {
        super(metadata);
        this.level = level;
        this.message = message;
        this.details = metadata.details;
    }
}

/**
 * ErrorEvent represents a failure recorded during a run.
 */
export class ErrorEvent extends BaseEvent {
    readonly type = "error_event";
    /** Details of the error */
    error: {
        name: string;
        code?: string;
        message: string;
        stack?: string;
    };

    /**
     * @param err The error object, or a message
     */
    constructor(err: unknown, metadata: EventMetadata = {}) {
        super(metadata);
        if (err instanceof Error) {
            const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
            this.error = { name: err.name, code, message: err.message, stack: err.stack };
        } else {
            this.error = { name: "Error", message: String(err) };
        }
    }
}

/**
 * NodeEvent marks a node's status transition within a pipeline run.
 */
export class NodeEvent extends BaseEvent {
    readonly type = "node";
    status: NodeStatus;
    /** Milliseconds spent in the node, set on terminal transitions */
    executionTime?: number;

    constructor(
        nodeName: string,
        status: NodeStatus,
        metadata: EventMetadata & { executionTime?: number } = {}
    ) {
        super({ ...metadata, nodeName });
        this.status = status;
        this.executionTime = metadata.executionTime;
    }
}

/**
 * Returns true when `level` is at or above `minimum`.
 */
export function isLevelEnabled(level: LogLevel, minimum: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimum);
}
