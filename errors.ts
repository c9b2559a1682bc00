/**
 * @file errors.ts
 * @description Error taxonomy for pipeline construction and execution.
 */

import type { z } from "zod";

/**
 * Discriminant shared by every pipeline error.
 */
export type PipelineErrorCode =
  | "DuplicateNode" // addNode with a name already registered
  | "UnknownNode" // connect references a name that is not registered
  | "MissingBody" // fromDefinition without a task factory for a node
  | "MissingInput" // required parameter with no fixed input, context entry or default
  | "InvalidInput" // bound inputs rejected by the task's input schema
  | "InvalidOutput" // body returned something other than a mapping, or failed the output schema
  | "BodyError"; // body threw or rejected

/**
 * Codes of failures recorded on a node during a run rather than thrown.
 */
export type NodeErrorCode = Extract<
  PipelineErrorCode,
  "MissingInput" | "InvalidInput" | "InvalidOutput" | "BodyError"
>;

/**
 * Plain representation of an error as it appears in a run report.
 */
export type ErrorInfo = {
  code: PipelineErrorCode;
  message: string;
};

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PipelineError";
  }

  toInfo(): ErrorInfo {
    return { code: this.code, message: this.message };
  }
}

export class DuplicateNodeError extends PipelineError {
  constructor(public readonly nodeName: string) {
    super("DuplicateNode", `Node with name '${nodeName}' already exists`);
    this.name = "DuplicateNodeError";
  }
}

export class UnknownNodeError extends PipelineError {
  constructor(public readonly nodeName: string, role: "Source" | "Target" | "Start") {
    super("UnknownNode", `${role} node '${nodeName}' does not exist`);
    this.name = "UnknownNodeError";
  }
}

export class MissingBodyError extends PipelineError {
  constructor(public readonly nodeName: string) {
    super("MissingBody", `No task body supplied for node '${nodeName}'`);
    this.name = "MissingBodyError";
  }
}

/**
 * Base for failures scoped to a single node during a run.
 */
export class NodeError extends PipelineError {
  declare readonly code: NodeErrorCode;

  constructor(
    code: NodeErrorCode,
    public readonly nodeName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.name = "NodeError";
  }
}

export class MissingInputError extends NodeError {
  constructor(nodeName: string, public readonly parameters: readonly string[]) {
    const list = parameters.map((p) => `'${p}'`).join(", ");
    super(
      "MissingInput",
      nodeName,
      `Node '${nodeName}' is missing required input${parameters.length > 1 ? "s" : ""} ${list}`,
    );
    this.name = "MissingInputError";
  }
}

export class InvalidInputError extends NodeError {
  constructor(nodeName: string, public readonly issues: readonly z.ZodIssue[]) {
    super("InvalidInput", nodeName, `Node '${nodeName}' received invalid input: ${formatIssues(issues)}`);
    this.name = "InvalidInputError";
  }
}

export class InvalidOutputError extends NodeError {
  constructor(nodeName: string, detail: string, public readonly issues: readonly z.ZodIssue[] = []) {
    super("InvalidOutput", nodeName, `Node '${nodeName}' produced invalid output: ${detail}`);
    this.name = "InvalidOutputError";
  }
}

export class BodyError extends NodeError {
  constructor(nodeName: string, cause: unknown) {
    super("BodyError", nodeName, `Node '${nodeName}' failed: ${describeCause(cause)}`, { cause });
    this.name = "BodyError";
  }
}

/**
 * Renders zod issues as `path: message` pairs.
 */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
