/**
 * @file task.ts
 * @description A named unit of work wrapping one body, plus its per-run state.
 */

import type { z } from "zod";
import { Runnable } from "./runnable.js";
import type { RunnableOptions } from "./runnable.js";
import { bindParameters, describeParameters } from "./binding.js";
import type { BindingResult, TaskParameter } from "./binding.js";
import type { ExecutionContext } from "./context.js";
import { BodyError, InvalidInputError, InvalidOutputError, formatIssues } from "./errors.js";
import type { NodeError } from "./errors.js";
import type { LogEvent } from "./events.js";
import { debug } from "./helpers.js";
import { formatZodSchema } from "./schema-validator.js";

/**
 * Lifecycle of a node within one run. `succeeded`, `failed` and `skipped` are terminal.
 */
export type NodeStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

/**
 * Values bound to a body's parameters.
 */
export type TaskInputs = Record<string, unknown>;

/**
 * Named outputs returned by a body and merged into the execution context.
 */
export type TaskOutput = Record<string, unknown>;

export type TaskBody<I> = (inputs: I) => TaskOutput | Promise<TaskOutput>;

/**
 * Configuration for a task node.
 */
export type TaskNodeOptions<I extends TaskInputs> = RunnableOptions & {
  /**
   * Declares the body's parameters. Keys are parameter names; optional or
   * defaulted keys are parameters with a default.
   */
  inputSchema: z.ZodType<I, z.ZodTypeDef, unknown>;
  /**
   * Validates the mapping the body returns.
   */
  outputSchema?: z.ZodType<TaskOutput, z.ZodTypeDef, unknown>;
  body: TaskBody<I>;
  /**
   * Values bound ahead of the execution context, fixed at construction.
   */
  fixedInputs?: Record<string, unknown>;
};

/**
 * A node of a pipeline. The body is invoked with parameters bound from the
 * node's fixed inputs and the run's execution context.
 *
 * @example
 * const scale = new TaskNode({
 *   name: "scale",
 *   inputSchema: z.object({ value: z.number(), factor: z.number().default(2) }),
 *   body: ({ value, factor }) => ({ scaled: value * factor }),
 * });
 */
export class TaskNode<I extends TaskInputs = TaskInputs> extends Runnable<TaskInputs, TaskOutput, LogEvent> {
  readonly inputSchema: z.ZodType<I, z.ZodTypeDef, unknown>;
  readonly outputSchema?: z.ZodType<TaskOutput, z.ZodTypeDef, unknown>;
  readonly fixedInputs: Readonly<Record<string, unknown>>;
  /**
   * Parameters declared by the input schema, in declaration order.
   */
  readonly parameters: readonly TaskParameter[];

  readonly #apply: (inputs: TaskInputs) => Promise<unknown>;

  #status: NodeStatus = "pending";
  #output: TaskOutput = {};
  #error: NodeError | null = null;
  #startedAt: number | null = null;
  #endedAt: number | null = null;

  constructor(options: TaskNodeOptions<I>) {
    super(options);
    const { name, inputSchema, body } = options;
    this.inputSchema = inputSchema;
    this.outputSchema = options.outputSchema;
    this.fixedInputs = { ...options.fixedInputs };
    this.parameters = describeParameters(inputSchema, name);

    this.#apply = async (inputs) => {
      const parsed = await inputSchema.safeParseAsync(inputs);
      if (!parsed.success) {
        throw new InvalidInputError(name, parsed.error.issues);
      }
      try {
        return await body(parsed.data);
      } catch (cause) {
        throw new BodyError(name, cause);
      }
    };
  }

  get status(): NodeStatus {
    return this.#status;
  }

  /**
   * Output of the last successful invocation in the current run.
   */
  get output(): Readonly<TaskOutput> {
    return this.#output;
  }

  get error(): NodeError | null {
    return this.#error;
  }

  get startedAt(): number | null {
    return this.#startedAt;
  }

  get endedAt(): number | null {
    return this.#endedAt;
  }

  /**
   * Milliseconds between start and terminal transition, null if the node never ran.
   */
  get executionTime(): number | null {
    if (this.#startedAt === null || this.#endedAt === null) return null;
    return this.#endedAt - this.#startedAt;
  }

  /**
   * Resolves this node's parameters against the given context.
   */
  bind(context: ExecutionContext): BindingResult {
    return bindParameters(this.parameters, this.fixedInputs, context);
  }

  /**
   * Returns the node to `pending` and clears everything recorded by a previous run.
   */
  reset(): void {
    this.#status = "pending";
    this.#output = {};
    this.#error = null;
    this.#startedAt = null;
    this.#endedAt = null;
  }

  start(at: number): void {
    this.#transition("pending", "running");
    this.#startedAt = at;
  }

  succeed(output: TaskOutput, at: number): void {
    this.#transition("running", "succeeded");
    this.#output = output;
    this.#endedAt = at;
  }

  fail(error: NodeError, at: number): void {
    this.#transition("running", "failed");
    this.#error = error;
    this.#endedAt = at;
  }

  skip(): void {
    this.#transition("pending", "skipped");
  }

  #transition(from: NodeStatus, to: NodeStatus): void {
    if (this.#status !== from) {
      throw new Error(`Node '${this.name}' cannot move from '${this.#status}' to '${to}'`);
    }
    this.#status = to;
  }

  /**
   * Invokes the body with already-bound inputs and returns its validated output.
   * Does not touch the node's run state.
   *
   * @throws InvalidInputError when the inputs fail the input schema
   * @throws BodyError when the body throws or rejects
   * @throws InvalidOutputError when the result is not a mapping or fails the output schema
   */
  async *invoke(input: TaskInputs): AsyncGenerator<LogEvent, TaskOutput, void> {
    const keys = Object.keys(input);
    yield debug(
      `Invoking '${this.name}' with ${keys.length > 0 ? keys.join(", ") : "no inputs"}`,
      { runnableName: this.name, nodeName: this.name },
    );

    const result = await this.#apply(input);

    if (!isPlainObject(result)) {
      throw new InvalidOutputError(this.name, `expected a mapping of named outputs, got ${describeValue(result)}`);
    }

    if (!this.outputSchema) {
      return result;
    }

    const parsed = await this.outputSchema.safeParseAsync(result);
    if (!parsed.success) {
      throw new InvalidOutputError(this.name, formatIssues(parsed.error.issues), parsed.error.issues);
    }
    return parsed.data;
  }

  protected helpSections(): Array<{ title: string; lines: string[] }> {
    const inputs = this.parameters.map((parameter) => {
      let line = `${parameter.name}: ${formatZodSchema(parameter.schema)}`;
      if (Object.hasOwn(this.fixedInputs, parameter.name)) {
        line += ` = ${JSON.stringify(this.fixedInputs[parameter.name])} (fixed)`;
      }
      return line;
    });

    return [
      { title: "Inputs", lines: inputs.length > 0 ? inputs : ["No parameters"] },
      {
        title: "Outputs",
        lines: [this.outputSchema ? formatZodSchema(this.outputSchema) : "No output schema defined (returns any mapping)"],
      },
    ];
  }
}

/**
 * Creates a task node.
 */
export function task<I extends TaskInputs>(options: TaskNodeOptions<I>): TaskNode<I> {
  return new TaskNode(options);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  if (typeof value === "object") return `an instance of ${value.constructor?.name ?? "an unknown class"}`;
  return typeof value;
}
