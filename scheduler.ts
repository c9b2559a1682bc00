/**
 * @file scheduler.ts
 * @description Walks a pipeline from its start nodes, binding parameters,
 *              invoking nodes and threading their outputs through the execution context.
 */

import type { ExecutionContext } from "./context.js";
import { BodyError, MissingInputError, NodeError } from "./errors.js";
import type { ErrorInfo } from "./errors.js";
import { NodeEvent } from "./events.js";
import type { PipelineEvent } from "./events.js";
import { createPerformanceTimer, error, info, warning } from "./helpers.js";
import type { Clock, PerformanceTimer } from "./helpers.js";
import type { NodeStatus, TaskNode, TaskOutput } from "./task.js";

/**
 * The read-only view of a pipeline the scheduler and reporter work from.
 */
export interface PipelineStructure {
  readonly name: string;
  readonly description: string;
  /** Nodes in insertion order */
  readonly nodes: ReadonlyMap<string, TaskNode>;
  /** Entry points in the order they were marked */
  readonly startNodes: readonly string[];
  /** Successors of a node in edge-insertion order */
  successors(name: string): readonly string[];
}

export type RunStatus = "succeeded" | "failed";

export type NodeReport = {
  status: NodeStatus;
  /** Milliseconds, null when the node never ran */
  executionTime: number | null;
  error: ErrorInfo | null;
};

export type ExecutionLogEntry = {
  node: string;
  startedAt: number;
  endedAt: number;
  status: NodeStatus;
};

/**
 * Outcome of one pipeline run.
 */
export type RunReport = {
  status: RunStatus;
  /** Milliseconds */
  totalTime: number;
  nodes: Record<string, NodeReport>;
  finalContext: Record<string, unknown>;
  /** Nodes in the order they were processed */
  executionLog: ExecutionLogEntry[];
};

export type SchedulerOptions = {
  stopOnError: boolean;
  clock: Clock;
};

/**
 * Single-threaded traversal with a FIFO work queue. A node runs at most once
 * per run, on the first arrival; later arrivals (fan-in, cycles) are ignored.
 */
export class Scheduler {
  readonly #pipeline: PipelineStructure;
  readonly #options: SchedulerOptions;

  constructor(pipeline: PipelineStructure, options: SchedulerOptions) {
    this.#pipeline = pipeline;
    this.#options = options;
  }

  /**
   * Runs every reachable node once and returns the run report. Node failures
   * are recorded on the nodes and in the report, never thrown.
   */
  async *run(context: ExecutionContext): AsyncGenerator<PipelineEvent, RunReport, void> {
    const pipeline = this.#pipeline;
    const { stopOnError, clock } = this.#options;
    const meta = { runnableName: pipeline.name };

    const runTimer = createPerformanceTimer(pipeline.name, clock);
    const nodeTimer = createPerformanceTimer(`${pipeline.name} nodes`, clock);
    runTimer.start();

    for (const node of pipeline.nodes.values()) {
      node.reset();
    }

    yield info(`Starting pipeline: ${pipeline.name}`, {
      ...meta,
      details: { startNodes: [...pipeline.startNodes], stopOnError },
    });
    if (pipeline.startNodes.length === 0) {
      yield warning(`Pipeline '${pipeline.name}' has no start nodes`, meta);
    }

    const executionLog: ExecutionLogEntry[] = [];
    const queue = [...pipeline.startNodes];
    const visited = new Set<string>();
    let haltedBy: string | null = null;

    while (queue.length > 0 && haltedBy === null) {
      const name = queue.shift();
      if (name === undefined || visited.has(name)) continue;
      visited.add(name);

      const node = this.#node(name);
      const entry = yield* this.#runNode(node, context, nodeTimer);
      executionLog.push(entry);

      for (const successor of pipeline.successors(name)) {
        if (!visited.has(successor)) queue.push(successor);
      }

      if (node.status === "failed" && stopOnError) {
        haltedBy = name;
      }
    }

    const pending = Array.from(pipeline.nodes.values()).filter((node) => node.status === "pending");
    if (haltedBy !== null) {
      yield warning(`Halting after failure of '${haltedBy}'; ${pending.length} node(s) skipped`, meta);
    }
    for (const node of pending) {
      node.skip();
      yield new NodeEvent(node.name, "skipped", meta);
    }

    const nodes: Record<string, NodeReport> = {};
    let failed = false;
    for (const [name, node] of pipeline.nodes) {
      if (node.status === "failed") failed = true;
      nodes[name] = {
        status: node.status,
        executionTime: node.executionTime,
        error: node.error ? node.error.toInfo() : null,
      };
    }
    const status: RunStatus = failed ? "failed" : "succeeded";
    const totalTime = runTimer.stop();

    yield nodeTimer.performanceStats(meta);
    yield info(`Pipeline ${status}: ${pipeline.name}`, { ...meta, details: { totalTime } });

    return {
      status,
      totalTime,
      nodes,
      finalContext: context.snapshot(),
      executionLog,
    };
  }

  async *#runNode(
    node: TaskNode,
    context: ExecutionContext,
    timer: PerformanceTimer,
  ): AsyncGenerator<PipelineEvent, ExecutionLogEntry, void> {
    const meta = { runnableName: this.#pipeline.name, nodeName: node.name };
    const startedAt = timer.start();
    node.start(startedAt);
    yield new NodeEvent(node.name, "running", meta);

    let failure: NodeError | null = null;
    let output: TaskOutput = {};

    const binding = node.bind(context);
    if (!binding.ok) {
      failure = new MissingInputError(node.name, binding.missing);
    } else {
      try {
        const iterator = node.invoke(binding.inputs);
        let result = await iterator.next();
        while (!result.done) {
          result.value.nodeName = node.name;
          yield result.value;
          result = await iterator.next();
        }
        output = result.value;
      } catch (err) {
        failure = err instanceof NodeError ? err : new BodyError(node.name, err);
      }
    }

    const endedAt = startedAt + timer.stop();
    if (failure) {
      node.fail(failure, endedAt);
      yield error(failure, meta);
    } else {
      context.merge(output);
      node.succeed(output, endedAt);
    }
    yield new NodeEvent(node.name, node.status, { ...meta, executionTime: endedAt - startedAt });

    return { node: node.name, startedAt, endedAt, status: node.status };
  }

  #node(name: string): TaskNode {
    const node = this.#pipeline.nodes.get(name);
    if (!node) {
      throw new Error(`Node '${name}' is referenced by the pipeline but not registered`);
    }
    return node;
  }
}
