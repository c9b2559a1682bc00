/**
 * @file graph.ts
 * @description A pipeline of named task nodes joined by directed edges.
 */

import { Runnable } from "./runnable.js";
import type { RunnableOptions } from "./runnable.js";
import { PipelineBuilder } from "./graphBuilder.js";
import { ExecutionContext } from "./context.js";
import { DuplicateNodeError, MissingBodyError, UnknownNodeError } from "./errors.js";
import type { PipelineEvent } from "./events.js";
import type { Clock } from "./helpers.js";
import { Scheduler } from "./scheduler.js";
import type { PipelineStructure, RunReport } from "./scheduler.js";
import { exportPipeline, visualizePipeline } from "./reporter.js";
import type { NodeDefinition, PipelineDefinition } from "./reporter.js";
import type { TaskInputs, TaskNode } from "./task.js";

/**
 * Edge connecting two nodes of a pipeline
 */
export type GraphEdge = {
    from: string;
    to: string;
};

/**
 * Configuration options for a Pipeline
 */
export type PipelineOptions = RunnableOptions & {
    /**
     * Whether a failed node halts the run. Can be overridden per run.
     */
    stopOnError?: boolean;
    /**
     * Source of millisecond timestamps for timings
     */
    clock?: Clock;
};

/**
 * Per-run options accepted by {@link Pipeline.execute}
 */
export type ExecuteOptions = {
    stopOnError?: boolean;
    /**
     * Receives every event yielded during the run, in order
     */
    onEvent?: (event: PipelineEvent) => void;
};

/**
 * Builds the task node for an exported node definition.
 */
export type TaskFactory = (definition: NodeDefinition) => TaskNode;

/**
 * A graph of task nodes. Running it walks the graph from the start nodes and
 * binds each node's parameters from the outputs of the nodes that ran before it.
 *
 * Nodes run at most once per run, one at a time. A node with several
 * predecessors runs on the first arrival and does not wait for the others;
 * merge converging values inside a single body when a join is needed.
 *
 * @example
 * const pipeline = new Pipeline({ name: "numbers" })
 *     .addNode(load, true)
 *     .addNode(double)
 *     .connect("load", "double");
 * const report = await pipeline.execute({ path: "input.csv" });
 */
export class Pipeline
    extends Runnable<Record<string, unknown>, RunReport, PipelineEvent, ExecuteOptions>
    implements PipelineStructure
{
    /**
     * Creates a builder for constructing pipelines fluently.
     */
    static builder(options: PipelineOptions): PipelineBuilder {
        return new PipelineBuilder(options);
    }

    /**
     * Rebuilds a pipeline from an exported definition. Bodies are not part of
     * a definition, so the caller supplies a factory for every node.
     *
     * @throws MissingBodyError when a node has no factory
     */
    static fromDefinition(
        definition: PipelineDefinition,
        factories: Readonly<Record<string, TaskFactory>>,
        options: Omit<PipelineOptions, "name" | "description"> = {}
    ): Pipeline {
        const pipeline = new Pipeline({
            ...options,
            name: definition.pipelineName,
            description: definition.description,
        });

        for (const nodeDefinition of definition.nodes) {
            if (!Object.hasOwn(factories, nodeDefinition.name)) {
                throw new MissingBodyError(nodeDefinition.name);
            }
            const node = factories[nodeDefinition.name](nodeDefinition);
            if (node.name !== nodeDefinition.name) {
                throw new Error(
                    `Factory for '${nodeDefinition.name}' returned a node named '${node.name}'`
                );
            }
            pipeline.addNode(node);
        }
        for (const name of definition.startNodes) {
            pipeline.markStart(name);
        }
        for (const edge of definition.edges) {
            pipeline.connect(edge.from, edge.to);
        }
        return pipeline;
    }

    #nodes: Map<string, TaskNode> = new Map();

    /**
     * Successor names per node, in insertion order
     */
    #edges: Map<string, string[]> = new Map();

    #startNodes: string[] = [];

    #options: Required<Pick<PipelineOptions, "stopOnError" | "clock">>;

    #running = false;

    constructor(options: PipelineOptions) {
        super(options);
        this.#options = {
            stopOnError: options.stopOnError ?? true,
            clock: options.clock ?? Date.now,
        };
    }

    get nodes(): ReadonlyMap<string, TaskNode> {
        return this.#nodes;
    }

    get startNodes(): readonly string[] {
        return this.#startNodes;
    }

    /**
     * Adds a node to the pipeline.
     * @param isStart - Append the node to the start nodes
     * @throws DuplicateNodeError when the name is taken
     */
    addNode<I extends TaskInputs>(node: TaskNode<I>, isStart = false): this {
        if (this.#nodes.has(node.name)) {
            throw new DuplicateNodeError(node.name);
        }

        this.#nodes.set(node.name, node);
        if (isStart) {
            this.#startNodes.push(node.name);
        }
        return this;
    }

    /**
     * Marks an existing node as a start node. Marking it twice has no effect.
     * @throws UnknownNodeError when the node does not exist
     */
    markStart(name: string): this {
        if (!this.#nodes.has(name)) {
            throw new UnknownNodeError(name, "Start");
        }
        if (!this.#startNodes.includes(name)) {
            this.#startNodes.push(name);
        }
        return this;
    }

    /**
     * Adds a directed edge. Connecting the same pair twice adds the edge twice.
     * @throws UnknownNodeError when either node does not exist; nothing is changed
     */
    connect(fromName: string, toName: string): this {
        if (!this.#nodes.has(fromName)) {
            throw new UnknownNodeError(fromName, "Source");
        }
        if (!this.#nodes.has(toName)) {
            throw new UnknownNodeError(toName, "Target");
        }

        const successors = this.#edges.get(fromName);
        if (successors) {
            successors.push(toName);
        } else {
            this.#edges.set(fromName, [toName]);
        }
        return this;
    }

    getNode(name: string): TaskNode | undefined {
        return this.#nodes.get(name);
    }

    successors(name: string): readonly string[] {
        return this.#edges.get(name) ?? [];
    }

    /**
     * All edges, grouped by source in node order.
     */
    edges(): GraphEdge[] {
        return exportPipeline(this).edges;
    }

    /**
     * Runs the pipeline, yielding events as it goes, and returns the run report.
     * Node failures are recorded in the report rather than thrown.
     *
     * @throws Error when another run of this pipeline is still in progress
     */
    async *invoke(
        initialContext: Record<string, unknown> = {},
        options: ExecuteOptions = {}
    ): AsyncGenerator<PipelineEvent, RunReport, void> {
        if (this.#running) {
            throw new Error(`Pipeline '${this.name}' is already running`);
        }
        this.#running = true;

        try {
            const scheduler = new Scheduler(this, {
                stopOnError: options.stopOnError ?? this.#options.stopOnError,
                clock: this.#options.clock,
            });
            return yield* scheduler.run(new ExecutionContext(initialContext));
        } finally {
            this.#running = false;
        }
    }

    /**
     * Runs the pipeline and returns the run report, forwarding events to `options.onEvent`.
     */
    execute(initialContext: Record<string, unknown> = {}, options: ExecuteOptions = {}): Promise<RunReport> {
        return this.run(initialContext, options, options.onEvent);
    }

    /**
     * Text tree of the pipeline, one line per node per incoming path.
     */
    visualize(): string {
        return visualizePipeline(this);
    }

    /**
     * Structural description of the pipeline. Bodies and schemas are not included.
     */
    export(): PipelineDefinition {
        return exportPipeline(this);
    }

    protected helpSections(): Array<{ title: string; lines: string[] }> {
        const nodes = Array.from(this.#nodes.values()).map((node) =>
            node.description ? `${node.name}: ${node.description}` : node.name
        );
        return [
            { title: "Nodes", lines: nodes.length > 0 ? nodes : ["No nodes"] },
            {
                title: "Start nodes",
                lines: [this.#startNodes.length > 0 ? this.#startNodes.join(", ") : "None"],
            },
        ];
    }
}
