import {Pipeline} from "./graph.js";
import type {PipelineOptions} from "./graph.js";
import type {TaskInputs, TaskNode} from "./task.js";

/**
 * Builder class for constructing Pipeline instances with a fluent API.
 */
export class PipelineBuilder {
  /**
   * The pipeline being built
   */
  readonly #pipeline: Pipeline;

  constructor(options: PipelineOptions) {
    this.#pipeline = new Pipeline(options);
  }

  /**
   * Adds a node to the pipeline.
   */
  node<I extends TaskInputs>(node: TaskNode<I>): PipelineBuilder {
    this.#pipeline.addNode(node);
    return this;
  }

  /**
   * Adds a node and marks it as a start node.
   */
  start<I extends TaskInputs>(node: TaskNode<I>): PipelineBuilder {
    this.#pipeline.addNode(node, true);
    return this;
  }

  /**
   * Connects two nodes.
   */
  connect(from: string, to: string): PipelineBuilder {
    this.#pipeline.connect(from, to);
    return this;
  }

  /**
   * Connects each consecutive pair of the given nodes.
   */
  chain(...names: string[]): PipelineBuilder {
    for (let i = 1; i < names.length; i++) {
      this.#pipeline.connect(names[i - 1], names[i]);
    }
    return this;
  }

  /**
   * Returns the configured pipeline.
   */
  build(): Pipeline {
    return this.#pipeline;
  }
}

/**
 * Creates a strictly linear pipeline: the first task is the only start node
 * and each task is connected to the next one.
 *
 * @example
 * const pipeline = createLinearPipeline("etl", [load, transform, save], "Load, transform, save");
 */
export function createLinearPipeline(
  name: string,
  tasks: readonly TaskNode[],
  description = "",
): Pipeline {
  const builder = new PipelineBuilder({name, description});

  tasks.forEach((task, index) => {
    if (index === 0) {
      builder.start(task);
    } else {
      builder.node(task).connect(tasks[index - 1].name, task.name);
    }
  });

  return builder.build();
}
