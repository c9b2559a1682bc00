/**
 * @file runnable.ts
 * @description Defines the core Runnable base class.
 */

/**
 * Configuration options for a Runnable instance.
 */
export type RunnableOptions = {
    /**
     * A name for this runnable instance, used for logging and identification.
     */
    name: string;
    /**
     * An optional description of what this runnable does.
     */
    description?: string;
};

/**
 * Represents an operation that can be executed, yielding intermediate events
 * and ultimately returning a final output. Task nodes and pipelines are both Runnables.
 *
 * @template InputType - The type of the input data for the `invoke` method.
 * @template OutputType - The type of the final result returned by the `invoke` generator.
 * @template YieldType - The type of events yielded by the `invoke` generator during execution.
 * @template ContextType - The type of the optional context object passed to `invoke`.
 */
export abstract class Runnable<InputType, OutputType, YieldType, ContextType = undefined> {
    /**
     * Name of this runnable, unique within its pipeline for task nodes.
     */
    readonly name: string;

    /**
     * Description of what this runnable does. Documentation only.
     */
    readonly description: string;

    constructor(options: RunnableOptions) {
        this.name = options.name;
        this.description = options.description ?? "";
    }

    /**
     * Returns a formatted help message showing the runnable's configuration.
     */
    help(): string {
        const lines: string[] = [];

        lines.push("═".repeat(60));
        lines.push(`  ${this.name}`);
        lines.push("═".repeat(60));

        if (this.description) {
            lines.push("");
            lines.push("Description:");
            lines.push(`  ${this.description}`);
        }

        for (const section of this.helpSections()) {
            lines.push("");
            lines.push(`${section.title}:`);
            for (const line of section.lines) {
                lines.push(`  ${line}`);
            }
        }

        lines.push("");
        lines.push("═".repeat(60));

        return lines.join("\n");
    }

    /**
     * Extra sections appended to {@link help} by subclasses.
     */
    protected helpSections(): Array<{ title: string; lines: string[] }> {
        return [];
    }

    /**
     * Executes the runnable's logic as an async generator that yields events
     * during execution and returns the final output.
     *
     * @example
     * class Greeter extends Runnable<string, string, LogEvent> {
     *   async *invoke(input: string) {
     *     yield info(`Greeting ${input}`, { runnableName: this.name });
     *     return `Hello, ${input}`;
     *   }
     * }
     */
    abstract invoke(input: InputType, context?: ContextType): AsyncGenerator<YieldType, OutputType, void>;

    /**
     * Convenience helper that executes {@link invoke} and returns only the final
     * result. Yielded events are handed to `onEvent` when given and otherwise discarded.
     * If `onEvent` throws, the generator is closed (running its `finally` blocks)
     * and the error is rethrown.
     */
    async run(
        input: InputType,
        context?: ContextType,
        onEvent?: (event: YieldType) => void,
    ): Promise<OutputType> {
        const state: { result?: { value: OutputType } } = {};
        const events = (async function* (source: AsyncGenerator<YieldType, OutputType, void>) {
            state.result = { value: yield* source };
        })(this.invoke(input, context));

        // Leaving the loop early calls `return()`, which `yield*` forwards to the source
        for await (const event of events) {
            onEvent?.(event);
        }

        if (!state.result) {
            throw new Error(`Runnable '${this.name}' finished without a result`);
        }
        return state.result.value;
    }
}
