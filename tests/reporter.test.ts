import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { Pipeline } from '../graph.js';
import { task } from '../task.js';
import { ErrorEvent, LogEvent, NodeEvent } from '../events.js';
import type { RunReport } from '../scheduler.js';
import {
  createConsoleListener,
  formatEvent,
  formatSummary,
  loadDefinition,
  parsePipelineDefinition,
  pipelineDefinitionSchema,
  saveDefinition,
  serializeDefinition,
} from '../reporter.js';

const noop = (name: string, fixedInputs: Record<string, unknown> = {}, description = '') =>
  task({ name, description, fixedInputs, inputSchema: z.object({}), body: () => ({}) });

describe('visualize', () => {
  it('should render fan-out children on their own lines one level deeper', () => {
    const pipeline = new Pipeline({ name: 'viz', description: 'Fan-out' })
      .addNode(noop('A'), true)
      .addNode(noop('B'))
      .addNode(noop('C'))
      .connect('A', 'B')
      .connect('A', 'C');

    expect(pipeline.visualize()).toBe(
      ['Pipeline: viz', 'Description: Fan-out', 'Flow:', 'A', '  └─ B', '  └─ C'].join('\n'),
    );
  });

  it('should repeat a shared successor once per incoming path', () => {
    const pipeline = new Pipeline({ name: 'diamond' })
      .addNode(noop('A'), true)
      .addNode(noop('B'))
      .addNode(noop('C'))
      .addNode(noop('D'))
      .connect('A', 'B')
      .connect('A', 'C')
      .connect('B', 'D')
      .connect('C', 'D');

    expect(pipeline.visualize().split('\n').slice(2)).toEqual(['A', '  └─ B', '    └─ D', '  └─ C', '    └─ D']);
  });

  it('should mark a cycle instead of expanding it', () => {
    const pipeline = new Pipeline({ name: 'loop' })
      .addNode(noop('A'), true)
      .addNode(noop('B'))
      .connect('A', 'B')
      .connect('B', 'A');

    expect(pipeline.visualize().split('\n').slice(2)).toEqual(['A', '  └─ B', '    └─ A (cycle)']);
  });

  it('should say when there are no start nodes', () => {
    const pipeline = new Pipeline({ name: 'none' }).addNode(noop('A'));

    expect(pipeline.visualize()).toBe('Pipeline: none\nFlow:\n  (no start nodes)');
  });
});

describe('export', () => {
  const pipeline = () =>
    new Pipeline({ name: 'etl', description: 'Extract and load' })
      .addNode(noop('extract', { source: 'inbox' }, 'Read files'), true)
      .addNode(noop('load', { retries: 2 }))
      .connect('extract', 'load');

  it('should describe structure without bodies', () => {
    expect(pipeline().export()).toEqual({
      pipelineName: 'etl',
      description: 'Extract and load',
      nodes: [
        { name: 'extract', description: 'Read files', fixedInputs: { source: 'inbox' } },
        { name: 'load', description: '', fixedInputs: { retries: 2 } },
      ],
      edges: [{ from: 'extract', to: 'load' }],
      startNodes: ['extract'],
    });
  });

  it('should survive serialization and reparsing', () => {
    const exported = pipeline().export();

    expect(parsePipelineDefinition(serializeDefinition(exported))).toEqual(exported);
  });

  it('should fill defaults when parsing a sparse document', () => {
    expect(parsePipelineDefinition('{"pipelineName":"p","nodes":[{"name":"A"}]}')).toEqual({
      pipelineName: 'p',
      description: '',
      nodes: [{ name: 'A', description: '', fixedInputs: {} }],
      edges: [],
      startNodes: [],
    });
  });

  it('should reject documents with duplicate or unknown names', () => {
    const result = pipelineDefinitionSchema.safeParse({
      pipelineName: 'bad',
      nodes: [{ name: 'A' }, { name: 'A' }],
      edges: [{ from: 'A', to: 'B' }],
      startNodes: ['Q'],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual([
        "Duplicate node name 'A'",
        "Unknown node 'B'",
        "Unknown node 'Q'",
      ]);
    }
    expect(() => parsePipelineDefinition('{not json')).toThrow(SyntaxError);
  });

  describe('on disk', () => {
    let dir: string | undefined;

    afterEach(async () => {
      if (dir) await rm(dir, { recursive: true, force: true });
      dir = undefined;
    });

    it('should save and load a definition', async () => {
      dir = await mkdtemp(join(tmpdir(), 'pipeline-'));
      const file = join(dir, 'etl.json');
      const source = pipeline();

      await saveDefinition(source, file);

      const text = await readFile(file, 'utf8');
      expect(text.endsWith('}\n')).toBe(true);
      expect(await loadDefinition(file)).toEqual(source.export());
    });
  });
});

describe('formatSummary', () => {
  it('should list every node with its status, time and error', () => {
    const report: RunReport = {
      status: 'failed',
      totalTime: 12,
      nodes: {
        A: { status: 'succeeded', executionTime: 5, error: null },
        B: { status: 'failed', executionTime: 3, error: { code: 'BodyError', message: "Node 'B' failed: bad" } },
        C: { status: 'skipped', executionTime: null, error: null },
      },
      finalContext: {},
      executionLog: [],
    };
    const rule = '='.repeat(60);

    expect(formatSummary(report, 'demo')).toBe(
      [
        rule,
        'Pipeline Execution Summary',
        rule,
        'Pipeline: demo',
        'Status: failed',
        'Total Time: 12ms',
        '',
        'Node Results:',
        '  ✓ A: succeeded (5ms)',
        '  ✗ B: failed (3ms)',
        "    Error: [BodyError] Node 'B' failed: bad",
        '  ○ C: skipped (N/A)',
        rule,
      ].join('\n'),
    );
  });
});

describe('formatEvent', () => {
  const meta = { runnableName: 'p' };

  it('should render each kind of event on one line', () => {
    expect(formatEvent(new LogEvent('info', 'Starting', meta))).toBe('[p] Starting');
    expect(formatEvent(new ErrorEvent(new Error('bad'), { ...meta, nodeName: 'A' }))).toBe('[p] ✗ A: bad');
    expect(formatEvent(new NodeEvent('A', 'running', meta))).toBe('[p] ▶ Executing: A');
    expect(formatEvent(new NodeEvent('A', 'succeeded', { ...meta, executionTime: 4 }))).toBe('[p] ✓ A completed in 4ms');
    expect(formatEvent(new NodeEvent('A', 'failed', { ...meta, executionTime: 3 }))).toBe('[p] ✗ A failed after 3ms');
    expect(formatEvent(new NodeEvent('A', 'skipped'))).toBe('○ A skipped');
  });
});

describe('createConsoleListener', () => {
  const fakeLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

  it('should route events by level and drop those below the minimum', () => {
    const logger = fakeLogger();
    const listener = createConsoleListener({ logger });

    listener(new LogEvent('debug', 'hidden'));
    listener(new LogEvent('warn', 'careful'));
    listener(new ErrorEvent(new Error('bad')));
    listener(new NodeEvent('A', 'running'));

    expect(logger.debug).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('careful');
    expect(logger.error).toHaveBeenCalledWith('✗ bad');
    expect(logger.info).toHaveBeenCalledWith('▶ Executing: A');
  });

  it('should print a run through the listener', async () => {
    const logger = fakeLogger();
    const pipeline = new Pipeline({ name: 'quiet' }).addNode(noop('A'), true);

    await pipeline.execute({}, { onEvent: createConsoleListener({ logger, level: 'debug' }) });

    expect(logger.info.mock.calls.map((call) => call[0])).toEqual([
      '[quiet] Starting pipeline: quiet',
      '[quiet] ▶ Executing: A',
      expect.stringMatching(/^\[quiet\] ✓ A completed in \d+ms$/),
      '[quiet] Pipeline succeeded: quiet',
    ]);
    expect(logger.debug.mock.calls[0]).toEqual(["[A] Invoking 'A' with no inputs"]);
  });
});
