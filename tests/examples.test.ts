import { describe, it, expect } from 'vitest';
import { createBranchingPipeline } from '../examples/branching-pipeline.js';
import { createDataPipeline } from '../examples/data-pipeline.js';
import type { Summary } from '../examples/data-pipeline.js';
import { validatePipeline } from '../schema-validator.js';

describe('data pipeline example', () => {
  it('should parse, summarise and store readings', async () => {
    const store = new Map<string, Summary>();

    const report = await createDataPipeline(store).execute({ raw: '3, 4, 8' });

    expect(report.status).toBe('succeeded');
    expect(store.get('latest')).toEqual({ count: 3, mean: 5, max: 8 });
    expect(report.finalContext.savedAs).toBe('latest');
  });

  it('should apply a scale from the initial context', async () => {
    const store = new Map<string, Summary>();

    await createDataPipeline(store, 'scaled').execute({ raw: '1,2', scale: 10 });

    expect(store.get('scaled')).toEqual({ count: 2, mean: 15, max: 20 });
  });

  it('should fail on readings that are not numbers and skip the save', async () => {
    const store = new Map<string, Summary>();

    const report = await createDataPipeline(store).execute({ raw: '1, two' });

    expect(report.nodes.load_data.error?.code).toBe('InvalidOutput');
    expect(report.nodes.process_data.status).toBe('skipped');
    expect(report.nodes.save_results.status).toBe('skipped');
    expect(store.size).toBe(0);
  });

  it('should need only the raw text from the caller', () => {
    const pipeline = createDataPipeline(new Map());

    expect(validatePipeline(pipeline, { contextKeys: ['raw'] })).toEqual({
      compatible: true,
      warnings: [],
      errors: [],
    });
  });
});

describe('branching pipeline example', () => {
  it('should join both branches', async () => {
    const pipeline = createBranchingPipeline('  Hello brave World ');

    const report = await pipeline.execute();

    expect(report.status).toBe('succeeded');
    expect(report.finalContext.report).toBe('3 words, 15 letters');
    expect(report.finalContext.averageWordLength).toBe(5);
    expect(report.executionLog.map((entry) => entry.node)).toEqual([
      'ingest',
      'count_words',
      'count_letters',
      'combine',
    ]);
  });

  it('should draw the shared join under each branch', () => {
    expect(createBranchingPipeline('x').visualize().split('\n').slice(3)).toEqual([
      'ingest',
      '  └─ count_words',
      '    └─ combine',
      '  └─ count_letters',
      '    └─ combine',
    ]);
  });
});
