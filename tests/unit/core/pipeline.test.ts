/**
 * Pipeline Tests
 */

import { describe, expect, test } from 'vitest';
import { ConfigurationError, DuplicateTaskIdError, TaskChainTypeMismatchError } from '@/core/errors';
import { Pipeline } from '@/core/pipeline';
import { Task, type TaskIOType, type TaskOptions } from '@/core/tasks/task';
import { Doc } from '@/data/doc';
import { createDocs } from '../../helpers/fixtures';

/** Records the order it ran in and tags every document it sees */
class TagTask extends Task {
  constructor(
    options: TaskOptions & { id: string },
    private readonly log: string[] = [],
    private readonly io: { input?: TaskIOType; output?: TaskIOType } = {}
  ) {
    super(options, 'tag');
  }

  override get inputType(): TaskIOType {
    return this.io.input ?? super.inputType;
  }

  override get outputType(): TaskIOType {
    return this.io.output ?? super.outputType;
  }

  protected override async process(docs: Doc[]): Promise<Doc[]> {
    this.log.push(this.id);
    for (const doc of docs) {
      doc.results[this.id] = { seen: Object.keys(doc.results) };
    }
    return docs;
  }
}

/** Blocks until released, to observe the running state */
class GateTask extends Task {
  release: () => void = () => {};
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  constructor() {
    super({}, 'gate');
  }

  protected override async process(docs: Doc[]): Promise<Doc[]> {
    await this.gate;
    return docs;
  }
}

describe('Pipeline', () => {
  describe('validation', () => {
    test('rejects duplicate task ids', () => {
      expect(
        () => new Pipeline([new TagTask({ id: 'a' }), new TagTask({ id: 'a' })])
      ).toThrow(DuplicateTaskIdError);
    });

    test('rejects mismatched neighbouring types', () => {
      const producer = new TagTask({ id: 'a' }, [], { output: 'labels' });
      const consumer = new TagTask({ id: 'b' });
      expect(() => new Pipeline([producer, consumer])).toThrow(TaskChainTypeMismatchError);
      expect(() => new Pipeline([producer, consumer])).toThrow(
        'Task "a" outputs labels but "b" expects documents'
      );
    });

    test('skips the chain check when disabled', () => {
      const producer = new TagTask({ id: 'a' }, [], { output: 'labels' });
      expect(
        () => new Pipeline([producer, new TagTask({ id: 'b' })], { validateChain: false })
      ).not.toThrow();
    });

    test('addTasks is all-or-nothing', () => {
      const pipeline = new Pipeline([new TagTask({ id: 'a' })]);
      expect(() => pipeline.addTasks([new TagTask({ id: 'b' }), new TagTask({ id: 'a' })])).toThrow(
        DuplicateTaskIdError
      );
      expect(pipeline.tasks.map((t) => t.id)).toEqual(['a']);

      pipeline.addTasks([new TagTask({ id: 'b' })]);
      expect(pipeline.tasks.map((t) => t.id)).toEqual(['a', 'b']);
    });
  });

  test('getTask finds a task by id or throws', () => {
    const task = new TagTask({ id: 'a' });
    const pipeline = new Pipeline([task]);
    expect(pipeline.getTask('a')).toBe(task);
    expect(() => pipeline.getTask('missing')).toThrow('No task with id "missing" in pipeline (tasks: a)');
  });

  test('runs tasks left to right over the whole set', async () => {
    const log: string[] = [];
    const pipeline = new Pipeline([new TagTask({ id: 'first' }, log), new TagTask({ id: 'second' }, log)]);

    const [doc] = await pipeline.run(createDocs('x'));

    expect(log).toEqual(['first', 'second']);
    expect(doc?.results['second']).toEqual({ seen: ['first'] });
  });

  test('leaves caller documents untouched by default', async () => {
    const docs = createDocs('x', 'y');
    const output = await new Pipeline([new TagTask({ id: 'a' })]).run(docs);

    expect(docs.every((doc) => Object.keys(doc.results).length === 0)).toBe(true);
    expect(output[0]).not.toBe(docs[0]);
    expect(output[0]?.results['a']).toEqual({ seen: [] });
  });

  test('mutates caller documents in place when asked', async () => {
    const docs = createDocs('x');
    const output = await new Pipeline([new TagTask({ id: 'a' })]).run(docs, { inPlace: true });

    expect(output[0]).toBe(docs[0]);
    expect(docs[0]?.results['a']).toEqual({ seen: [] });
  });

  test('takes the in-place default from its options', async () => {
    const docs = createDocs('x');
    await new Pipeline([new TagTask({ id: 'a' })], { inPlace: true }).run(docs);
    expect(docs[0]?.results['a']).toBeDefined();
  });

  test('a skip predicate leaves only that document without a result', async () => {
    const pipeline = new Pipeline([
      new TagTask({ id: 'a', condition: (doc) => doc.text !== 'skip me' }),
      new TagTask({ id: 'b' })
    ]);

    const [kept, skipped] = await pipeline.run(createDocs('keep me', 'skip me'));

    expect(kept?.results['a']).toBeDefined();
    expect(skipped?.results['a']).toBeUndefined();
    expect(skipped?.results['b']).toEqual({ seen: [] });
  });

  test('the predicate sees the document as earlier tasks left it', async () => {
    const pipeline = new Pipeline([
      new TagTask({ id: 'a', condition: (doc) => doc.text === 'x' }),
      new TagTask({ id: 'b', condition: (doc) => 'a' in doc.results })
    ]);

    const [x, y] = await pipeline.run(createDocs('x', 'y'));

    expect(x?.results['b']).toEqual({ seen: ['a'] });
    expect(y?.results).toEqual({});
  });

  test('records per-task stats of the last run', async () => {
    const pipeline = new Pipeline([new TagTask({ id: 'a', condition: (doc) => doc.text === 'x' })]);
    await pipeline.run(createDocs('x', 'y', 'z'));
    expect(pipeline.lastRunStats.get('a')).toEqual({
      documents: 1,
      skipped: 2,
      chunks: 0,
      failedChunks: 0
    });
  });

  test('refuses new tasks and a second run while running', async () => {
    const gate = new GateTask();
    const pipeline = new Pipeline([gate]);

    const running = pipeline.run([new Doc({ text: 'x' })]);
    expect(pipeline.state).toBe('running');
    expect(() => pipeline.addTasks([new TagTask({ id: 'late' })])).toThrow(ConfigurationError);
    await expect(pipeline.run([])).rejects.toThrow('Pipeline is already running');

    gate.release();
    await running;
    expect(pipeline.state).toBe('validated');
  });

  test('returns to validated after a failed run', async () => {
    class FailingTask extends Task {
      constructor() {
        super({}, 'failing');
      }
      protected override async process(): Promise<Doc[]> {
        throw new Error('task failed');
      }
    }
    const pipeline = new Pipeline([new FailingTask()]);

    await expect(pipeline.run(createDocs('x'))).rejects.toThrow('task failed');
    expect(pipeline.state).toBe('validated');
  });
});
