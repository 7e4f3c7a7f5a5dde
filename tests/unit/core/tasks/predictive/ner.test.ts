/**
 * NER Tests
 */

import { describe, expect, test } from 'vitest';
import { NER } from '@/core/tasks/predictive/ner';
import { Doc } from '@/data/doc';
import { createScriptedLLMEngine } from '../../../../helpers/mocks';

describe('NER', () => {
  test('passes entity types to every chunk record', async () => {
    const engine = createScriptedLLMEngine(() => ({ entities: [] }));
    const task = new NER({ engine, entityTypes: ['PERSON', 'LOCATION'] });

    await task.run([new Doc({ text: 'ab', chunks: ['a', 'b'] })]);

    expect(engine.records[0]).toEqual([
      { text: 'a', entityTypes: 'PERSON, LOCATION' },
      { text: 'b', entityTypes: 'PERSON, LOCATION' }
    ]);
  });

  test('deduplicates entities and locates them in the document text', async () => {
    const replies = [
      {
        entities: [
          { text: 'Alice', entityType: 'PERSON', score: 0.9 },
          { text: 'Bob', entityType: 'PERSON', score: 0.8 }
        ]
      },
      {
        entities: [
          { text: 'Paris', entityType: 'LOCATION', score: 0.7 },
          { text: 'Alice', entityType: 'PERSON', score: 0.7 },
          { text: 'Zed', entityType: 'PERSON', score: null }
        ]
      }
    ];
    const task = new NER({
      engine: createScriptedLLMEngine((_record, index) => replies[index]),
      entityTypes: ['PERSON', 'LOCATION']
    });

    const [doc] = await task.run([
      new Doc({
        text: 'Alice met Bob in Paris.',
        chunks: ['Alice met Bob', ' in Paris.']
      })
    ]);

    expect(doc?.results['ner']).toEqual({
      entities: [
        { text: 'Alice', entityType: 'PERSON', score: expect.closeTo(0.8, 10), start: 0, end: 5 },
        { text: 'Bob', entityType: 'PERSON', score: 0.8, start: 10, end: 13 },
        { text: 'Paris', entityType: 'LOCATION', score: 0.7, start: 17, end: 22 },
        { text: 'Zed', entityType: 'PERSON', score: null, start: null, end: null }
      ]
    });
  });

  test('same text with different types stays separate', async () => {
    const task = new NER({
      engine: createScriptedLLMEngine(() => ({
        entities: [
          { text: 'Jordan', entityType: 'PERSON', score: 0.5 },
          { text: 'Jordan', entityType: 'LOCATION', score: 0.5 }
        ]
      }))
    });

    const [doc] = await task.run([new Doc({ text: 'Jordan' })]);
    expect(doc?.results['ner']).toMatchObject({
      entities: [{ entityType: 'PERSON' }, { entityType: 'LOCATION' }]
    });
  });

  test('rejects an empty entity type list', () => {
    expect(() => new NER({ engine: createScriptedLLMEngine(() => null), entityTypes: [] })).toThrow(
      'NER: at least one entity type is required'
    );
  });

  test('rejects examples naming text that is not in the example', () => {
    expect(
      () =>
        new NER({
          engine: createScriptedLLMEngine(() => null),
          fewshotExamples: [{ text: 'Alice left.', entities: [{ text: 'Bob', entityType: 'PERSON' }] }]
        })
    ).toThrow(/does not occur in the example text/);
  });
});
