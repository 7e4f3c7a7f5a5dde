/**
 * Relation Extraction Tests
 */

import { describe, expect, test } from 'vitest';
import { RelationExtraction } from '@/core/tasks/predictive/relation-extraction';
import { Doc } from '@/data/doc';
import { createScriptedLLMEngine } from '../../../../helpers/mocks';

const alice = { text: 'Alice', entityType: 'PERSON' };
const acme = { text: 'Acme', entityType: 'ORGANIZATION' };
const berlin = { text: 'Berlin', entityType: 'LOCATION' };

describe('RelationExtraction', () => {
  test('lists relations with their descriptions in the prompt', () => {
    const task = new RelationExtraction({
      engine: createScriptedLLMEngine(() => null),
      relations: ['works_for', 'based_in'],
      relationDescriptions: { works_for: 'a person employed by an organization' },
      entityTypes: ['PERSON', 'ORGANIZATION']
    });

    expect(task.promptTemplate).toContain(
      'Relations to look for:\n- works_for: a person employed by an organization\n- based_in\n' +
        'Head and tail entities must be of one of these types: PERSON, ORGANIZATION.'
    );
  });

  test('deduplicates triplets across chunks and averages their scores', async () => {
    const replies = [
      {
        triplets: [
          { head: alice, relation: 'works_for', tail: acme, score: 0.9 },
          { head: acme, relation: 'based_in', tail: berlin, score: 0.6 }
        ]
      },
      { triplets: [{ head: alice, relation: 'works_for', tail: acme, score: 0.5 }] }
    ];
    const task = new RelationExtraction({
      engine: createScriptedLLMEngine((_record, index) => replies[index]),
      relations: ['works_for', 'based_in']
    });

    const [doc] = await task.run([
      new Doc({
        text: 'Alice works for Acme. Acme is in Berlin.',
        chunks: ['Alice works for Acme.', ' Acme is in Berlin.']
      })
    ]);

    expect(doc?.results['relation_extraction']).toEqual({
      triplets: [
        { head: alice, relation: 'works_for', tail: acme, score: expect.closeTo(0.7, 10) },
        { head: acme, relation: 'based_in', tail: berlin, score: 0.6 }
      ]
    });
  });

  test('a failed chunk contributes no triplets', async () => {
    const task = new RelationExtraction({
      engine: createScriptedLLMEngine((_record, index) =>
        index === 0
          ? null
          : { triplets: [{ head: alice, relation: 'works_for', tail: acme, score: null }] }
      ),
      relations: ['works_for']
    });

    const [doc] = await task.run([new Doc({ text: 'xy', chunks: ['x', 'y'] })]);

    expect(doc?.results['relation_extraction']).toEqual({
      triplets: [{ head: alice, relation: 'works_for', tail: acme, score: null }]
    });
  });

  test('the model may only name declared relations and entity types', () => {
    const engine = createScriptedLLMEngine(() => null);
    new RelationExtraction({
      engine,
      relations: ['works_for'],
      entityTypes: ['PERSON', 'ORGANIZATION']
    });
    const schema = engine.specs[0]?.outputShape.schema;

    const triplet = { head: alice, relation: 'works_for', tail: acme, score: 1 };
    expect(schema?.safeParse({ triplets: [triplet] }).success).toBe(true);
    expect(
      schema?.safeParse({ triplets: [{ ...triplet, relation: 'married_to' }] }).success
    ).toBe(false);
    expect(schema?.safeParse({ triplets: [{ ...triplet, tail: berlin }] }).success).toBe(false);
  });

  test('entity types are open when none are declared', () => {
    const engine = createScriptedLLMEngine(() => null);
    const task = new RelationExtraction({ engine, relations: ['based_in'] });
    const schema = engine.specs[0]?.outputShape.schema;

    expect(task.entityTypes).toBeNull();
    expect(task.promptTemplate).toContain(
      'Give each head and tail entity a short type such as PERSON or ORGANIZATION.'
    );
    const city = { text: 'Berlin', entityType: 'CITY' };
    expect(
      schema?.safeParse({
        triplets: [{ head: acme, relation: 'based_in', tail: city, score: 0.4 }]
      }).success
    ).toBe(true);
  });

  test('rejects an empty relation list', () => {
    expect(
      () => new RelationExtraction({ engine: createScriptedLLMEngine(() => null), relations: [] })
    ).toThrow('RelationExtraction: at least one relation is required');
  });

  test('rejects duplicate relations', () => {
    expect(
      () =>
        new RelationExtraction({
          engine: createScriptedLLMEngine(() => null),
          relations: ['works_for', ' works_for']
        })
    ).toThrow('RelationExtraction: relations must be unique and not blank');
  });

  test('rejects descriptions for relations that are not declared', () => {
    expect(
      () =>
        new RelationExtraction({
          engine: createScriptedLLMEngine(() => null),
          relations: ['works_for'],
          relationDescriptions: { based_in: 'located in' }
        })
    ).toThrow('RelationExtraction: descriptions given for unknown relations: based_in');
  });

  test('rejects examples naming entities that are not in the example', () => {
    expect(
      () =>
        new RelationExtraction({
          engine: createScriptedLLMEngine(() => null),
          relations: ['works_for'],
          fewshotExamples: [
            {
              text: 'Alice works for Acme.',
              triplets: [{ head: alice, relation: 'works_for', tail: berlin }]
            }
          ]
        })
    ).toThrow(/"Berlin" does not occur in the example text/);
  });
});
