/**
 * PII Masking Tests
 */

import { describe, expect, test } from 'vitest';
import { PIIMasking } from '@/core/tasks/predictive/pii-masking';
import { Doc } from '@/data/doc';
import { createScriptedLLMEngine } from '../../../../helpers/mocks';

const replies = [
  {
    maskedText: 'Call [MASKED].',
    piiEntities: [{ entityType: 'NAME', text: 'Ann' }],
    score: 0.9
  },
  {
    maskedText: 'Mail [MASKED] or [MASKED].',
    piiEntities: [
      { entityType: 'EMAIL', text: 'ann@example.test' },
      { entityType: 'NAME', text: 'Ann' }
    ],
    score: 0.7
  }
];

function createDoc(): Doc {
  return new Doc({
    text: 'Call Ann. Mail ann@example.test or Ann.',
    chunks: ['Call Ann.', 'Mail ann@example.test or Ann.']
  });
}

describe('PIIMasking', () => {
  test('passes PII types and the placeholder to every chunk record', async () => {
    const engine = createScriptedLLMEngine(() => replies[0]);
    const task = new PIIMasking({ engine, piiTypes: ['NAME', 'EMAIL'], maskPlaceholder: '<PII>' });

    await task.run([new Doc({ text: 'ab', chunks: ['a', 'b'] })]);

    expect(engine.records[0]).toEqual([
      { text: 'a', piiTypes: 'NAME, EMAIL', maskPlaceholder: '<PII>' },
      { text: 'b', piiTypes: 'NAME, EMAIL', maskPlaceholder: '<PII>' }
    ]);
    expect(task.promptTemplate).toContain('replaced by {{maskPlaceholder}}');
  });

  test('falls back to common PII kinds and the default placeholder', async () => {
    const engine = createScriptedLLMEngine(() => replies[0]);
    const task = new PIIMasking({ engine });

    await task.run([new Doc({ text: 'a' })]);

    expect(task.maskPlaceholder).toBe('[MASKED]');
    expect(engine.records[0]).toEqual([
      {
        text: 'a',
        piiTypes:
          'names, email addresses, phone numbers, postal addresses, ID numbers, ' +
          'payment card numbers, dates of birth',
        maskPlaceholder: '[MASKED]'
      }
    ]);
  });

  test('joins masked chunks and replaces the document text by default', async () => {
    const task = new PIIMasking({
      engine: createScriptedLLMEngine((_record, index) => replies[index])
    });

    const [doc] = await task.run([createDoc()]);

    expect(doc?.results['pii_masking']).toEqual({
      maskedText: 'Call [MASKED]. Mail [MASKED] or [MASKED].',
      piiEntities: [
        { entityType: 'NAME', text: 'Ann' },
        { entityType: 'EMAIL', text: 'ann@example.test' }
      ],
      score: expect.closeTo(0.8, 10)
    });
    expect(doc?.text).toBe('Call [MASKED]. Mail [MASKED] or [MASKED].');
    expect(doc?.chunks).toEqual([]);
  });

  test('keeps the original text when overwrite is off', async () => {
    const task = new PIIMasking({
      engine: createScriptedLLMEngine((_record, index) => replies[index]),
      overwrite: false
    });

    const [doc] = await task.run([createDoc()]);

    expect(doc?.text).toBe('Call Ann. Mail ann@example.test or Ann.');
    expect(doc?.chunks).toEqual(['Call Ann.', 'Mail ann@example.test or Ann.']);
    expect(doc?.results['pii_masking']).toMatchObject({
      maskedText: 'Call [MASKED]. Mail [MASKED] or [MASKED].'
    });
  });

  test('the model may only report declared PII types', () => {
    const engine = createScriptedLLMEngine(() => null);
    new PIIMasking({ engine, piiTypes: ['NAME'] });
    const schema = engine.specs[0]?.outputShape.schema;

    expect(
      schema?.safeParse({
        maskedText: '[MASKED]',
        piiEntities: [{ entityType: 'PHONE', text: '555 0100' }],
        score: null
      }).success
    ).toBe(false);
  });

  test('rejects blank PII types', () => {
    expect(
      () => new PIIMasking({ engine: createScriptedLLMEngine(() => null), piiTypes: ['NAME', ' '] })
    ).toThrow('PIIMasking: piiTypes must be non-empty names');
  });

  test('rejects duplicate PII types', () => {
    expect(
      () =>
        new PIIMasking({ engine: createScriptedLLMEngine(() => null), piiTypes: ['NAME', 'NAME '] })
    ).toThrow('PIIMasking: piiTypes must be unique');
  });

  test('rejects an empty placeholder', () => {
    expect(
      () => new PIIMasking({ engine: createScriptedLLMEngine(() => null), maskPlaceholder: '' })
    ).toThrow('PIIMasking: maskPlaceholder must not be empty');
  });

  test('rejects examples that leave PII in the masked text', () => {
    expect(
      () =>
        new PIIMasking({
          engine: createScriptedLLMEngine(() => null),
          fewshotExamples: [
            {
              text: 'Ann called Bo.',
              maskedText: '[MASKED] called Bo.',
              piiEntities: [
                { entityType: 'NAME', text: 'Ann' },
                { entityType: 'NAME', text: 'Bo' }
              ]
            }
          ]
        })
    ).toThrow(/"Bo" is left unmasked/);
  });
});
