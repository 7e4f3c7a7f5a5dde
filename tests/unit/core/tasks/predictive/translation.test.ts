/**
 * Translation Tests
 */

import { describe, expect, test } from 'vitest';
import { Translation } from '@/core/tasks/predictive/translation';
import { Doc } from '@/data/doc';
import { createScriptedLLMEngine } from '../../../../helpers/mocks';

describe('Translation', () => {
  test('adds the target language to every record', async () => {
    const engine = createScriptedLLMEngine(() => ({ translation: 'Hallo', score: 0.9 }));
    const task = new Translation({ engine, targetLanguage: 'German' });

    const [doc] = await task.run([new Doc({ text: 'Hello' })]);

    expect(engine.records[0]).toEqual([{ text: 'Hello', targetLanguage: 'German' }]);
    expect(doc?.results['translation']).toEqual({ translation: 'Hallo', score: 0.9 });
    expect(doc?.text).toBe('Hello');
  });

  test('the prompt closes with the target language', () => {
    const task = new Translation({
      engine: createScriptedLLMEngine(() => null),
      targetLanguage: 'German'
    });
    expect(task.promptTemplate?.endsWith(
      '<text>{{text}}</text>\n<target_language>{{targetLanguage}}</target_language>\n<output>'
    )).toBe(true);
  });

  test('a failed chunk leaves the others in the translation', async () => {
    const task = new Translation({
      engine: createScriptedLLMEngine((record) =>
        record['text'] === 'b' ? null : { translation: 'A', score: null }
      ),
      targetLanguage: 'German'
    });

    const [doc] = await task.run([new Doc({ text: 'ab', chunks: ['a', 'b'] })]);
    expect(doc?.results['translation']).toEqual({ translation: 'A', score: null });
  });

  test('overwrite replaces the document text', async () => {
    const task = new Translation({
      engine: createScriptedLLMEngine(() => ({ translation: 'Hallo', score: 0.9 })),
      targetLanguage: 'German',
      overwrite: true
    });

    const [doc] = await task.run([new Doc({ text: 'Hello' })]);
    expect(doc?.text).toBe('Hallo');
  });

  test('requires a target language', () => {
    expect(
      () => new Translation({ engine: createScriptedLLMEngine(() => null), targetLanguage: '  ' })
    ).toThrow('Translation: targetLanguage is required');
  });
});
