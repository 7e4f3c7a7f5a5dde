/**
 * Predictive Tasks
 *
 * | Task                  | llm | zero-shot |
 * |-----------------------|-----|-----------|
 * | Classification        |  ✓  |     ✓     |
 * | InformationExtraction |  ✓  |           |
 * | NER                   |  ✓  |           |
 * | Summarization         |  ✓  |           |
 * | Translation           |  ✓  |           |
 * | QuestionAnswering     |  ✓  |           |
 * | SentimentAnalysis     |  ✓  |           |
 * | RelationExtraction    |  ✓  |           |
 * | PIIMasking            |  ✓  |           |
 */

export * from './classification';
export * from './information-extraction';
export * from './ner';
export * from './pii-masking';
export * from './question-answering';
export * from './relation-extraction';
export * from './sentiment-analysis';
export * from './summarization';
export * from './translation';

export { Bridge, type BridgeOptions, LLMBridge, ZeroShotBridge } from './bridge';
export * from './consolidation';
export { type BridgeFactories, resolveBridge, supportedBackends } from './registry';
export { PredictiveTask, type PredictiveTaskOptions, type TaskMeta } from './task';
