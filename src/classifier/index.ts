export { TaxonomyLoader } from './taxonomy.js';
export { CLASSIFICATION_SYSTEM_PROMPT, buildClassificationPrompt, formatTaxonomy } from './prompt.js';
export { LlmClassifier, type Classifier, type LlmClassifierOptions } from './llm-classifier.js';
