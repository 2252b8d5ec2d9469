export * from './context-enrichment.service';
export * from './corpus.service';
export * from './intent-classification.service';
export * from './lexical-index.service';
export * from './llm-cache.service';
export * from './search.service';
export * from './semantic-index.service';
export * from './validation.service';
