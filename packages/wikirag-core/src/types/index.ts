export * from './retrieval.types';
export * from './llm.types';
