// Schemas and types
export * from './schemas';
export * from './types';

// Errors
export * from './errors';

// Logger
export * from './logger';

// Constants
export * from './constants';

// Prompts
export * from './prompts/answer-prompts';
