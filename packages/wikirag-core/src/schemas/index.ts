// Re-export all schemas and types
export * from './chunking.schema';
export * from './embedding.schema';
export * from './rag.schema';
export * from './document.schema';
export * from './wikipedia.schema';
export * from './chat.schema';
