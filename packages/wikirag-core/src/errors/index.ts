export * from './base.error';
export * from './validation.error';
export * from './rag.error';
export * from './embedding.error';
export * from './source.error';
export * from './chat.error';
