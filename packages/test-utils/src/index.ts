export * from './factories/document.factory';
export * from './factories/embedding.factory';
export * from './helpers/http.helper';
