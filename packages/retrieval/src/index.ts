export { Chunker } from './chunking/chunker';
export { TextNormalizer } from './chunking/text-normalizer';
export { EmbeddingClient, type EmbeddingClientOptions } from './embedding/embedding-client';
export { EmbeddingService, type EmbeddingServiceOptions } from './embedding/embedding-service';
export { FlatL2Index, createFlatIndex, squaredL2 } from './search/flat-l2-index';
export { Retriever, type RetrieverOptions } from './retrieval/retriever';
export { DocumentLoader } from './source/document-loader';
