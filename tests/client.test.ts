import { describe, it, expect, vi, beforeEach } from 'vitest';

const { collection, getOrCreateCollection, clientOptions, embeddingOptions } = vi.hoisted(() => {
  const collection = {
    query: vi.fn(),
    upsert: vi.fn(),
    count: vi.fn(),
  };
  const clientOptions: unknown[] = [];
  const embeddingOptions: unknown[] = [];

  return { collection, getOrCreateCollection: vi.fn(), clientOptions, embeddingOptions };
});

vi.mock('chromadb', () => ({
  ChromaClient: class {
    getOrCreateCollection = getOrCreateCollection;

    constructor(options: unknown) {
      clientOptions.push(options);
    }
  },
}));

vi.mock('@chroma-core/ollama', () => ({
  OllamaEmbeddingFunction: class {
    constructor(options: unknown) {
      embeddingOptions.push(options);
    }
  },
}));

import { loadConfig } from '../src/config';
import { ChromaVectorIndex, METADATA_TEXT_LIMIT } from '../src/rag/client';
import { createServices } from '../src/services';

const OPTIONS = {
  url: 'http://chroma.test:8000',
  collection: 'legal-test',
  embedding: { url: 'http://ollama.test:11434', model: 'all-minilm' },
};

describe('ChromaVectorIndex', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    clientOptions.length = 0;
    embeddingOptions.length = 0;
    getOrCreateCollection.mockResolvedValue(collection);
  });

  it('connects to the configured server', () => {
    const index = new ChromaVectorIndex(OPTIONS);

    expect(index.name).toBe('legal-test');
    expect(clientOptions).toEqual([{ host: 'chroma.test', port: 8000, ssl: false }]);
  });

  it('turns cosine distances into similarity scores', async () => {
    collection.query.mockResolvedValue({
      ids: [['a', 'b']],
      documents: [['Theft is defined in Section 378.', null]],
      metadatas: [[{ source_file: 'ipc.pdf', page: 3 }, null]],
      distances: [[0.25, 0.5]],
    });
    const index = new ChromaVectorIndex(OPTIONS);

    const matches = await index.search([0.1, 0.2], 4);

    expect(collection.query).toHaveBeenCalledWith({ queryEmbeddings: [[0.1, 0.2]], nResults: 4 });
    expect(matches).toEqual([
      { id: 'a', score: 0.75, metadata: { sourceFile: 'ipc.pdf', page: 3, text: 'Theft is defined in Section 378.' } },
      { id: 'b', score: 0.5, metadata: { sourceFile: 'Unknown', page: null, text: '' } },
    ]);
  });

  it('opens the collection once', async () => {
    collection.count.mockResolvedValue(12);
    const index = new ChromaVectorIndex(OPTIONS);

    expect(await index.count()).toBe(12);
    expect(await index.count()).toBe(12);
    expect(getOrCreateCollection).toHaveBeenCalledTimes(1);
    expect(getOrCreateCollection).toHaveBeenCalledWith({
      name: 'legal-test',
      metadata: { 'hnsw:space': 'cosine' },
      embeddingFunction: expect.any(Object),
    });
    expect(embeddingOptions).toEqual([{ url: 'http://ollama.test:11434', model: 'all-minilm' }]);
  });

  it('retries opening the collection after a failure', async () => {
    getOrCreateCollection.mockRejectedValueOnce(new Error('connection refused'));
    collection.count.mockResolvedValue(3);
    const index = new ChromaVectorIndex(OPTIONS);

    await expect(index.count()).rejects.toThrow('connection refused');
    expect(await index.count()).toBe(3);
    expect(getOrCreateCollection).toHaveBeenCalledTimes(2);
  });

  it('keeps a newer collection lookup when an older one fails late', async () => {
    let failFirst: (error: Error) => void = () => undefined;
    getOrCreateCollection.mockImplementationOnce(
      () =>
        new Promise((_resolve, reject) => {
          failFirst = reject;
        }),
    );
    collection.count.mockResolvedValue(5);
    const index = new ChromaVectorIndex(OPTIONS);

    const stale = index.count();
    await index.close();
    expect(await index.count()).toBe(5);

    failFirst(new Error('connection reset'));
    await expect(stale).rejects.toThrow('connection reset');

    expect(await index.count()).toBe(5);
    expect(getOrCreateCollection).toHaveBeenCalledTimes(2);
  });

  it('stores text and metadata alongside vectors', async () => {
    const index = new ChromaVectorIndex(OPTIONS);
    const longText = 'a'.repeat(METADATA_TEXT_LIMIT + 10);

    await index.upsert([
      { id: 'ipc-0-0', vector: [1, 0], metadata: { sourceFile: 'ipc.pdf', page: 1, text: longText } },
      { id: 'notes-0-0', vector: [0, 1], metadata: { sourceFile: 'notes.pdf', page: null, text: 'Short.' } },
    ]);

    expect(collection.upsert).toHaveBeenCalledWith({
      ids: ['ipc-0-0', 'notes-0-0'],
      embeddings: [
        [1, 0],
        [0, 1],
      ],
      documents: ['a'.repeat(METADATA_TEXT_LIMIT), 'Short.'],
      metadatas: [{ source_file: 'ipc.pdf', page: 1 }, { source_file: 'notes.pdf' }],
    });
  });

  it('skips the server for empty requests', async () => {
    const index = new ChromaVectorIndex(OPTIONS);

    await index.upsert([]);
    expect(await index.search([0.1], 0)).toEqual([]);
    expect(getOrCreateCollection).not.toHaveBeenCalled();
  });
});

describe('createServices', () => {
  it('reports the collection the index was opened with', async () => {
    const services = createServices(loadConfig({ CHROMA_COLLECTION: 'statutes' }));

    expect(services.collection).toBe('statutes');
    await services.close();
  });
});
