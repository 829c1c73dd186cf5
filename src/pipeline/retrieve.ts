import type { Embedder, IndexMatch, RankedMatch, VectorIndex } from '../rag/schema';

export type RerankOptions = {
  keywords: readonly string[];
  boostPerKeyword: number;
};

export type RetrieverDeps = {
  embedder: Embedder;
  index: VectorIndex;
  rerank?: Partial<RerankOptions>;
};

export interface Retriever {
  retrieve(query: string, topK?: number): Promise<RankedMatch[]>;
}

export const LEGAL_KEYWORDS = ['section', 'ipc', 'punishment', 'offense', 'crime', 'law', 'act'] as const;

export const DEFAULT_RERANK: RerankOptions = {
  keywords: LEGAL_KEYWORDS,
  boostPerKeyword: 0.1,
};

export const DEFAULT_TOP_K = 5;

const OVERFETCH_FACTOR = 2;

export const keywordBoost = (text: string, { keywords, boostPerKeyword }: RerankOptions = DEFAULT_RERANK): number => {
  const haystack = text.toLowerCase();
  const hits = keywords.filter((keyword) => haystack.includes(keyword.toLowerCase())).length;

  return hits * boostPerKeyword;
};

/**
 * Adds a keyword boost to every candidate and keeps the `topK` best by
 * adjusted score. Equal scores keep their search order.
 */
export const rerankMatches = (
  matches: IndexMatch[],
  topK: number,
  options: RerankOptions = DEFAULT_RERANK,
): RankedMatch[] =>
  matches
    .map<RankedMatch>((match) => {
      const relevanceBoost = keywordBoost(match.metadata.text, options);
      return { ...match, relevanceBoost, adjustedScore: match.score + relevanceBoost };
    })
    .sort((left, right) => right.adjustedScore - left.adjustedScore)
    .slice(0, Math.max(0, topK));

export const createRetriever = ({ embedder, index, rerank }: RetrieverDeps): Retriever => {
  const options: RerankOptions = { ...DEFAULT_RERANK, ...rerank };

  return {
    async retrieve(query: string, topK = DEFAULT_TOP_K): Promise<RankedMatch[]> {
      if (!query.trim() || topK <= 0) {
        return [];
      }

      const [vector] = await embedder.embed([query]);

      if (!vector) {
        throw new Error('Embedding service returned no vector for the query.');
      }

      const candidates = await index.search(vector, topK * OVERFETCH_FACTOR);

      return rerankMatches(candidates, topK, options);
    },
  };
};
