import type { IndexMatch } from '../rag/schema';

export type Confidence = 'very_low' | 'low' | 'medium' | 'high';

const BANDS: ReadonlyArray<[number, Confidence]> = [
  [0.8, 'high'],
  [0.6, 'medium'],
  [0.4, 'low'],
];

/** Labels retrieval quality by the mean raw similarity score. */
export const assessConfidence = (matches: Pick<IndexMatch, 'score'>[]): Confidence => {
  if (!matches.length) {
    return 'very_low';
  }

  const mean = matches.reduce((sum, match) => sum + match.score, 0) / matches.length;
  const band = BANDS.find(([threshold]) => mean >= threshold);

  return band ? band[1] : 'very_low';
};
