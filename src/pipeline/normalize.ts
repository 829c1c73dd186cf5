export type NormalizeOptions = {
  /** How many lines at the top and bottom of a page are header/footer candidates. */
  lookLines?: number;
  /** Fraction of pages a line block must repeat on to count as running header/footer. */
  repeatThreshold?: number;
};

export type RepeatingLines = {
  headers: string[];
  footers: string[];
};

const DEFAULT_LOOK_LINES = 2;
const DEFAULT_REPEAT_THRESHOLD = 0.8;

const LINE_BREAK = /\r\n|\r|\n/;

const splitLines = (text: string): string[] => {
  const lines = text.split(LINE_BREAK);

  // a trailing line break does not open another line
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  return lines;
};

const countNonEmpty = (values: string[]): Map<string, number> => {
  const counts = new Map<string, number>();

  for (const value of values) {
    if (value) {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
  }

  return counts;
};

const frequentKeys = (counts: Map<string, number>, total: number, threshold: number): string[] =>
  [...counts.entries()].filter(([, count]) => count / total >= threshold).map(([value]) => value);

export const detectRepeatingLines = (
  pages: (string | null)[],
  { lookLines = DEFAULT_LOOK_LINES, repeatThreshold = DEFAULT_REPEAT_THRESHOLD }: NormalizeOptions = {},
): RepeatingLines => {
  const heads: string[] = [];
  const foots: string[] = [];

  for (const page of pages) {
    const lines = splitLines(page ?? '');
    heads.push(lines.slice(0, lookLines).join('\n').trim());
    foots.push(lines.length ? lines.slice(-lookLines).join('\n').trim() : '');
  }

  const total = Math.max(1, pages.length);

  return {
    headers: frequentKeys(countNonEmpty(heads), total, repeatThreshold),
    footers: frequentKeys(countNonEmpty(foots), total, repeatThreshold),
  };
};

const removeAll = (text: string, candidates: string[]): string =>
  candidates.reduce((current, candidate) => (candidate ? current.replaceAll(candidate, '') : current), text);

export const repairText = (text: string): string =>
  text
    .replace(/([\p{L}\p{N}_]+)-\n([\p{L}\p{N}_]+)/gu, '$1$2')
    .replace(/(?<!\n)\n(?!\n)/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/[ \t]{2,}/g, ' ')
    .trim();

/**
 * Strips running headers and footers shared by most pages, then repairs
 * hyphenated line breaks and whitespace. Returns one string per input page.
 */
export const normalizePages = (pages: (string | null)[], options: NormalizeOptions = {}): string[] => {
  const { headers, footers } = detectRepeatingLines(pages, options);

  return pages.map((page) => repairText(removeAll(removeAll(page ?? '', headers), footers)));
};
