import { describe, it, expect } from 'vitest';

import { joinTextItems } from '../src/pipeline/extractPdf';

describe('joinTextItems', () => {
  it('keeps marked line ends and drops marked-content items', () => {
    expect(
      joinTextItems([
        { str: 'Section 378', hasEOL: true },
        { type: 'beginMarkedContent' },
        { str: 'Theft', hasEOL: false },
        { str: ' is defined', hasEOL: true },
        { type: 'endMarkedContent' },
      ]),
    ).toBe('Section 378\nTheft is defined\n');
  });

  it('returns an empty string for a page without text', () => {
    expect(joinTextItems([])).toBe('');
  });
});
