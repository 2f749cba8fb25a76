import type { NumberMatch, PageResult, Section } from '@tallyfold/model';

import type { NumberExtractor } from './number-extractor';

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Build a paragraph section with an id of the form `p{page}_s{position}`.
 */
export function buildSection(
  pageNumber: number,
  position: number,
  content: string,
  numbers: readonly NumberMatch[],
  title: string | null = null,
): Section {
  return {
    sectionId: `p${pageNumber}_s${position}`,
    sectionType: 'paragraph',
    title,
    content,
    wordCount: countWords(content),
    llmReady: true,
    numbers,
  };
}

/**
 * Build a page holding one section of locally extracted text. Content is
 * cut to `maxChars`; numbers are extracted from the whole page text, so
 * matches past the cut are kept.
 */
export function buildLocalPage(
  pageNumber: number,
  text: string,
  extractor: NumberExtractor,
  maxChars?: number,
): PageResult {
  const content = maxChars === undefined ? text : text.slice(0, maxChars);
  return {
    pageNumber,
    sections: [buildSection(pageNumber, 1, content, extractor.extract(text))],
  };
}
