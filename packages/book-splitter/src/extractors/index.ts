export { TocExtractError, TocNotFoundError } from './toc-extract-error';

export { parseTocResponse } from './toc-response-parser';
export type { TocResponseParseOptions } from './toc-response-parser';

export { TocExtractor } from './toc-extractor';
export type { TocExtractionResult, TocExtractorOptions } from './toc-extractor';
