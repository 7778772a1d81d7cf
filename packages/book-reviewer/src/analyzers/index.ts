export { ChapterAnalyzer } from './chapter-analyzer';
export type {
  ChapterAnalysisInput,
  ChapterAnalyzerOptions,
} from './chapter-analyzer';

export { ChapterQuestionAnswerer } from './chapter-question-answerer';
export type { ChapterQuestionInput } from './chapter-question-answerer';

export { nextScratchpad } from './scratchpad';
