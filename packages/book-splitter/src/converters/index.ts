export {
  ChapterMaterializer,
  buildChapterKey,
  toChapterRecord,
} from './chapter-materializer';
