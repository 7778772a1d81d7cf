export { ChapterNotFoundError } from './chapter-not-found-error';
export type { ChapterNotFoundStage } from './chapter-not-found-error';

export {
  OccurrenceReconciler,
  filterCloseOccurrences,
  mergeNearbyOccurrences,
} from './occurrence-reconciler';
export type { OccurrenceReconcilerOptions } from './occurrence-reconciler';
