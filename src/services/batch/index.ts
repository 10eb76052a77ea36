export {
  processPlayer,
  processBatch,
  getRankings,
  createBatchDeps,
  SUB_BATCH_SIZE,
  type BatchDeps,
  type BatchOptions,
  type PlayerContext,
  type PlayerStatsFetcher,
} from './batchCoordinator';
