export {
  PROGRESS_CALLBACK_KEY,
  type ReportProgress,
  type JobArgs,
  type JobInvocationArgs,
  type JobAction,
  type Job,
  type DrainSummary,
  type JobQueueOptions,
  type JobQueue,
  createJobQueue,
} from './jobQueue';

export {
  type ProgressSink,
  type ProgressSnapshot,
  type TrackingProgressSink,
  createTrackingProgressSink,
} from './progress';
