export { QueueManager, parseRedisUrl, type QueueManagerOptions, type JobStatus, type JobProcessor } from './queue.js';
export {
  JOB_NAMES,
  type JobName,
  type JobData,
  type NarrateThreadJobData,
  type NarrateThreadJobResult,
} from './jobs.js';
export { parseThreadDocument, loadThreadDocument, type ThreadJson } from './document.js';
export {
  ThreadPipeline,
  createPipeline,
  createNarrateProcessor,
  summarizeResult,
  type PipelineResult,
  type PipelineDeps,
  type PipelineOverrides,
  type BackgroundChoice,
} from './pipeline.js';
export { runCommand, type CliContext, type QueueClient } from './commands.js';
