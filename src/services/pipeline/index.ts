export {
  DigestPipeline,
  progressOf,
  type DeliveryStatus,
  type DigestPipelineDependencies,
  type RunOptions,
  type RunProgress,
  type RunReport,
  type RunStage,
  type StageError,
} from './digest-pipeline';
export { createDigestPipeline, type PipelineHandle } from './create-pipeline';
