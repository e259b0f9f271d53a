export { DeclinationPipeline, renderDocument, formatFailure } from './driver.js';
export type {
  ProcessedLine,
  PassthroughLine,
  MalformedProcessedLine,
  CompletedLine,
  FailedLine,
  PipelineCallbacks,
  PipelineConfig,
  LineStartEvent,
  RunCompleteEvent,
  RenderOptions,
} from './types.js';
