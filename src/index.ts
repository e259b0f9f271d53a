export {
  parseLine,
  type LineClassification,
  type FieldSequence,
  type BlankLine,
  type CommentLine,
  type MalformedLine,
  type DataLine,
} from './parser/index.js';
export { buildRequest, toDecimalDegrees, type RequestRecord } from './query/index.js';
export {
  HttpClient,
  NoaaDeclinationClient,
  buildQuery,
  type DeclinationClient,
  type NoaaClientConfig,
  type HttpClientConfig,
  type HttpRequest,
  type HttpResponse,
} from './client/index.js';
export { decodeResponse, type ResultRecord } from './decoder/index.js';
export { formatLine, formatHeader, gridDeclination } from './formatter/index.js';
export {
  DeclinationPipeline,
  renderDocument,
  formatFailure,
  type ProcessedLine,
  type PassthroughLine,
  type MalformedProcessedLine,
  type CompletedLine,
  type FailedLine,
  type PipelineCallbacks,
  type PipelineConfig,
  type LineStartEvent,
  type RunCompleteEvent,
  type RenderOptions,
} from './pipeline/index.js';
export {
  DeclinationError,
  MalformedLineError,
  NumericConversionError,
  TransportError,
  DecodeError,
  ConfigError,
  PipelineAbortedError,
  type ErrorKind,
  type PipelineStage,
  type LineContext,
} from './errors/index.js';
export {
  loadEnv,
  resolveConfig,
  VERSION,
  type DeclinationConfig,
  type FailurePolicy,
  type LoadEnvResult,
} from './config/index.js';
export { splitLines, readInputFile, readStreamLines, writeOutput } from './io/index.js';
export { type Logger, ConsoleLogger, SilentLogger, createLogger } from './utils/logger.js';
export { type Result, ok, err } from './utils/result.js';

import { NoaaDeclinationClient } from './client/index.js';
import { resolveConfig, type DeclinationConfig } from './config/index.js';
import { readInputFile } from './io/index.js';
import { DeclinationPipeline, renderDocument, type PipelineConfig } from './pipeline/index.js';

export interface ReportOptions extends Omit<PipelineConfig, 'failurePolicy'> {
  /** Calculator settings; unset values come from the environment */
  config?: Partial<DeclinationConfig>;
  header?: boolean;
}

/**
 * Produce the report document for a batch of input lines
 */
export async function createReport(
  lines: Iterable<string> | AsyncIterable<string>,
  options: ReportOptions = {}
): Promise<string> {
  const { config: overrides, header, ...pipelineConfig } = options;
  const config = resolveConfig(process.env, overrides);
  const pipeline = new DeclinationPipeline({
    ...pipelineConfig,
    failurePolicy: config.failurePolicy,
    client:
      pipelineConfig.client ??
      new NoaaDeclinationClient({
        endpoint: config.endpoint,
        apiKey: config.apiKey,
        model: config.model,
        timeoutMs: config.timeoutMs,
        retry: { maxAttempts: config.maxAttempts },
        logger: pipelineConfig.logger,
      }),
  });

  const processed = await pipeline.run(lines);
  return renderDocument(processed, { header });
}

/**
 * Produce the report document for an input file
 */
export async function fromFile(filePath: string, options: ReportOptions = {}): Promise<string> {
  const lines = await readInputFile(filePath);
  return createReport(lines, options);
}
