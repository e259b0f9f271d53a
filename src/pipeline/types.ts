import type { FailurePolicy } from '../config/constants.js';
import type { DeclinationClient } from '../client/declination-client.js';
import type { ResultRecord } from '../decoder/types.js';
import type {
  DeclinationError,
  MalformedLineError,
  PipelineStage,
} from '../errors/index.js';
import type { RequestRecord } from '../query/types.js';
import type { Logger } from '../utils/logger.js';

interface ProcessedLineBase {
  /** 1-based position in the input */
  lineNumber: number;
  raw: string;
  /** Report lines emitted for this input line */
  output: string[];
}

export interface PassthroughLine extends ProcessedLineBase {
  status: 'passthrough';
}

export interface MalformedProcessedLine extends ProcessedLineBase {
  status: 'malformed';
  error: MalformedLineError;
}

export interface CompletedLine extends ProcessedLineBase {
  status: 'ok';
  request: RequestRecord;
  result: ResultRecord;
}

export interface FailedLine extends ProcessedLineBase {
  status: 'failed';
  stage: Exclude<PipelineStage, 'parse'>;
  error: DeclinationError;
}

export type ProcessedLine = PassthroughLine | MalformedProcessedLine | CompletedLine | FailedLine;

export interface LineStartEvent {
  lineNumber: number;
  raw: string;
}

export interface RunCompleteEvent {
  lines: number;
  completed: number;
  failed: number;
  malformed: number;
  duration: number;
}

export interface PipelineCallbacks {
  onLineStart?: (event: LineStartEvent) => void;
  onLineComplete?: (line: ProcessedLine) => void;
  onRunComplete?: (event: RunCompleteEvent) => void;
}

export interface PipelineConfig {
  // Remote lookup (defaults to the NOAA calculator)
  client?: DeclinationClient;
  // Minimum whitespace-separated fields for a data line
  minFields?: number;
  // Whether a fetch/decode failure stops the run
  failurePolicy?: FailurePolicy;
  logger?: Logger;
  callbacks?: PipelineCallbacks;
}

export interface RenderOptions {
  /** Prefix the column-label line (default: true) */
  header?: boolean;
}
