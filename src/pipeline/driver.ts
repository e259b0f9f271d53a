import { NoaaDeclinationClient, type DeclinationClient } from '../client/declination-client.js';
import {
  INPUT_FORMAT,
  OUTPUT_FORMAT,
  PIPELINE_DEFAULTS,
  type FailurePolicy,
} from '../config/constants.js';
import { decodeResponse } from '../decoder/response-decoder.js';
import {
  MalformedLineError,
  PipelineAbortedError,
  type DeclinationError,
} from '../errors/index.js';
import { formatHeader, formatLine } from '../formatter/line-formatter.js';
import { parseLine } from '../parser/line-parser.js';
import type { FieldSequence } from '../parser/types.js';
import { buildRequest } from '../query/builder.js';
import { SilentLogger, type Logger } from '../utils/logger.js';
import type {
  FailedLine,
  PipelineCallbacks,
  PipelineConfig,
  ProcessedLine,
  RenderOptions,
} from './types.js';

/**
 * Diagnostic line written ahead of the raw input when a stage fails
 */
export function formatFailure(stage: FailedLine['stage'], error: DeclinationError): string {
  return `${OUTPUT_FORMAT.ERROR_MARKER} in ${stage} stage (${error.kind}): ${error.message}`;
}

/**
 * Runs each input line through parse → build → fetch → decode → format,
 * one line at a time and in input order.
 */
export class DeclinationPipeline {
  private client: DeclinationClient;
  private minFields: number;
  private failurePolicy: FailurePolicy;
  private logger: Logger;
  private callbacks: PipelineCallbacks;

  constructor(config: PipelineConfig = {}) {
    this.logger = config.logger ?? new SilentLogger();
    this.client = config.client ?? new NoaaDeclinationClient({ logger: this.logger });
    this.minFields = config.minFields ?? INPUT_FORMAT.MIN_FIELDS;
    this.failurePolicy = config.failurePolicy ?? PIPELINE_DEFAULTS.FAILURE_POLICY;
    this.callbacks = config.callbacks ?? {};
  }

  /**
   * Process every line. Returns one entry per input line.
   * Under the fail-fast policy a fetch or decode failure throws PipelineAbortedError.
   */
  async run(lines: Iterable<string> | AsyncIterable<string>): Promise<ProcessedLine[]> {
    const startTime = Date.now();
    const processed: ProcessedLine[] = [];
    let lineNumber = 0;

    for await (const raw of lines) {
      lineNumber++;
      this.callbacks.onLineStart?.({ lineNumber, raw });

      const entry = await this.processLine(raw, lineNumber);
      processed.push(entry);
      this.callbacks.onLineComplete?.(entry);

      if (entry.status === 'failed') {
        this.logger.warn(`Line ${lineNumber}: ${entry.stage} failed: ${entry.error.message}`);
        if (this.failurePolicy === 'fail-fast' && entry.stage !== 'build') {
          throw new PipelineAbortedError(entry.stage, entry.error, { lineNumber, raw });
        }
      }
    }

    const summary = {
      lines: processed.length,
      completed: processed.filter((p) => p.status === 'ok').length,
      failed: processed.filter((p) => p.status === 'failed').length,
      malformed: processed.filter((p) => p.status === 'malformed').length,
      duration: Date.now() - startTime,
    };
    this.logger.debug(
      `Processed ${summary.lines} lines: ${summary.completed} ok, ` +
        `${summary.failed} failed, ${summary.malformed} malformed`
    );
    this.callbacks.onRunComplete?.(summary);

    return processed;
  }

  /**
   * Process a single line. Never throws for per-line data or remote failures.
   */
  async processLine(raw: string, lineNumber: number): Promise<ProcessedLine> {
    const classification = parseLine(raw, this.minFields);

    switch (classification.kind) {
      case 'blank':
      case 'comment':
        return { status: 'passthrough', lineNumber, raw, output: [raw] };

      case 'malformed':
        this.logger.warn(`Line ${lineNumber}: malformed (${classification.fieldCount} fields)`);
        return {
          status: 'malformed',
          lineNumber,
          raw,
          output: [OUTPUT_FORMAT.MALFORMED_MARKER, raw],
          error: new MalformedLineError(classification.fieldCount, this.minFields, {
            lineNumber,
            raw,
          }),
        };

      case 'data':
        return this.processData(classification.fields, raw, lineNumber);
    }
  }

  private async processData(
    fields: FieldSequence,
    raw: string,
    lineNumber: number
  ): Promise<ProcessedLine> {
    const fail = (stage: FailedLine['stage'], error: DeclinationError): FailedLine => ({
      status: 'failed',
      lineNumber,
      raw,
      stage,
      error: error.atLine({ lineNumber, raw }),
      output: [formatFailure(stage, error), raw],
    });

    const built = buildRequest(fields);
    if (!built.ok) {
      return fail('build', built.error);
    }

    const fetched = await this.client.fetch(built.value);
    if (!fetched.ok) {
      return fail('fetch', fetched.error);
    }

    const decoded = decodeResponse(fetched.value);
    if (!decoded.ok) {
      return fail('decode', decoded.error);
    }

    this.logger.debug(`Line ${lineNumber}: declination ${decoded.value.declination}`);

    return {
      status: 'ok',
      lineNumber,
      raw,
      request: built.value,
      result: decoded.value,
      output: [formatLine(built.value, decoded.value)],
    };
  }
}

/**
 * Join processed lines into the report document
 */
export function renderDocument(processed: ProcessedLine[], options: RenderOptions = {}): string {
  const header = options.header ?? PIPELINE_DEFAULTS.INCLUDE_HEADER;
  const lines = header ? [formatHeader()] : [];

  for (const entry of processed) {
    lines.push(...entry.output);
  }

  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
