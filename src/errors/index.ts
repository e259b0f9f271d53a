export type ErrorKind =
  | 'MalformedLine'
  | 'NumericConversion'
  | 'Transport'
  | 'Decode'
  | 'Config'
  | 'Aborted';

/** Pipeline stage a per-line error is attributed to */
export type PipelineStage = 'parse' | 'build' | 'fetch' | 'decode';

export interface LineContext {
  /** 1-based line number in the input document */
  lineNumber?: number;
  /** The raw input line, without its terminator */
  raw?: string;
}

/**
 * Base class for declination errors with input line info
 */
export class DeclinationError extends Error {
  readonly kind: ErrorKind;
  context?: LineContext;

  constructor(kind: ErrorKind, message: string, context?: LineContext) {
    super(message);
    this.name = 'DeclinationError';
    this.kind = kind;
    this.context = context;
  }

  /**
   * Attribute the error to an input line once the caller knows it
   */
  atLine(context: LineContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }

  /**
   * Format the error with the offending input line for display
   */
  format(): string {
    const lines: string[] = [`${this.name}: ${this.message}`];

    if (this.context?.lineNumber !== undefined) {
      lines.push(`  --> line ${this.context.lineNumber}`);
    }

    if (this.context?.raw !== undefined) {
      const lineNum = this.context.lineNumber?.toString() ?? '';
      const padding = ' '.repeat(lineNum.length);
      lines.push(`${padding} |`);
      lines.push(`${lineNum} | ${this.context.raw}`);
    }

    return lines.join('\n');
  }

  toString(): string {
    return this.format();
  }
}

/**
 * A data line with fewer fields than the layout needs
 */
export class MalformedLineError extends DeclinationError {
  readonly fieldCount: number;
  readonly minFields: number;

  constructor(fieldCount: number, minFields: number, context?: LineContext) {
    super('MalformedLine', `Expected at least ${minFields} fields, found ${fieldCount}`, context);
    this.name = 'MalformedLineError';
    this.fieldCount = fieldCount;
    this.minFields = minFields;
  }
}

/**
 * A degree, minute or grid offset token is not a decimal number
 */
export class NumericConversionError extends DeclinationError {
  /** Name of the field that failed to convert */
  readonly field: string;
  /** The token as it appeared in the input */
  readonly token: string;

  constructor(field: string, token: string, context?: LineContext) {
    super('NumericConversion', `Cannot convert ${field} '${token}' to a number`, context);
    this.name = 'NumericConversionError';
    this.field = field;
    this.token = token;
  }
}

/**
 * The remote calculator could not be reached or answered with a non-2xx status
 */
export class TransportError extends DeclinationError {
  readonly status?: number;
  readonly url?: string;

  constructor(
    message: string,
    options?: { status?: number; url?: string; cause?: unknown },
    context?: LineContext
  ) {
    super('Transport', message, context);
    this.name = 'TransportError';
    this.status = options?.status;
    this.url = options?.url;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The calculator's answer does not have the expected tabular shape
 */
export class DecodeError extends DeclinationError {
  /** The response line that was being decoded, if one was reached */
  readonly dataRow?: string;

  constructor(message: string, dataRow?: string, context?: LineContext) {
    super('Decode', message, context);
    this.name = 'DecodeError';
    this.dataRow = dataRow;
  }

  format(): string {
    const base = super.format();
    if (this.dataRow !== undefined) {
      return `${base}\n  response row: '${this.dataRow}'`;
    }
    return base;
  }
}

export class ConfigError extends DeclinationError {
  /** The setting (env var or flag) holding the bad value */
  readonly setting: string;

  constructor(setting: string, message: string) {
    super('Config', message);
    this.name = 'ConfigError';
    this.setting = setting;
  }
}

/**
 * Raised under the fail-fast policy when a remote stage fails
 */
export class PipelineAbortedError extends DeclinationError {
  readonly stage: PipelineStage;
  readonly reason: DeclinationError;

  constructor(stage: PipelineStage, reason: DeclinationError, context: LineContext) {
    super('Aborted', `Run aborted in ${stage} stage: ${reason.message}`, context);
    this.name = 'PipelineAbortedError';
    this.stage = stage;
    this.reason = reason;
  }
}
