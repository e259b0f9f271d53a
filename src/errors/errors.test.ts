import { describe, it, expect } from 'vitest';
import {
  DeclinationError,
  MalformedLineError,
  NumericConversionError,
  TransportError,
  DecodeError,
  ConfigError,
  PipelineAbortedError,
} from './index.js';

describe('Error classes', () => {
  describe('DeclinationError', () => {
    it('should format error with message only', () => {
      const error = new DeclinationError('Transport', 'Something went wrong');

      expect(error.format()).toBe('DeclinationError: Something went wrong');
    });

    it('should format error with line number and raw line', () => {
      const error = new DeclinationError('Decode', 'Unexpected response', {
        lineNumber: 12,
        raw: '2015 08 28  63 375  96 15  -2.46',
      });

      expect(error.format()).toBe(
        [
          'DeclinationError: Unexpected response',
          '  --> line 12',
          '   |',
          '12 | 2015 08 28  63 375  96 15  -2.46',
        ].join('\n')
      );
    });

    it('atLine attaches the input line', () => {
      const error = new NumericConversionError('grid offset', 'abc').atLine({
        lineNumber: 3,
        raw: '2015 08 28 63 375 96 15 abc',
      });

      expect(error).toBeInstanceOf(NumericConversionError);
      expect(error.format()).toBe(
        [
          "NumericConversionError: Cannot convert grid offset 'abc' to a number",
          '  --> line 3',
          '  |',
          '3 | 2015 08 28 63 375 96 15 abc',
        ].join('\n')
      );
    });

    it('toString delegates to format', () => {
      const error = new DeclinationError('Config', 'bad', { lineNumber: 1 });

      expect(String(error)).toBe(error.format());
    });
  });

  describe('MalformedLineError', () => {
    it('reports field counts', () => {
      const error = new MalformedLineError(3, 8);

      expect(error.kind).toBe('MalformedLine');
      expect(error.message).toBe('Expected at least 8 fields, found 3');
    });
  });

  describe('NumericConversionError', () => {
    it('names the field and token', () => {
      const error = new NumericConversionError('grid offset', 'abc');

      expect(error.kind).toBe('NumericConversion');
      expect(error.name).toBe('NumericConversionError');
      expect(error.field).toBe('grid offset');
      expect(error.token).toBe('abc');
      expect(error.message).toBe("Cannot convert grid offset 'abc' to a number");
    });
  });

  describe('TransportError', () => {
    it('keeps status, url and cause', () => {
      const cause = new Error('socket hang up');
      const error = new TransportError('Request failed', {
        status: 503,
        url: 'https://calc.example.com',
        cause,
      });

      expect(error.kind).toBe('Transport');
      expect(error.status).toBe(503);
      expect(error.url).toBe('https://calc.example.com');
      expect(error.cause).toBe(cause);
    });

    it('leaves status undefined for network failures', () => {
      const error = new TransportError('fetch failed');

      expect(error.status).toBeUndefined();
      expect(error.cause).toBeUndefined();
    });
  });

  describe('DecodeError', () => {
    it('includes the response row in format', () => {
      const error = new DecodeError('Expected at least 5 fields', '2015.5,61.1');

      expect(error.format()).toBe(
        "DecodeError: Expected at least 5 fields\n  response row: '2015.5,61.1'"
      );
    });
  });

  describe('ConfigError', () => {
    it('records the setting', () => {
      const error = new ConfigError('MAGDECL_TIMEOUT_MS', 'must be a positive integer');

      expect(error.kind).toBe('Config');
      expect(error.setting).toBe('MAGDECL_TIMEOUT_MS');
    });
  });

  describe('PipelineAbortedError', () => {
    it('wraps the stage error', () => {
      const reason = new TransportError('HTTP 500 Internal Server Error', { status: 500 });
      const error = new PipelineAbortedError('fetch', reason, { lineNumber: 4, raw: 'x' });

      expect(error.kind).toBe('Aborted');
      expect(error.stage).toBe('fetch');
      expect(error.reason).toBe(reason);
      expect(error.message).toBe('Run aborted in fetch stage: HTTP 500 Internal Server Error');
      expect(error).toBeInstanceOf(DeclinationError);
    });
  });
});
