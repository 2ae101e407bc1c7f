/**
 * Tests for error handling system
 *
 * Tests cover:
 * - Error class instantiation and properties
 * - Pipeline error taxonomy and exit codes
 * - Error formatting (text and JSON)
 */

import { describe, it, expect } from 'vitest';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  StoreUnavailableError,
  EmptyDocumentError,
  UnsupportedFormatError,
  TransientProviderError,
  PermanentProviderError,
  FieldExtractionFailure,
  AgentTotalFailure,
  WorkflowTimeoutError,
  isFatalPipelineError,
  formatError,
  getExitCode,
  errorMessage,
} from '../index.js';

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('is instanceof Error', () => {
      const error = new CLIError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('FileNotFoundError', () => {
    it('creates error with path', () => {
      const error = new FileNotFoundError('/path/to/file');

      expect(error.message).toBe('Path does not exist: /path/to/file');
      expect(error.code).toBe(3);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('ConfigError', () => {
    it('creates error with default hint', () => {
      const error = new ConfigError('Invalid option');

      expect(error.hint).toBe('Run: tender-insight config list  to see valid options');
      expect(error.code).toBe(2);
    });

    it('creates error with custom hint', () => {
      expect(new ConfigError('Invalid option', 'Custom hint').hint).toBe('Custom hint');
    });
  });

  describe('APIKeyError', () => {
    it('names the environment variable', () => {
      const error = new APIKeyError('OpenAI');

      expect(error.message).toBe('OpenAI API key not configured');
      expect(error.hint).toContain('OPENAI_API_KEY');
      expect(error.code).toBe(4);
    });
  });

  describe('DatabaseError', () => {
    it('stores cause error', () => {
      const cause = new Error('SQLITE_BUSY');
      const error = new DatabaseError('Database locked', cause);

      expect(error.cause).toBe(cause);
      expect(error.code).toBe(5);
    });
  });

  describe('ValidationError', () => {
    it('lists issues in the hint', () => {
      const error = new ValidationError('Invalid input', ['name: Required']);

      expect(error.hint).toBe('Issues:\n  name: Required');
      expect(error.issues).toEqual(['name: Required']);
    });
  });
});

describe('Pipeline errors', () => {
  it('assigns distinct exit codes', () => {
    const codes = [
      new StoreUnavailableError('down').code,
      new EmptyDocumentError().code,
      new UnsupportedFormatError('.pdf', ['.txt']).code,
      new TransientProviderError('openai', 'rate limited').code,
      new PermanentProviderError('openai', 'bad key').code,
      new FieldExtractionFailure('budget_amount', 'boom').code,
      new AgentTotalFailure('scoring', []).code,
      new WorkflowTimeoutError(100).code,
    ];

    expect(codes).toEqual([6, 7, 8, 9, 10, 11, 12, 13]);
  });

  it('prefixes provider errors with the provider name', () => {
    const error = new TransientProviderError('openai', 'rate limited', { status: 429 });

    expect(error.message).toBe('openai: rate limited');
    expect(error.status).toBe(429);
  });

  it('names the source in EmptyDocumentError', () => {
    expect(new EmptyDocumentError('tender.txt').message).toBe('Document is empty: tender.txt');
    expect(new EmptyDocumentError().message).toBe('Document is empty');
  });

  it('summarizes the first field failure in AgentTotalFailure', () => {
    const failures = [
      new FieldExtractionFailure('payment_terms', 'openai: down'),
      new FieldExtractionFailure('bid_validity', 'openai: down'),
    ];
    const error = new AgentTotalFailure('other_terms', failures);

    expect(error.message).toBe('Agent "other_terms" failed for all 2 fields');
    expect(error.hint).toBe('First failure: Extraction failed for field "payment_terms": openai: down');
  });

  it('classifies fatal errors', () => {
    expect(isFatalPipelineError(new StoreUnavailableError('down'))).toBe(true);
    expect(isFatalPipelineError(new EmptyDocumentError())).toBe(true);
    expect(isFatalPipelineError(new WorkflowTimeoutError(10))).toBe(false);
    expect(isFatalPipelineError(new Error('other'))).toBe(false);
  });
});

describe('formatError', () => {
  it('formats CLIError with hint', () => {
    const output = formatError(new CLIError('Failed', 'Try again'));

    expect(output).toContain('Failed');
    expect(output).toContain('Hint:');
    expect(output).toContain('Try again');
  });

  it('formats standard Error with verbose hint', () => {
    const output = formatError(new Error('Something broke'));

    expect(output).toContain('Something broke');
    expect(output).toContain('--verbose');
  });

  it('outputs JSON for CLIError', () => {
    const output = formatError(new EmptyDocumentError('a.txt'), { json: true });

    expect(JSON.parse(output)).toEqual({
      error: 'Document is empty: a.txt',
      type: 'EmptyDocumentError',
      code: 7,
      hint: 'Scanned documents need OCR before they can be analyzed',
    });
  });

  it('outputs JSON for unknown values', () => {
    expect(JSON.parse(formatError('plain', { json: true }))).toEqual({
      error: 'plain',
      type: 'Unknown',
      code: 1,
    });
  });
});

describe('getExitCode', () => {
  it('uses the CLIError code', () => {
    expect(getExitCode(new WorkflowTimeoutError(5))).toBe(13);
  });

  it('defaults to 1', () => {
    expect(getExitCode(new Error('x'))).toBe(1);
    expect(getExitCode('x')).toBe(1);
  });
});

describe('errorMessage', () => {
  it('reads messages from errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
