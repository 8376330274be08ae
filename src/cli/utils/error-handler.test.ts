// Tests for CLI error formatting

import { describe, it, expect, vi, afterEach } from 'vitest';
import { exitCodeFor, formatError, withErrorHandling } from './error-handler.js';
import {
  LinkNotFoundError,
  NotAcceptableError,
  RouteNotFoundError,
  UriTemplateError,
  ValidationError
} from '../../core/errors.js';

describe('formatError', () => {
  it('should name the field of validation errors', () => {
    expect(formatError(new ValidationError('Bad curie', 'curie'))).toBe('Validation Error (field: curie): Bad curie');
    expect(formatError(new ValidationError('Bad input'))).toBe('Validation Error: Bad input');
  });

  it('should report missing links as not found', () => {
    expect(formatError(new LinkNotFoundError('next'))).toBe("Not Found: No link with rel 'next' found");
  });

  it('should include the code of other hypermedia errors', () => {
    expect(formatError(new NotAcceptableError('text/html', ['application/hal+json'])))
      .toBe("Error [NOT_ACCEPTABLE]: None of the supported media types match 'text/html'");
    expect(formatError(new UriTemplateError('Unclosed expression', '/a{b', 2)))
      .toBe('Error [URI_TEMPLATE_ERROR]: Unclosed expression');
  });

  it('should handle plain errors and other values', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('boom')).toBe('Unknown error: boom');
  });
});

describe('exitCodeFor', () => {
  it('should map error kinds to exit codes', () => {
    expect(exitCodeFor(new ValidationError('x'))).toBe(2);
    expect(exitCodeFor(new LinkNotFoundError('next'))).toBe(4);
    expect(exitCodeFor(new RouteNotFoundError('OrderController', 'show'))).toBe(4);
    expect(exitCodeFor(new Error('x'))).toBe(1);
  });
});

describe('withErrorHandling', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the error and exit with its code', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation(code => {
      throw new Error(`exit ${String(code)}`);
    });

    const action = withErrorHandling(() => {
      throw new ValidationError('Bad template', 'template');
    });

    await expect(action()).rejects.toThrow('exit 2');
    expect(error).toHaveBeenCalledWith('\n❌ Validation Error (field: template): Bad template\n');
  });

  it('should pass arguments through', async () => {
    const seen: string[] = [];
    await withErrorHandling(async (value: string) => {
      seen.push(value);
    })('order');
    expect(seen).toEqual(['order']);
  });
});
