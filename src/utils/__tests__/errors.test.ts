import { describe, it, expect } from 'vitest';
import * as errorsModule from '../errors.js';
import {
  DataLoadError,
  EmptyResultError,
  formatErrorForUser,
  getErrorMessage,
  StayscopeError,
  ValidationError
} from '../errors.js';

describe('errors', () => {
  it('should export only errors the library raises or reserves', () => {
    expect(Object.keys(errorsModule).sort()).toEqual([
      'DataLoadError',
      'EmptyResultError',
      'StayscopeError',
      'ValidationError',
      'formatErrorForUser',
      'getErrorMessage'
    ]);
  });

  it('should keep the message as the single issue by default', () => {
    const error = new ValidationError('limit must be a positive integer');

    expect(error).toBeInstanceOf(StayscopeError);
    expect(error.name).toBe('ValidationError');
    expect(error.issues).toEqual(['limit must be a positive integer']);
  });

  it('should name the file in DataLoadError', () => {
    const error = new DataLoadError('survey.csv', 'file is empty');

    expect(error.message).toBe('Failed to load survey.csv: file is empty');
    expect(error.filePath).toBe('survey.csv');
  });

  it('should give EmptyResultError a default message', () => {
    expect(new EmptyResultError().message).toBe('Aggregation produced no groups');
  });

  it('should extract messages from non-Error values', () => {
    expect(getErrorMessage('plain failure')).toBe('plain failure');
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('should list validation issues when there are several', () => {
    const error = new ValidationError('Invalid aggregation config: a; b', ['a', 'b']);

    expect(formatErrorForUser(error)).toBe('Invalid aggregation config: a; b\n  • a\n  • b');
  });

  it('should print a lone issue once', () => {
    expect(formatErrorForUser(new ValidationError('bad limit'))).toBe('bad limit');
  });
});
