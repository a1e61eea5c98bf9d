import { describe, it, expect } from 'vitest';
import { HttpError } from './types.js';

describe('HttpError', () => {
  it('creates error with statusCode and message', () => {
    const err = new HttpError(404, 'Not found');
    expect(err.statusCode).toBe(404);
    expect(err.message).toBe('Not found');
    expect(err.name).toBe('HttpError');
    expect(err.code).toBeUndefined();
  });

  it('carries an optional machine-readable code', () => {
    const err = new HttpError(500, 'Invalid return state, unable to redirect.', 'InvalidState');
    expect(err.code).toBe('InvalidState');
  });

  it('extends Error and is instanceof Error', () => {
    const err = new HttpError(401, 'Not signed in');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(HttpError);
  });
});
