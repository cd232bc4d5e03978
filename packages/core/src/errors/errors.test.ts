import { describe, it, expect } from 'vitest';
import {
  AcquisitionError,
  ConfigurationError,
  LoopcastError,
  errorMessage,
} from './index.js';

describe('error taxonomy', () => {
  it('carries the acquisition failure reason', () => {
    const error = new AcquisitionError('UNDERSIZED', 'File too small', { fileSize: 512 });

    expect(error).toBeInstanceOf(LoopcastError);
    expect(error.name).toBe('AcquisitionError');
    expect(error.code).toBe('ACQUISITION_ERROR');
    expect(error.reason).toBe('UNDERSIZED');
    expect(error.details).toEqual({ reason: 'UNDERSIZED', fileSize: 512 });
  });

  it('lists the failing configuration fields', () => {
    const error = new ConfigurationError('VIDEO_URL not set', ['VIDEO_URL']);
    expect(error.fields).toEqual(['VIDEO_URL']);
    expect(error.message).toBe('VIDEO_URL not set');
  });

  it('extracts messages from non-errors', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
