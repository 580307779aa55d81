import { describe, it, expect } from 'vitest';
import { VERSION, OPERATION_NAMES, TagReaderClient, WorkerEndpoint } from './index.js';

describe('index', () => {
  it('exports a version string', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('exports the client, the worker endpoint and the operation table', () => {
    expect(typeof TagReaderClient).toBe('function');
    expect(typeof WorkerEndpoint).toBe('function');
    expect(OPERATION_NAMES).toHaveLength(8);
  });
});
