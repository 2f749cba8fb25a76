import { describe, expect, test } from 'vitest';

import { createAbortError } from './abort-error';
import { AiAdapterTimeoutError } from './ai-adapter-timeout-error';
import { PipelineConfigError } from './pipeline-config-error';
import { SourceUnavailableError } from './source-unavailable-error';

describe('SourceUnavailableError', () => {
  test('should carry the source name and cause', () => {
    const cause = new Error('ENOENT: no such file');
    const error = new SourceUnavailableError('report.pdf', cause);

    expect(error.name).toBe('SourceUnavailableError');
    expect(error.sourceName).toBe('report.pdf');
    expect(error.cause).toBe(cause);
    expect(error.message).toBe(
      'Document source "report.pdf" could not be opened: ENOENT: no such file',
    );
  });

  test('should stringify non-Error causes', () => {
    const error = new SourceUnavailableError('scan.pdf', 'bad header');

    expect(error.message).toBe(
      'Document source "scan.pdf" could not be opened: bad header',
    );
    expect(error).toBeInstanceOf(Error);
  });
});

describe('AiAdapterTimeoutError', () => {
  test('should report the timeout', () => {
    const error = new AiAdapterTimeoutError(1500);

    expect(error.name).toBe('AiAdapterTimeoutError');
    expect(error.timeoutMs).toBe(1500);
    expect(error.message).toBe('AI extraction call timed out after 1500ms');
  });
});

describe('PipelineConfigError', () => {
  test('should join validation issues', () => {
    const error = new PipelineConfigError([
      'analyzer.maxPagesPerGroup: Too small',
      'router.requestTimeoutMs: Invalid input',
    ]);

    expect(error.name).toBe('PipelineConfigError');
    expect(error.message).toBe(
      'Invalid pipeline configuration: analyzer.maxPagesPerGroup: Too small; router.requestTimeoutMs: Invalid input',
    );
  });
});

describe('createAbortError', () => {
  test('should create an error named AbortError', () => {
    const error = createAbortError('Group routing was aborted');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AbortError');
    expect(error.message).toBe('Group routing was aborted');
  });
});
