import { describe, it, expect, vi, afterEach } from 'vitest';
import { configService } from './config';

describe('ConfigService', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    configService.reset();
  });

  it('uses the review defaults when nothing is set', () => {
    vi.stubEnv('REVIEW_MAX_CANDIDATES', '');
    vi.stubEnv('REVIEW_MAX_CONTEXT_CHARS', '');
    configService.reset();

    expect(configService.getReviewConfig()).toMatchObject({ maxCandidates: 50, maxContextChars: 30000 });
  });

  it('reads the environment again after reset', () => {
    vi.stubEnv('SEGMENT_MIN_LENGTH', '4');
    configService.reset();
    expect(configService.getSegmentConfig().minLength).toBe(4);

    vi.stubEnv('SEGMENT_MIN_LENGTH', 'not-a-number');
    expect(configService.getSegmentConfig().minLength).toBe(4);
    configService.reset();
    expect(configService.getSegmentConfig().minLength).toBe(3);
  });

  it('falls back to DASHSCOPE_API_KEY', () => {
    vi.stubEnv('LLM_API_KEY', '');
    vi.stubEnv('DASHSCOPE_API_KEY', 'test-secret');
    configService.reset();

    expect(configService.getLLMConfig().apiKey).toBe('test-secret');
  });
});
