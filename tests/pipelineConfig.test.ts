import { DEFAULT_SEVERITY_THRESHOLDS, loadPipelineConfig } from '../server/config/pipelineConfig';

describe('Pipeline config', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadPipelineConfig({})).toEqual({
      maxImageBytes: 12582912,
      maxUploadBytes: 104857600,
      maxImagesPerSubmission: null,
      severityThresholds: { medium: 0.5, high: 0.85 },
      recommendationTimeoutMs: 5000,
      inferenceConcurrency: 4,
      modelPath: 'models/crop-disease',
      uploadDir: 'uploads/analysis_images',
      openaiApiKey: undefined,
      openaiModel: 'gpt-4o-mini',
      port: 5000,
    });
    expect(loadPipelineConfig({}).severityThresholds).toEqual(DEFAULT_SEVERITY_THRESHOLDS);
  });

  it('reads overrides from the environment', () => {
    const config = loadPipelineConfig({
      MAX_IMAGE_SIZE_MB: '2.5',
      MAX_IMAGES_PER_SUBMISSION: '8',
      SEVERITY_MEDIUM_THRESHOLD: '0.4',
      SEVERITY_HIGH_THRESHOLD: '0.9',
      RECOMMENDATION_TIMEOUT_MS: '1500',
      INFERENCE_CONCURRENCY: '2',
      OPENAI_API_KEY: 'test-secret',
      PORT: '8080',
    });

    expect(config).toMatchObject({
      maxImageBytes: 2621440,
      maxImagesPerSubmission: 8,
      severityThresholds: { medium: 0.4, high: 0.9 },
      recommendationTimeoutMs: 1500,
      inferenceConcurrency: 2,
      openaiApiKey: 'test-secret',
      port: 8080,
    });
  });

  it('treats blank values as unset', () => {
    const config = loadPipelineConfig({ MAX_IMAGE_SIZE_MB: '  ', OPENAI_API_KEY: '', MAX_IMAGES_PER_SUBMISSION: '' });

    expect(config.maxImageBytes).toBe(12582912);
    expect(config.openaiApiKey).toBeUndefined();
    expect(config.maxImagesPerSubmission).toBeNull();
  });

  it('requires the high threshold to exceed the medium one', () => {
    expect(() => loadPipelineConfig({ SEVERITY_MEDIUM_THRESHOLD: '0.7', SEVERITY_HIGH_THRESHOLD: '0.7' })).toThrow(
      'Invalid pipeline configuration - SEVERITY_HIGH_THRESHOLD: must be greater than SEVERITY_MEDIUM_THRESHOLD',
    );
  });

  it('keeps the request cap at or above the image cap', () => {
    expect(loadPipelineConfig({ MAX_IMAGE_SIZE_MB: '20', MAX_UPLOAD_SIZE_MB: '20' }).maxUploadBytes).toBe(20971520);
    expect(() => loadPipelineConfig({ MAX_IMAGE_SIZE_MB: '20', MAX_UPLOAD_SIZE_MB: '10' })).toThrow(
      'Invalid pipeline configuration - MAX_UPLOAD_SIZE_MB: must be at least MAX_IMAGE_SIZE_MB',
    );
  });

  it('names the offending variable', () => {
    expect(() => loadPipelineConfig({ INFERENCE_CONCURRENCY: '0' })).toThrow(
      /^Invalid pipeline configuration - INFERENCE_CONCURRENCY: /,
    );
    expect(() => loadPipelineConfig({ SEVERITY_HIGH_THRESHOLD: '1.5' })).toThrow(/SEVERITY_HIGH_THRESHOLD/);
  });

  it('returns a frozen config', () => {
    const config = loadPipelineConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.severityThresholds)).toBe(true);
  });
});
