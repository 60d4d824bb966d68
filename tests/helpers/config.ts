import { loadConfig, type AppConfig } from '../../src/config.js';

export function testConfig(galleryDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  const base = loadConfig({
    HUGGINGFACE_API_KEY: 'hf_test-secret',
    HUGGINGFACE_API_URL: 'https://inference.test/models/',
    IMAGECRAFT_MODEL: 'test/model',
    IMAGECRAFT_GALLERY_DIR: galleryDir,
    IMAGECRAFT_VARIATION_SPACING_MS: '0',
    IMAGECRAFT_BACKOFF_BASE_MS: '100',
    IMAGECRAFT_MAX_DELAY_MS: '1000',
  });
  return { ...base, ...overrides };
}
