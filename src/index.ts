export * from './errors.js';
export * from './types.js';
export {
  loadConfig,
  findSizePreset,
  IMAGE_SIZES,
  LIMITS,
  DEFAULT_MODEL,
  HUGGINGFACE_API_URL,
  type AppConfig,
  type GenerationDefaults,
  type RetryPolicy,
  type SizePreset,
  type LogLevel,
} from './config.js';
export { createLogger, setLogLevel, type Logger } from './logger.js';
export { STYLE_PRESETS, DEFAULT_STYLE, createStyleCatalog, styleCatalog, type StyleCatalog } from './styles.js';
export { buildRequest, validateRequest, parseGenerationInput, type GenerationInput } from './request.js';
export {
  InferenceClient,
  clampDelay,
  backoffDelay,
  type InferenceClientOptions,
  type GenerateOptions,
  type AttemptInfo,
  type ConnectionStatus,
  type FetchLike,
  type SleepFn,
} from './services/inference.js';
export {
  decode,
  encode,
  resize,
  thumbnail,
  imageInfo,
  prepareDownload,
  sniffFormat,
  fitDimensions,
  type ImageFormat,
  type RasterImage,
  type ImageInfo,
  type DownloadPayload,
} from './image/processor.js';
export { packageArchive, archiveFileName, type ArchiveItem, type ArchiveOptions } from './image/archive.js';
export { GalleryStore, defaultIdGenerator, isValidEntryId, type GalleryStoreOptions, type IdGenerator } from './gallery.js';
export {
  Studio,
  describeFailure,
  successMessage,
  GENERATION_FAILED,
  type StudioEvent,
  type GenerationOutcome,
  type FailureReport,
} from './studio.js';
export { createApp, toPublicEntry, type AppOptions } from './app.js';
