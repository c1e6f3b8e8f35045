export {
  ExifMetadataExtractor,
  EXIF_CAPABLE_EXTENSIONS,
  captureMetadataFromExif,
  createMetadataResolver,
  deviceAssetIdOf,
} from './metadata-extractor.js';
export type {
  CaptureMetadata,
  MetadataExtractor,
  MetadataResolver,
  MetadataResolverOptions,
} from './metadata-extractor.js';
