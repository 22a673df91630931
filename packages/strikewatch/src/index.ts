/**
 * Strikewatch - lightning strike archive
 *
 * @example
 * ```typescript
 * import { loadConfig, StrikewatchService } from 'strikewatch';
 *
 * const service = StrikewatchService.open(await loadConfig());
 * const rows = service.store.queryRange(start, end, { lat: 45.76, lon: 4.84 }, 30);
 * service.close();
 * ```
 *
 * @packageDocumentation
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export * from './core/time-slots.js';
export * from './core/geo-utils.js';
export {
  loadConfig,
  validateConfig,
  resolveCredentials,
  DEFAULT_CONFIG,
  type StrikewatchConfig,
  type ProviderConfig,
  type PathsConfig,
  type IngestConfig,
  type RetentionConfig,
  type ScheduleConfig,
  type QualityBands,
  type GeocodingConfig,
  type NotifierKind,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './core/config.js';
export { StrikewatchService, type ServiceOverrides } from './core/strikewatch-service.js';
export { createLogger, configureLogging, type LogLevel } from './core/utils/logger.js';

// Store
export {
  SpatialStore,
  type SpatialStoreOptions,
  type QueryOptions,
  type StoreStats,
  type ListEventsOptions,
} from './persistence/spatial-store.js';

// Acquisition
export {
  IngestPipeline,
  type IngestRequest,
  type IngestResult,
  type IngestObserver,
  type Ingestor,
  type UnitOutcome,
  type UnitStatus,
} from './acquisition/ingest-pipeline.js';
export {
  ProviderClient,
  PAYLOAD_VARIANTS,
  type PayloadFetcher,
  type FetchedPayload,
} from './acquisition/provider-client.js';
export { parsePayload, decodePayload, type ParsedPayload } from './acquisition/payload-parser.js';
export { PayloadArchive } from './acquisition/payload-archive.js';

// Retention and scheduling
export {
  RetentionManager,
  type PurgeOptions,
  type PurgeReport,
  type Purger,
} from './retention/retention-manager.js';
export {
  UpdateCoordinator,
  IngestAttemptFailed,
  type CoordinatorReport,
  type StepStatus,
} from './scheduling/update-coordinator.js';
export {
  createNotifier,
  DesktopNotifier,
  LogNotifier,
  type Notifier,
} from './scheduling/notifier.js';

// Export
export { buildKml, buildKmz, writeKmz, styleForQuality, type KmlOptions } from './export/kmz-writer.js';
export { toFeatureCollection, writeGeoJSON } from './export/geojson.js';

// Geocoding
export { Geocoder, createGeocoder } from './geocoding/geocoder.js';
export { NominatimProvider } from './geocoding/providers/nominatim.js';
export { GoogleProvider } from './geocoding/providers/google.js';
export {
  GeocodeError,
  GeocodeErrorCode,
  type GeocodeResult,
  type GeocodingProvider,
} from './geocoding/types.js';
