/**
 * StrikewatchService - composition root
 *
 * Wires one store, one ingest pipeline, retention, the update coordinator
 * and the geocoder from a loaded {@link StrikewatchConfig}. Every CLI
 * command builds one of these and closes it when done.
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const service = StrikewatchService.open(config);
 * try {
 *   await service.pipeline.ingest({ start, end, credentials: service.credentials() });
 * } finally {
 *   service.close();
 * }
 * ```
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { IngestPipeline, type IngestObserver } from '../acquisition/ingest-pipeline.js';
import { PayloadArchive } from '../acquisition/payload-archive.js';
import { ProviderClient, type PayloadFetcher } from '../acquisition/provider-client.js';
import { createGeocoder, type Geocoder } from '../geocoding/geocoder.js';
import { SpatialStore } from '../persistence/spatial-store.js';
import { RetentionManager } from '../retention/retention-manager.js';
import { createNotifier, type Notifier } from '../scheduling/notifier.js';
import { UpdateCoordinator } from '../scheduling/update-coordinator.js';
import { resolveCredentials, type StrikewatchConfig } from './config.js';
import { toStorageError } from './errors.js';
import { systemClock, type Clock, type Credentials } from './types.js';

/**
 * Replaceable collaborators (tests swap the network-facing ones)
 */
export interface ServiceOverrides {
  readonly fetcher?: PayloadFetcher;
  readonly notifier?: Notifier;
  readonly geocoder?: Geocoder;
  readonly observers?: readonly IngestObserver[];
  readonly clock?: Clock;
}

export class StrikewatchService {
  readonly config: StrikewatchConfig;
  readonly store: SpatialStore;
  readonly pipeline: IngestPipeline;
  readonly retention: RetentionManager;
  readonly coordinator: UpdateCoordinator;
  readonly archive: PayloadArchive | null;

  private readonly overrides: ServiceOverrides;
  private geocoderInstance: Geocoder | null;

  private constructor(config: StrikewatchConfig, store: SpatialStore, overrides: ServiceOverrides) {
    const clock = overrides.clock ?? systemClock;
    this.config = config;
    this.store = store;
    this.overrides = overrides;
    this.geocoderInstance = overrides.geocoder ?? null;

    this.archive = config.ingest.archivePayloads ? new PayloadArchive(config.paths.archive) : null;

    const observers: IngestObserver[] = [...(overrides.observers ?? [])];
    if (this.archive) observers.push(this.archive);

    this.pipeline = new IngestPipeline({
      store,
      fetcher:
        overrides.fetcher ??
        new ProviderClient(config.provider, { retryBaseDelayMs: config.ingest.retryBaseDelayMs }),
      config: config.ingest,
      observers,
      clock,
    });

    this.retention = new RetentionManager(store, config.retention, clock);

    this.coordinator = new UpdateCoordinator({
      store,
      pipeline: this.pipeline,
      retention: this.retention,
      notifier: overrides.notifier ?? createNotifier(config.schedule.notifier),
      schedule: config.schedule,
      ingest: config.ingest,
      credentials: () => this.credentials(),
      clock,
    });
  }

  /**
   * Open the configured store and bring its schema up to date
   *
   * @throws {StorageUnavailable}
   */
  static open(config: StrikewatchConfig, overrides: ServiceOverrides = {}): StrikewatchService {
    if (config.paths.database !== ':memory:') {
      try {
        mkdirSync(dirname(config.paths.database), { recursive: true });
      } catch (error) {
        throw toStorageError('open', error);
      }
    }

    const store = SpatialStore.open(config.paths.database, { clock: overrides.clock });
    try {
      store.ensureSchema();
    } catch (error) {
      store.close();
      throw error;
    }
    return new StrikewatchService(config, store, overrides);
  }

  /**
   * @throws {CredentialsMissing}
   */
  credentials(): Credentials {
    return resolveCredentials(this.config.provider);
  }

  /** Built on first use; most commands never geocode */
  get geocoder(): Geocoder {
    this.geocoderInstance ??= createGeocoder(this.config.geocoding);
    return this.geocoderInstance;
  }

  get clock(): Clock {
    return this.overrides.clock ?? systemClock;
  }

  close(): void {
    this.store.close();
  }
}
