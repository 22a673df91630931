import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { IngestConfig, ScheduleConfig } from '../core/config.js';
import { CredentialsMissing } from '../core/errors.js';
import type { Credentials } from '../core/types.js';
import type { IngestRequest, IngestResult, Ingestor } from '../acquisition/ingest-pipeline.js';
import { SpatialStore } from '../persistence/spatial-store.js';
import { RetentionManager } from '../retention/retention-manager.js';
import type { Notifier } from './notifier.js';
import { UpdateCoordinator } from './update-coordinator.js';

const NOW = new Date('2024-06-20T12:05:00Z');

const schedule: ScheduleConfig = {
  ingestStalenessHours: 8,
  purgeStalenessHours: 24,
  updateRetries: 2,
  updateRetryDelayMs: 0,
  safetyMarginMinutes: 30,
  notifier: 'log',
};

const ingest: Pick<IngestConfig, 'maxLookbackDays' | 'slotMinutes' | 'concurrency' | 'retry'> = {
  maxLookbackDays: 15,
  slotMinutes: 10,
  concurrency: 2,
  retry: 1,
};

const credentials = (): Credentials => ({ username: 'test-user', password: 'test-secret' });

const resultFor = (request: IngestRequest, attempted: number, succeeded: number): IngestResult => ({
  start: request.start.toISOString(),
  end: request.end.toISOString(),
  unitsPlanned: attempted,
  unitsSkipped: 0,
  unitsAttempted: attempted,
  unitsSucceeded: succeeded,
  unitsFailed: attempted - succeeded,
  strikesInserted: succeeded * 10,
  outcomes: [],
});

class RecordingNotifier implements Notifier {
  readonly messages: string[] = [];

  async notify(_title: string, message: string): Promise<void> {
    this.messages.push(message);
  }
}

describe('UpdateCoordinator', () => {
  let store: SpatialStore;
  let notifier: RecordingNotifier;

  beforeEach(() => {
    store = SpatialStore.open(':memory:', { clock: () => NOW });
    store.ensureSchema();
    notifier = new RecordingNotifier();
  });

  afterEach(() => {
    store.close();
  });

  const coordinatorWith = (
    ingestFn: (request: IngestRequest) => Promise<IngestResult>,
    getCredentials: () => Credentials = credentials
  ): { coordinator: UpdateCoordinator; pipeline: { ingest: Mock<Ingestor['ingest']> } } => {
    const pipeline = { ingest: vi.fn<Ingestor['ingest']>(ingestFn) };
    const coordinator = new UpdateCoordinator({
      store,
      pipeline,
      retention: new RetentionManager(
        store,
        { impactsMaxAgeDays: 15, eventGraceDays: 2, disableEventPurge: false },
        () => NOW
      ),
      notifier,
      schedule,
      ingest,
      credentials: getCredentials,
      clock: () => NOW,
    });
    return { coordinator, pipeline };
  };

  it('should backfill the lookback window on a fresh store', async () => {
    const { coordinator, pipeline } = coordinatorWith(async (request) => resultFor(request, 3, 3));

    const report = await coordinator.run();

    expect(report).toMatchObject({ ingest: 'succeeded', purge: 'succeeded', exitCode: 0, attempts: 1 });
    const request = pipeline.ingest.mock.calls[0]?.[0];
    expect(request?.start.toISOString()).toBe('2024-06-05T11:30:00.000Z');
    expect(request?.end.toISOString()).toBe('2024-06-20T11:30:00.000Z');
    expect(request?.concurrency).toBe(2);
    expect(store.listEvents().map((event) => event.kind)).toEqual([
      'purge',
      'download_success',
      'download_attempt',
    ]);
  });

  it('should do nothing on a second run', async () => {
    const { coordinator, pipeline } = coordinatorWith(async (request) => resultFor(request, 3, 3));

    await coordinator.run();
    const second = await coordinator.run();

    expect(second).toMatchObject({ ingest: 'skipped', purge: 'skipped', exitCode: 0, attempts: 0 });
    expect(pipeline.ingest).toHaveBeenCalledTimes(1);
  });

  it('should start the window one slot after the latest strike', () => {
    store.insertStrikes(new Date('2024-06-20T10:00:00Z'), [{ lat: 45, lon: 5, quality: 100 }]);
    const { coordinator } = coordinatorWith(async (request) => resultFor(request, 1, 1));

    const window = coordinator.computeWindow();

    expect(window?.start.toISOString()).toBe('2024-06-20T10:10:00.000Z');
    expect(window?.end.toISOString()).toBe('2024-06-20T11:30:00.000Z');
  });

  it('should record success without ingesting when already up to date', async () => {
    store.insertStrikes(new Date('2024-06-20T11:20:00Z'), [{ lat: 45, lon: 5, quality: 100 }]);
    const { coordinator, pipeline } = coordinatorWith(async (request) => resultFor(request, 1, 1));

    const report = await coordinator.run();

    expect(report.ingest).toBe('succeeded');
    expect(report.lastIngest).toBeNull();
    expect(pipeline.ingest).not.toHaveBeenCalled();
    expect(store.listEvents({ kind: 'download_success' })[0]?.details).toEqual({ up_to_date: true, attempt: 1 });
  });

  it('should retry a failed ingest and notify after each failure', async () => {
    let calls = 0;
    const { coordinator } = coordinatorWith(async (request) => {
      calls++;
      return calls < 3 ? resultFor(request, 2, 0) : resultFor(request, 2, 2);
    });

    const report = await coordinator.run();

    expect(report).toMatchObject({ ingest: 'succeeded', attempts: 3, exitCode: 0 });
    expect(notifier.messages).toEqual([
      'Strike sync failed at 12:05 UTC. Next attempt scheduled at 12:05 UTC.',
      'Strike sync failed at 12:05 UTC. Next attempt scheduled at 12:05 UTC.',
    ]);
    const errors = store.listEvents({ kind: 'download_error' });
    expect(errors).toHaveLength(2);
    expect(errors[0]?.details).toMatchObject({ reason: 'All 2 attempted slots failed' });
  });

  it('should give up after every retry fails', async () => {
    const { coordinator, pipeline } = coordinatorWith(async (request) => resultFor(request, 2, 0));

    const report = await coordinator.run();

    expect(report).toMatchObject({ ingest: 'failed', purge: 'succeeded', exitCode: 1, attempts: 3 });
    expect(pipeline.ingest).toHaveBeenCalledTimes(3);
    expect(notifier.messages[2]).toBe('Strike sync failed after 3 consecutive attempts.');
    expect(notifier.messages).toHaveLength(3);
  });

  it('should not retry when credentials are missing', async () => {
    const { coordinator, pipeline } = coordinatorWith(
      async (request) => resultFor(request, 1, 1),
      () => {
        throw new CredentialsMissing('no provider login');
      }
    );

    const report = await coordinator.run();

    expect(report).toMatchObject({ ingest: 'failed', purge: 'succeeded', exitCode: 1, attempts: 1 });
    expect(pipeline.ingest).not.toHaveBeenCalled();
    expect(notifier.messages).toEqual(['Strike sync cannot start: no provider login']);
  });

  it('should treat the ingest as due only after the staleness window', () => {
    const { coordinator } = coordinatorWith(async (request) => resultFor(request, 1, 1));
    expect(coordinator.shouldIngest()).toBe(true);

    store.recordEvent('download_success', {});
    expect(coordinator.shouldIngest()).toBe(false);
  });
});
