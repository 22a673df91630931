/**
 * Nominatim Provider (OpenStreetMap, global, free)
 *
 * The public instance allows one request per second and requires an
 * identifying User-Agent; requests are spaced by `cooldownMs`.
 */

import { z } from 'zod';
import {
  DEFAULT_USER_AGENT,
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
} from '../../core/http-client.js';
import { systemClock, type Clock } from '../../core/types.js';
import { createLogger } from '../../core/utils/logger.js';
import {
  GeocodeError,
  GeocodeErrorCode,
  type GeocodeResult,
  type GeocodingProvider,
} from '../types.js';

const logger = createLogger({ module: 'geocoding' });

const NominatimHitSchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
  display_name: z.string().default(''),
});

const NominatimResponseSchema = z.array(NominatimHitSchema);

export interface NominatimOptions {
  readonly baseUrl?: string;
  readonly userAgent?: string;
  readonly language?: string;
  /** Minimum spacing between requests (default 1100 ms) */
  readonly cooldownMs?: number;
  readonly http?: HTTPClient;
  readonly clock?: Clock;
  readonly sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class NominatimProvider implements GeocodingProvider {
  readonly name = 'nominatim';

  private readonly baseUrl: string;
  private readonly language: string;
  private readonly cooldownMs: number;
  private readonly http: HTTPClient;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastRequestAt: number | null = null;

  constructor(options: NominatimOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://nominatim.openstreetmap.org').replace(/\/+$/, '');
    this.language = options.language ?? 'en';
    this.cooldownMs = options.cooldownMs ?? 1100;
    this.http =
      options.http ??
      new HTTPClient({
        userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
        timeoutMs: 10_000,
        maxRetries: 1,
      });
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
  }

  searchUrl(query: string, limit = 1): string {
    const params = new URLSearchParams({
      q: query,
      format: 'json',
      limit: String(limit),
      'accept-language': this.language,
    });
    return `${this.baseUrl}/search?${params.toString()}`;
  }

  async geocode(query: string): Promise<GeocodeResult> {
    const trimmed = query.trim();
    if (trimmed === '') {
      throw new GeocodeError('Empty address', GeocodeErrorCode.INVALID_QUERY, this.name);
    }

    await this.waitForCooldown();

    let body: unknown;
    try {
      body = await this.http.fetchJSON<unknown>(this.searchUrl(trimmed));
    } catch (error) {
      throw this.toGeocodeError(error);
    } finally {
      this.lastRequestAt = this.clock().getTime();
    }

    const parsed = NominatimResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GeocodeError(
        `Unexpected response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        GeocodeErrorCode.PROVIDER_ERROR,
        this.name
      );
    }

    const hit = parsed.data[0];
    if (!hit) {
      throw new GeocodeError(`Address not found: ${trimmed}`, GeocodeErrorCode.NOT_FOUND, this.name);
    }

    logger.debug('Geocoded', { query: trimmed, lat: hit.lat, lon: hit.lon });
    return {
      latitude: hit.lat,
      longitude: hit.lon,
      label: hit.display_name || trimmed,
      source: this.name,
    };
  }

  private async waitForCooldown(): Promise<void> {
    if (this.lastRequestAt === null) return;
    const elapsed = this.clock().getTime() - this.lastRequestAt;
    const remaining = this.cooldownMs - elapsed;
    if (remaining > 0) {
      await this.sleep(remaining);
    }
  }

  private toGeocodeError(error: unknown): GeocodeError {
    if (error instanceof HTTPError || error instanceof HTTPJSONParseError) {
      return new GeocodeError(error.message, GeocodeErrorCode.PROVIDER_ERROR, this.name);
    }
    return new GeocodeError(
      error instanceof Error ? error.message : String(error),
      GeocodeErrorCode.NETWORK_ERROR,
      this.name
    );
  }
}
