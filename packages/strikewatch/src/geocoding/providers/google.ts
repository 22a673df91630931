/**
 * Google Geocoding API provider
 *
 * Fallback used only when an API key is configured.
 */

import { z } from 'zod';
import {
  DEFAULT_USER_AGENT,
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  redactUrl,
} from '../../core/http-client.js';
import {
  GeocodeError,
  GeocodeErrorCode,
  type GeocodeResult,
  type GeocodingProvider,
} from '../types.js';

const GEOCODE_ENDPOINT = 'https://maps.googleapis.com/maps/api/geocode/json';

const GoogleResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        formatted_address: z.string().default(''),
        geometry: z.object({
          location: z.object({ lat: z.number(), lng: z.number() }),
        }),
      })
    )
    .default([]),
});

export interface GoogleOptions {
  readonly apiKey: string;
  readonly language?: string;
  readonly http?: HTTPClient;
}

export class GoogleProvider implements GeocodingProvider {
  readonly name = 'google';

  private readonly apiKey: string;
  private readonly language: string;
  private readonly http: HTTPClient;

  constructor(options: GoogleOptions) {
    this.apiKey = options.apiKey;
    this.language = options.language ?? 'en';
    this.http =
      options.http ?? new HTTPClient({ userAgent: DEFAULT_USER_AGENT, timeoutMs: 10_000, maxRetries: 1 });
  }

  requestUrl(query: string): string {
    const params = new URLSearchParams({ address: query, key: this.apiKey, language: this.language });
    return `${GEOCODE_ENDPOINT}?${params.toString()}`;
  }

  async geocode(query: string): Promise<GeocodeResult> {
    const trimmed = query.trim();
    if (trimmed === '') {
      throw new GeocodeError('Empty address', GeocodeErrorCode.INVALID_QUERY, this.name);
    }

    const url = this.requestUrl(trimmed);
    let body: unknown;
    try {
      body = await this.http.fetchJSON<unknown>(url);
    } catch (error) {
      // The key travels in the query string; keep it out of messages
      const message = error instanceof Error ? error.message.split(url).join(redactUrl(url)) : String(error);
      const code =
        error instanceof HTTPError || error instanceof HTTPJSONParseError
          ? GeocodeErrorCode.PROVIDER_ERROR
          : GeocodeErrorCode.NETWORK_ERROR;
      throw new GeocodeError(message, code, this.name);
    }

    const parsed = GoogleResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GeocodeError('Unexpected response shape', GeocodeErrorCode.PROVIDER_ERROR, this.name);
    }

    const { status, results, error_message: detail } = parsed.data;
    if (status === 'ZERO_RESULTS') {
      throw new GeocodeError(`Address not found: ${trimmed}`, GeocodeErrorCode.NOT_FOUND, this.name);
    }
    if (status !== 'OK') {
      throw new GeocodeError(
        detail ? `${status}: ${detail}` : status,
        GeocodeErrorCode.PROVIDER_ERROR,
        this.name
      );
    }

    const hit = results[0];
    if (!hit) {
      throw new GeocodeError(`Address not found: ${trimmed}`, GeocodeErrorCode.NOT_FOUND, this.name);
    }

    return {
      latitude: hit.geometry.location.lat,
      longitude: hit.geometry.location.lng,
      label: hit.formatted_address || trimmed,
      source: this.name,
    };
  }
}
