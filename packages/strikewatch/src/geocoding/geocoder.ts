/**
 * Geocoding Service Router
 *
 * Tries each configured provider in order and returns the first hit.
 * Nominatim is always present; Google joins the chain when an API key is
 * configured. An invalid query fails immediately, any other provider
 * failure moves on to the next provider.
 */

import type { GeocodingConfig } from '../core/config.js';
import { createLogger } from '../core/utils/logger.js';
import { GoogleProvider } from './providers/google.js';
import { NominatimProvider } from './providers/nominatim.js';
import {
  GeocodeError,
  GeocodeErrorCode,
  type GeocodeResult,
  type GeocodingProvider,
} from './types.js';

export type { GeocodeResult, GeocodingProvider };
export { GeocodeError, GeocodeErrorCode };

const logger = createLogger({ module: 'geocoding' });

export class Geocoder {
  private readonly providers: readonly GeocodingProvider[];

  constructor(providers: readonly GeocodingProvider[]) {
    if (providers.length === 0) {
      throw new RangeError('Geocoder needs at least one provider');
    }
    this.providers = providers;
  }

  get providerNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  /**
   * @throws {GeocodeError} The last provider's error when none succeeds
   */
  async geocode(query: string): Promise<GeocodeResult> {
    let lastError: GeocodeError | null = null;

    for (const provider of this.providers) {
      try {
        return await provider.geocode(query);
      } catch (error) {
        const failure =
          error instanceof GeocodeError
            ? error
            : new GeocodeError(
                error instanceof Error ? error.message : String(error),
                GeocodeErrorCode.PROVIDER_ERROR,
                provider.name
              );

        if (failure.code === GeocodeErrorCode.INVALID_QUERY) {
          throw failure;
        }

        logger.warn('Geocoding provider failed', {
          provider: provider.name,
          code: failure.code,
          error: failure.message,
        });
        lastError = failure;
      }
    }

    throw lastError ?? new GeocodeError(`Address not found: ${query}`, GeocodeErrorCode.NOT_FOUND, 'none');
  }
}

export function createGeocoder(config: GeocodingConfig): Geocoder {
  const providers: GeocodingProvider[] = [
    new NominatimProvider({
      baseUrl: config.nominatimUrl,
      userAgent: config.userAgent,
      language: config.language,
      cooldownMs: config.cooldownMs,
    }),
  ];

  if (config.googleApiKey) {
    providers.push(new GoogleProvider({ apiKey: config.googleApiKey, language: config.language }));
  }

  return new Geocoder(providers);
}
