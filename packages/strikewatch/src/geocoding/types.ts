/**
 * Geocoding abstraction
 *
 * Resolves a free-text place ("Lyon, France") to a query centre for
 * radius searches. Providers are tried in order by {@link Geocoder}.
 */

export interface GeocodeResult {
  readonly latitude: number;
  readonly longitude: number;
  /** Display name returned by the provider */
  readonly label: string;
  readonly source: string;
}

export interface GeocodingProvider {
  readonly name: string;
  geocode(query: string): Promise<GeocodeResult>;
}

export enum GeocodeErrorCode {
  INVALID_QUERY = 'INVALID_QUERY',
  NOT_FOUND = 'NOT_FOUND',
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
}

export class GeocodeError extends Error {
  constructor(
    message: string,
    public readonly code: GeocodeErrorCode,
    public readonly provider: string
  ) {
    super(message);
    this.name = 'GeocodeError';
  }
}
