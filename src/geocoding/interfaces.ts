import type { AuthToken, LatLng } from '../types/types';

/** Exchanges configured credentials for a bearer token, once per run */
export interface Authenticator {
    authenticate(): Promise<AuthToken>;
}

/** Resolves a single postal code to coordinates with one network round trip */
export interface Geocoder {
    resolve(postalCode: string, token: AuthToken): Promise<LatLng>;
}

export type FetchFn = typeof fetch;
