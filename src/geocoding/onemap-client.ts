import type { OneMapConfig } from '../config';
import { AuthError, NotFoundError, TransportError } from '../errors';
import { searchResponseSchema, tokenResponseSchema } from '../types/onemap';
import type { AuthToken, LatLng } from '../types/types';
import type { Authenticator, FetchFn, Geocoder } from './interfaces';

const TOKEN_PATH = '/api/auth/post/getToken';
const SEARCH_PATH = '/api/common/elastic/search';

const describeFailure = (error: unknown): string => {
    if (error instanceof Error) {
        if (error.name === 'TimeoutError' || error.name === 'AbortError') {
            return 'request timed out';
        }
        return error.message;
    }
    return String(error);
};

/**
 * OneMap (Singapore) token exchange and postal code search.
 * No retries and no batching: every call is exactly one request bounded by `timeoutMs`.
 */
export class OneMapClient implements Authenticator, Geocoder {
    constructor(
        private readonly config: OneMapConfig,
        private readonly fetchFn: FetchFn = fetch,
    ) {}

    async authenticate(): Promise<AuthToken> {
        const { email, password } = this.config;
        if (!email || !password) {
            throw new AuthError('OneMap email and password are required');
        }

        const url = `${this.config.baseUrl}${TOKEN_PATH}`;
        const response = await this.send(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ email, password }),
        });

        if (!response.ok) {
            await response.body?.cancel();
            throw new AuthError(`OneMap token request rejected with HTTP ${response.status}`, {
                status: response.status,
            });
        }

        const body: unknown = await response.json().catch(() => undefined);
        const parsed = tokenResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new AuthError('OneMap token response has no access_token', { status: response.status });
        }

        return parsed.data.access_token;
    }

    async resolve(postalCode: string, token: AuthToken): Promise<LatLng> {
        const params = new URLSearchParams({
            searchVal: postalCode,
            returnGeom: 'Y',
            getAddrDetails: 'Y',
            pageNum: '1',
        });
        const url = `${this.config.baseUrl}${SEARCH_PATH}?${params.toString()}`;

        const response = await this.send(url, {
            method: 'GET',
            headers: { Authorization: `Bearer ${token}` },
        });

        if (!response.ok) {
            await response.body?.cancel();
            throw new TransportError(
                `OneMap search for postal ${postalCode} failed with HTTP ${response.status}`,
                response.status,
            );
        }

        const parsed = searchResponseSchema.safeParse(await this.readJson(response, url));
        if (!parsed.success) {
            throw new TransportError(`Malformed OneMap search response for postal ${postalCode}`, response.status, {
                cause: parsed.error,
            });
        }

        const [first] = parsed.data.results ?? [];
        if (!first) {
            throw new NotFoundError(postalCode);
        }

        return [first.LATITUDE, first.LONGITUDE];
    }

    private async send(url: string, init: RequestInit): Promise<Response> {
        try {
            return await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(this.config.timeoutMs) });
        } catch (error) {
            throw new TransportError(`Request to ${this.redact(url)} failed: ${describeFailure(error)}`, undefined, {
                cause: error,
            });
        }
    }

    private async readJson(response: Response, url: string): Promise<unknown> {
        try {
            return await response.json();
        } catch (error) {
            throw new TransportError(
                `Invalid JSON from ${this.redact(url)}: ${describeFailure(error)}`,
                response.status,
                { cause: error },
            );
        }
    }

    private redact(url: string): string {
        return url.split('?')[0];
    }
}
