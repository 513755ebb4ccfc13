import { mergeCache } from '../cache/geocode-cache';
import { MalformedInputError, ResolutionError } from '../errors';
import type { AuthToken, CoordinateCache, LatLng } from '../types/types';
import type { Geocoder } from './interfaces';

export interface ResolverOptions {
    /** Upper bound on lookups in flight at once. 1 keeps the lookups strictly sequential. */
    concurrency?: number;
}

/** Read-through population of the coordinate cache */
export class CoordinateResolver {
    private readonly concurrency: number;

    constructor(
        private readonly geocoder: Geocoder,
        { concurrency = 1 }: ResolverOptions = {},
    ) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new MalformedInputError(`Concurrency must be a positive integer, got ${concurrency}`);
        }
        this.concurrency = concurrency;
    }

    /**
     * Looks up every postal code the cache does not know yet and returns a new cache with the results.
     * The first failed lookup aborts the batch: no further lookups start, the ones in flight are awaited,
     * and the failure is raised as a {@link ResolutionError}. The input cache is never mutated.
     */
    async ensureCoordinates(
        postalCodes: Iterable<string>,
        token: AuthToken,
        cache: CoordinateCache,
    ): Promise<CoordinateCache> {
        const missing = [...new Set(postalCodes)].filter(postal => !cache.has(postal));
        if (missing.length === 0) {
            return mergeCache(cache, new Map());
        }

        console.log(`Geocoding ${missing.length} postal code(s) missing from cache`);

        const fresh = new Map<string, LatLng>();
        let cursor = 0;
        const outcome: { failure?: ResolutionError } = {};

        const work = async () => {
            while (outcome.failure === undefined && cursor < missing.length) {
                const postal = missing[cursor++];
                try {
                    const coords = await this.geocoder.resolve(postal, token);
                    fresh.set(postal, coords);
                    console.log(`\tResolved ${postal} -> ${coords[0]}, ${coords[1]}`);
                } catch (error) {
                    outcome.failure ??= new ResolutionError(postal, error);
                }
            }
        };

        await Promise.all(Array.from({ length: Math.min(this.concurrency, missing.length) }, () => work()));

        if (outcome.failure !== undefined) {
            throw outcome.failure;
        }

        return mergeCache(cache, fresh);
    }
}
