import { loadCache, saveCache } from './cache/geocode-cache';
import type { Authenticator, Geocoder } from './geocoding/interfaces';
import { CoordinateResolver } from './geocoding/resolver';
import { composeMap, saveMap, selectCenterCode } from './rendering/map-composer';
import { buildLayers } from './rendering/route-renderer';
import type { CoordinateCache, LatLng, RouteLayer } from './types/types';
import { loadCustomers } from './utils/customer-ledger';
import { collectPostalCodes, loadRoutes } from './utils/route-loader';

export interface PipelineOptions {
    routesPath: string;
    customersPath: string;
    outputPath: string;
    cachePath: string;
    /** Warehouse postal code. Empty or absent: no depot markers, center on the first stop. */
    depotCode?: string;
    concurrency?: number;
}

export interface PipelineDependencies {
    authenticator: Authenticator;
    geocoder: Geocoder;
}

export interface PipelineSummary {
    routes: number;
    stops: number;
    /** Postal codes looked up over the network during this run */
    resolved: number;
    centerCode: string;
    center: LatLng;
    layers: RouteLayer[];
    cache: CoordinateCache;
    outputPath: string;
}

/**
 * load -> authenticate -> resolve -> save cache -> center -> render -> compose -> write.
 * Any failure aborts the run before the map is written.
 */
export const runPipeline = async (
    options: PipelineOptions,
    { authenticator, geocoder }: PipelineDependencies,
): Promise<PipelineSummary> => {
    const depotCode = options.depotCode || undefined;

    const routes = await loadRoutes(options.routesPath);
    const demands = await loadCustomers(options.customersPath);
    console.log(`Loaded ${routes.length} route(s) and ${demands.size} customer demand(s)`);

    const token = await authenticator.authenticate();
    const resolver = new CoordinateResolver(geocoder, { concurrency: options.concurrency });

    const initial = await loadCache(options.cachePath);
    const postals = collectPostalCodes(routes);

    let cache = await resolver.ensureCoordinates(postals, token, initial);
    await saveCache(options.cachePath, cache);

    const centerCode = selectCenterCode(routes, depotCode);
    if (!cache.has(centerCode)) {
        cache = await resolver.ensureCoordinates([centerCode], token, cache);
        await saveCache(options.cachePath, cache);
    }

    const center = cache.get(centerCode);
    if (!center) {
        throw new Error(`Center postal ${centerCode} is still unresolved after lookup`);
    }

    const layers = buildLayers(routes, cache, demands, depotCode);
    const document = composeMap(layers, center);
    await saveMap(options.outputPath, document);

    console.log(`Saved map to ${options.outputPath}`);

    return {
        routes: routes.length,
        stops: postals.length,
        resolved: cache.size - initial.size,
        centerCode,
        center,
        layers,
        cache,
        outputPath: options.outputPath,
    };
};
