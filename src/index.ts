export * from './errors';
export * from './config';
export * from './types/types';
export { loadRoutes, parseRoutes, collectPostalCodes } from './utils/route-loader';
export { loadCustomers } from './utils/customer-ledger';
export { loadCache, saveCache, mergeCache } from './cache/geocode-cache';
export type { Authenticator, Geocoder, FetchFn } from './geocoding/interfaces';
export { OneMapClient } from './geocoding/onemap-client';
export { CoordinateResolver, type ResolverOptions } from './geocoding/resolver';
export { buildLayers, colorForRoute, formatDemand, DEFAULT_PALETTE } from './rendering/route-renderer';
export { composeMap, saveMap, selectCenterCode, DEFAULT_ZOOM } from './rendering/map-composer';
export { LeafletMapDocument, type MapDocument, type MapInstruction, type MapView } from './rendering/map-document';
export { runPipeline, type PipelineOptions, type PipelineSummary } from './pipeline';
