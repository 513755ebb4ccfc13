import z from 'zod';

export const latLngSchema = z.tuple([z.number(), z.number()]);

/** `[latitude, longitude]`, the order Leaflet and the cache file both use */
export type LatLng = z.infer<typeof latLngSchema>;

export const coordinateCacheFileSchema = z.record(z.string(), latLngSchema);

export type CoordinateCacheFile = z.infer<typeof coordinateCacheFileSchema>;

/** postal code -> coordinate. One flat table shared by every route */
export type CoordinateCache = Map<string, LatLng>;

/** Postal codes in visit order */
export type Route = string[];

/** postal code -> demand */
export type Demands = ReadonlyMap<string, number>;

export type AuthToken = string;

export const routeStopSchema = z.union([z.string(), z.number()]);

export type StopKind = 'depot' | 'customer';

export interface StopMarker {
    postalCode: string;
    position: LatLng;
    kind: StopKind;
    /** 1-based order among the customer stops of the route; depots have none */
    visitNumber?: number;
    demand: number;
    radius: number;
    label: string;
}

export interface RouteLayer {
    index: number;
    color: string;
    markers: StopMarker[];
    polyline: LatLng[];
    tooltip: string;
}
