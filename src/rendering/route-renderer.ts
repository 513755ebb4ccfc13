import type { CoordinateCache, Demands, LatLng, Route, RouteLayer, StopMarker } from '../types/types';

export const DEFAULT_PALETTE: ReadonlyArray<string> = [
    '#1f77b4',
    '#ff7f0e',
    '#2ca02c',
    '#d62728',
    '#9467bd',
    '#8c564b',
    '#e377c2',
    '#7f7f7f',
    '#bcbd22',
    '#17becf',
];

export const DEPOT_RADIUS = 7;
export const CUSTOMER_RADIUS = 5;

export const colorForRoute = (index: number, palette: ReadonlyArray<string> = DEFAULT_PALETTE): string => {
    if (palette.length === 0) {
        throw new Error('Palette must contain at least one color');
    }
    return palette[index % palette.length];
};

/** Rounds to the nearest integer, taking the even neighbour on an exact half */
const roundHalfEven = (value: number): number => {
    const floor = Math.floor(value);
    if (value - floor !== 0.5) {
        return Math.round(value);
    }
    return floor % 2 === 0 ? floor : floor + 1;
};

/** Demand in thousands, e.g. 480000 -> "480k", 450500 -> "450k" */
export const formatDemand = (demand: number): string => `${roundHalfEven(demand / 1000)}k`;

export const depotLabel = (postal: string): string => `Depot: ${postal}`;

export const customerLabel = (visitNumber: number, postal: string, demand: number): string =>
    `#${visitNumber}: ${postal} — ${formatDemand(demand)}`;

const lookup = (cache: CoordinateCache, postal: string): LatLng => {
    const coords = cache.get(postal);
    if (!coords) {
        // Resolution runs before rendering, so a miss here is a bug in the caller
        throw new Error(`No coordinates for postal ${postal}; resolve stops before rendering`);
    }
    return coords;
};

/**
 * Turns each route into one colored layer: a marker per stop and a polyline through all of them.
 * Depot visits keep their place in the polyline but are not numbered.
 */
export const buildLayers = (
    routes: ReadonlyArray<Route>,
    cache: CoordinateCache,
    demands: Demands,
    depotCode?: string,
    palette: ReadonlyArray<string> = DEFAULT_PALETTE,
): RouteLayer[] => {
    return routes.map((route, index) => {
        const markers: StopMarker[] = [];
        const polyline: LatLng[] = [];
        let visitNumber = 1;

        for (const postal of route) {
            const position = lookup(cache, postal);
            const demand = demands.get(postal) ?? 0;

            if (depotCode !== undefined && postal === depotCode) {
                markers.push({
                    postalCode: postal,
                    position,
                    kind: 'depot',
                    demand,
                    radius: DEPOT_RADIUS,
                    label: depotLabel(postal),
                });
            } else {
                markers.push({
                    postalCode: postal,
                    position,
                    kind: 'customer',
                    visitNumber,
                    demand,
                    radius: CUSTOMER_RADIUS,
                    label: customerLabel(visitNumber, postal, demand),
                });
                visitNumber++;
            }

            polyline.push(position);
        }

        return {
            index,
            color: colorForRoute(index, palette),
            markers,
            polyline,
            tooltip: `Truck ${index + 1}`,
        };
    });
};
