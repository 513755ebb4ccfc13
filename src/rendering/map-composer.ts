import { mkdir, writeFile } from 'fs/promises';
import path from 'path';

import { MalformedInputError } from '../errors';
import type { LatLng, Route, RouteLayer } from '../types/types';
import { LeafletMapDocument, type MapDocument, type MapView } from './map-document';

export const DEFAULT_ZOOM = 12;

const POLYLINE_STYLE = { weight: 4, opacity: 0.8 } as const;

/**
 * Picks the postal code the map is centered on: the depot when one is configured,
 * otherwise the first stop of the first non-empty route.
 */
export const selectCenterCode = (routes: ReadonlyArray<Route>, depotCode?: string): string => {
    if (depotCode) {
        return depotCode;
    }

    const first = routes.find(route => route.length > 0)?.[0];
    if (first === undefined) {
        throw new MalformedInputError('Cannot center the map: no depot configured and every route is empty');
    }
    return first;
};

export type ComposeOptions = Partial<Omit<MapView, 'center'>> & {
    createDocument?: (view: MapView) => MapDocument;
};

/** Attaches every layer, markers first then its polyline, in route order */
export const composeMap = (
    layers: ReadonlyArray<RouteLayer>,
    center: LatLng,
    options: ComposeOptions = {},
): MapDocument => {
    const {
        zoom = DEFAULT_ZOOM,
        controlScale = true,
        title = 'Vehicle routes',
        createDocument = view => new LeafletMapDocument(view),
    } = options;

    const document = createDocument({ center, zoom, controlScale, title });

    for (const layer of layers) {
        for (const marker of layer.markers) {
            document.addCircleMarker(
                marker.position,
                { radius: marker.radius, color: layer.color, fill: true, fillColor: layer.color },
                { popup: marker.label, tooltip: marker.label },
            );
        }

        if (layer.polyline.length > 0) {
            document.addPolyline(layer.polyline, { color: layer.color, ...POLYLINE_STYLE }, { tooltip: layer.tooltip });
        }
    }

    return document;
};

export const saveMap = async (filePath: string, document: MapDocument): Promise<void> => {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, document.toHtml(), 'utf-8');
};
