import type { CircleMarkerOptions, PolylineOptions } from 'leaflet';
import _ from 'lodash';

import type { LatLng } from '../types/types';

const LEAFLET_VERSION = '1.9.4';
const TILE_URL = 'https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png';
const TILE_ATTRIBUTION = '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors';

/** Popup and tooltip text. Plain text: it is escaped before it reaches the page. */
export interface Annotations {
    popup?: string;
    tooltip?: string;
}

export type MapInstruction =
    | { type: 'circleMarker'; position: LatLng; options: CircleMarkerOptions; annotations: Annotations }
    | { type: 'polyline'; points: LatLng[]; options: PolylineOptions; annotations: Annotations };

export interface MapView {
    center: LatLng;
    zoom: number;
    controlScale: boolean;
    title: string;
}

/** Sink for rendering instructions. Drawing happens in whatever consumes the serialized document. */
export interface MapDocument {
    readonly view: MapView;
    addCircleMarker(position: LatLng, options: CircleMarkerOptions, annotations?: Annotations): void;
    addPolyline(points: LatLng[], options: PolylineOptions, annotations?: Annotations): void;
    getInstructions(): ReadonlyArray<MapInstruction>;
    toHtml(): string;
}

const escapeAnnotations = ({ popup, tooltip }: Annotations): Annotations => ({
    ...(popup !== undefined && { popup: _.escape(popup) }),
    ...(tooltip !== undefined && { tooltip: _.escape(tooltip) }),
});

// JSON inside a <script> element must not contain "</script>" or "<!--"
const toScriptJson = (value: unknown): string => JSON.stringify(value).replace(/</g, '\\u003c');

const PAGE_SCRIPT = `
const map = L.map('map').setView(spec.center, spec.zoom);
L.tileLayer(spec.tiles.url, { attribution: spec.tiles.attribution, maxZoom: 19 }).addTo(map);
if (spec.controlScale) {
    L.control.scale().addTo(map);
}
for (const item of spec.instructions) {
    const layer = item.type === 'circleMarker'
        ? L.circleMarker(item.position, item.options)
        : L.polyline(item.points, item.options);
    if (item.annotations.popup) layer.bindPopup(item.annotations.popup);
    if (item.annotations.tooltip) layer.bindTooltip(item.annotations.tooltip);
    layer.addTo(map);
}`;

/** Self-contained HTML page that loads Leaflet from a CDN and replays the recorded instructions */
export class LeafletMapDocument implements MapDocument {
    private readonly instructions: MapInstruction[] = [];

    constructor(readonly view: MapView) {}

    addCircleMarker(position: LatLng, options: CircleMarkerOptions, annotations: Annotations = {}): void {
        this.instructions.push({ type: 'circleMarker', position, options, annotations });
    }

    addPolyline(points: LatLng[], options: PolylineOptions, annotations: Annotations = {}): void {
        this.instructions.push({ type: 'polyline', points, options, annotations });
    }

    getInstructions(): ReadonlyArray<MapInstruction> {
        return this.instructions;
    }

    toHtml(): string {
        const spec = {
            center: this.view.center,
            zoom: this.view.zoom,
            controlScale: this.view.controlScale,
            tiles: { url: TILE_URL, attribution: TILE_ATTRIBUTION },
            instructions: this.instructions.map(item => ({
                ...item,
                annotations: escapeAnnotations(item.annotations),
            })),
        };

        return [
            '<!DOCTYPE html>',
            '<html>',
            '<head>',
            '<meta charset="utf-8" />',
            '<meta name="viewport" content="width=device-width, initial-scale=1.0" />',
            `<title>${_.escape(this.view.title)}</title>`,
            `<link rel="stylesheet" href="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.css" />`,
            `<script src="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.js"></script>`,
            '<style>html, body, #map { height: 100%; margin: 0; }</style>',
            '</head>',
            '<body>',
            '<div id="map"></div>',
            '<script>',
            `const spec = ${toScriptJson(spec)};${PAGE_SCRIPT}`,
            '</script>',
            '</body>',
            '</html>',
            '',
        ].join('\n');
    }
}
