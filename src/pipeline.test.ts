import { access, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AuthError, NotFoundError, ResolutionError } from './errors';
import type { Authenticator, Geocoder } from './geocoding/interfaces';
import { runPipeline, type PipelineOptions } from './pipeline';
import type { LatLng } from './types/types';

class StubAuthenticator implements Authenticator {
    calls = 0;

    async authenticate(): Promise<string> {
        this.calls++;
        return 'test-token';
    }
}

class StubGeocoder implements Geocoder {
    readonly calls: string[] = [];

    constructor(private readonly table: Record<string, LatLng>) {}

    async resolve(postalCode: string): Promise<LatLng> {
        this.calls.push(postalCode);
        const coords = this.table[postalCode];
        if (!coords) {
            throw new NotFoundError(postalCode);
        }
        return coords;
    }
}

const geocodeTable: Record<string, LatLng> = {
    '207224': [1.3, 103.8],
    '529538': [1.35, 103.85],
};

describe('runPipeline', () => {
    let dir: string;
    let options: PipelineOptions;

    const writeInputs = async (routes: unknown, customers: string) => {
        await writeFile(options.routesPath, JSON.stringify(routes));
        await writeFile(options.customersPath, customers);
    };

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        dir = await mkdtemp(path.join(os.tmpdir(), 'route-map-pipeline-'));
        options = {
            routesPath: path.join(dir, 'routes.json'),
            customersPath: path.join(dir, 'customers.csv'),
            outputPath: path.join(dir, 'routes_map.html'),
            cachePath: path.join(dir, 'data', 'geo_cache.json'),
            depotCode: '207224',
        };
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('should resolve, cache and render a depot route end to end', async () => {
        await writeInputs([['207224', '529538']], 'postal_code,demand\n529538,480000\n');
        const authenticator = new StubAuthenticator();
        const geocoder = new StubGeocoder(geocodeTable);

        const summary = await runPipeline(options, { authenticator, geocoder });

        expect(authenticator.calls).toBe(1);
        expect(geocoder.calls).toEqual(['207224', '529538']);
        expect(JSON.parse(await readFile(options.cachePath, 'utf-8'))).toEqual({
            '207224': [1.3, 103.8],
            '529538': [1.35, 103.85],
        });

        expect(summary.layers).toHaveLength(1);
        const [depot, customer] = summary.layers[0].markers;
        expect(summary.layers[0].markers).toHaveLength(2);
        expect(depot).toMatchObject({ kind: 'depot', position: [1.3, 103.8], label: 'Depot: 207224' });
        expect(customer).toMatchObject({
            kind: 'customer',
            position: [1.35, 103.85],
            visitNumber: 1,
            label: '#1: 529538 — 480k',
        });
        expect(summary.center).toEqual([1.3, 103.8]);
        expect(summary.centerCode).toBe('207224');
        expect(summary.resolved).toBe(2);

        const html = await readFile(options.outputPath, 'utf-8');
        expect(html).toContain('"popup":"#1: 529538 — 480k"');
    });

    it('should reuse the cache on a second run without any lookup', async () => {
        await writeInputs({ routes: [['207224', '529538', '207224']] }, '529538,480000\n');
        const geocoder = new StubGeocoder(geocodeTable);

        await runPipeline(options, { authenticator: new StubAuthenticator(), geocoder });
        const second = await runPipeline(options, { authenticator: new StubAuthenticator(), geocoder });

        expect(geocoder.calls).toEqual(['207224', '529538']);
        expect(second.resolved).toBe(0);
        expect(second.stops).toBe(2);
    });

    it('should resolve a depot that appears in no route for centering', async () => {
        await writeInputs([['529538']], '529538,480000\n');
        const geocoder = new StubGeocoder(geocodeTable);

        const summary = await runPipeline(options, { authenticator: new StubAuthenticator(), geocoder });

        expect(geocoder.calls).toEqual(['529538', '207224']);
        expect(summary.center).toEqual([1.3, 103.8]);
        expect(JSON.parse(await readFile(options.cachePath, 'utf-8'))).toEqual({
            '529538': [1.35, 103.85],
            '207224': [1.3, 103.8],
        });
        expect(summary.layers[0].markers[0]).toMatchObject({ kind: 'customer', visitNumber: 1 });
    });

    it('should center on the first stop when no depot is configured', async () => {
        await writeInputs([['529538', '207224']], '');
        const summary = await runPipeline(
            { ...options, depotCode: '' },
            { authenticator: new StubAuthenticator(), geocoder: new StubGeocoder(geocodeTable) },
        );

        expect(summary.centerCode).toBe('529538');
        expect(summary.center).toEqual([1.35, 103.85]);
        expect(summary.layers[0].markers.map(m => m.kind)).toEqual(['customer', 'customer']);
    });

    it('should write no map when a postal code cannot be resolved', async () => {
        await writeInputs([['207224', '999999']], '999999,1000\n');

        await expect(
            runPipeline(options, { authenticator: new StubAuthenticator(), geocoder: new StubGeocoder(geocodeTable) }),
        ).rejects.toBeInstanceOf(ResolutionError);

        await expect(access(options.outputPath)).rejects.toThrow();
    });

    it('should stop before any lookup when authentication fails', async () => {
        await writeInputs([['207224']], '');
        const geocoder = new StubGeocoder(geocodeTable);
        const authenticator: Authenticator = {
            authenticate: async () => {
                throw new AuthError('OneMap token request rejected with HTTP 401');
            },
        };

        await expect(runPipeline(options, { authenticator, geocoder })).rejects.toBeInstanceOf(AuthError);
        expect(geocoder.calls).toEqual([]);
    });
});
