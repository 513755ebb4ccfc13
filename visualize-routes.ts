/**
 * @file visualize-routes.ts
 * @description
 * Draws solver routes on a Leaflet map.
 *
 * 1. Reads the routes JSON (a list of routes, or an object with key "routes") and the customers CSV.
 * 2. Exchanges ONE_MAP_EMAIL / ONE_MAP_PASS for a OneMap token (read from the environment or `.env`).
 * 3. Geocodes postal codes missing from the JSON cache and persists the cache.
 * 4. Writes a self-contained HTML map, one color per truck.
 *
 * Usage:
 *   npm run visualize -- --routes data/routes.json --output routes_map.html --warehouse 207224
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';

import { loadDotenv, loadOneMapConfig } from './src/config';
import { OneMapClient } from './src/geocoding/onemap-client';
import { runPipeline } from './src/pipeline';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const dataDir = path.resolve(__dirname, 'data');

const defaults = {
    routes: path.join(dataDir, 'routes.json'),
    customers: path.join(dataDir, 'customers.csv'),
    output: 'routes_map.html',
    cache: path.join(dataDir, 'geo_cache.json'),
    warehouse: '207224',
    concurrency: '1',
};

const main = async () => {
    const { values } = parseArgs({
        options: {
            routes: { type: 'string', default: defaults.routes },
            customers: { type: 'string', default: defaults.customers },
            output: { type: 'string', default: defaults.output },
            cache: { type: 'string', default: defaults.cache },
            warehouse: { type: 'string', default: defaults.warehouse },
            concurrency: { type: 'string', default: defaults.concurrency },
        },
    });

    loadDotenv();
    const client = new OneMapClient(loadOneMapConfig());

    await runPipeline(
        {
            routesPath: values.routes ?? defaults.routes,
            customersPath: values.customers ?? defaults.customers,
            outputPath: values.output ?? defaults.output,
            cachePath: values.cache ?? defaults.cache,
            depotCode: (values.warehouse ?? defaults.warehouse).trim(),
            concurrency: Number(values.concurrency ?? defaults.concurrency),
        },
        { authenticator: client, geocoder: client },
    );
};

main().catch(error => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
