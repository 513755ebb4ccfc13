/**
 * @file generate-customers.ts
 * @description
 * Seeds the customers file consumed by the solver and by visualize-routes.ts.
 *
 * 1. Reads station entries (JSON) and takes up to <count> distinct six-digit postal codes.
 * 2. Draws an integer demand per postal code from a seeded generator, so reruns are identical.
 * 3. Writes `postal_code,demand` rows to data/customers.csv (or --output).
 *
 * Usage:
 *   npm run generate:customers -- 75 --seed 64 --demand-min 450000 --demand-max 500000
 */

import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';

import { MalformedInputError } from './src/errors';
import {
    DEFAULT_DEMAND_OPTIONS,
    formatCustomersCsv,
    generateCustomers,
    loadStationPostalCodes,
} from './src/fixtures/customer-generator';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Relative paths are taken from the project root, not from the working directory
const resolveFromRoot = (p: string) => (path.isAbsolute(p) ? p : path.resolve(__dirname, p));

const parseInteger = (name: string, raw: string | undefined, fallback: number): number => {
    if (raw === undefined) {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new MalformedInputError(`--${name} must be an integer, got "${raw}"`);
    }
    return value;
};

const main = async () => {
    const { values, positionals } = parseArgs({
        allowPositionals: true,
        options: {
            output: { type: 'string' },
            stations: { type: 'string' },
            'demand-min': { type: 'string' },
            'demand-max': { type: 'string' },
            seed: { type: 'string' },
        },
    });

    if (positionals.length !== 1) {
        console.error('Usage: npm run generate:customers -- <count> [--output path] [--stations path] [--seed n]');
        process.exit(1);
    }

    const count = parseInteger('count', positionals[0], 0);
    if (count <= 0) {
        throw new MalformedInputError('Customer count must be positive');
    }

    const demandOptions = {
        demandMin: parseInteger('demand-min', values['demand-min'], DEFAULT_DEMAND_OPTIONS.demandMin),
        demandMax: parseInteger('demand-max', values['demand-max'], DEFAULT_DEMAND_OPTIONS.demandMax),
        seed: parseInteger('seed', values.seed, DEFAULT_DEMAND_OPTIONS.seed),
    };

    const stationsPath = resolveFromRoot(values.stations ?? 'data/stations.json');
    console.log(`Loading up to ${count} customer postal codes from ${stationsPath}...`);
    const postals = await loadStationPostalCodes(stationsPath, count);

    const customers = generateCustomers(postals, demandOptions);

    const outputPath = resolveFromRoot(values.output ?? 'data/customers.csv');
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, formatCustomersCsv(customers));

    console.log(`Done! Saved ${customers.length} customer rows (with demand) to: ${outputPath}`);
    console.log(`Seed: ${demandOptions.seed}`);
};

main().catch(error => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
