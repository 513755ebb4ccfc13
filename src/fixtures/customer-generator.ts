import { readFile } from 'fs/promises';
import z from 'zod';

import { MalformedInputError } from '../errors';
import { CUSTOMERS_HEADER } from '../utils/customer-ledger';
import { SeededRandom } from '../utils/random';

const stationEntrySchema = z
    .object({
        'Possible Locations': z
            .array(z.object({ POSTAL: z.union([z.string(), z.number()]).optional() }).passthrough())
            .optional(),
    })
    .passthrough();

const stationsFileSchema = stationEntrySchema.array();

const POSTAL_PATTERN = /^\d{6}$/;

export interface Customer {
    postalCode: string;
    demand: number;
}

export interface DemandOptions {
    demandMin: number;
    demandMax: number;
    seed: number;
}

export const DEFAULT_DEMAND_OPTIONS: DemandOptions = {
    demandMin: 450_000,
    demandMax: 500_000,
    seed: 64,
};

/**
 * Takes the first listed location of each station and keeps its postal code
 * when it is six digits and not seen before, up to `maxCount` codes.
 */
export const extractStationPostalCodes = (data: unknown, maxCount: number): string[] => {
    const parsed = stationsFileSchema.safeParse(data);
    if (!parsed.success) {
        throw new MalformedInputError('Stations file must be a list of station entries', undefined, {
            cause: parsed.error,
        });
    }

    const seen = new Set<string>();
    for (const entry of parsed.data) {
        if (seen.size >= maxCount) {
            break;
        }

        const raw = entry['Possible Locations']?.[0]?.POSTAL;
        if (raw === undefined) {
            continue;
        }

        const postal = String(raw).trim();
        if (POSTAL_PATTERN.test(postal)) {
            seen.add(postal);
        }
    }

    return [...seen];
};

export const loadStationPostalCodes = async (filePath: string, maxCount: number): Promise<string[]> => {
    let data: unknown;
    try {
        data = JSON.parse(await readFile(filePath, 'utf-8'));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new MalformedInputError(`Failed to load stations from ${filePath}: ${reason}`, { path: filePath });
    }
    return extractStationPostalCodes(data, maxCount);
};

export const generateCustomers = (
    postals: ReadonlyArray<string>,
    { demandMin, demandMax, seed }: DemandOptions = DEFAULT_DEMAND_OPTIONS,
): Customer[] => {
    const integral = Number.isInteger(demandMin) && Number.isInteger(demandMax);
    if (!integral || demandMin <= 0 || demandMax < demandMin) {
        throw new MalformedInputError('Invalid demand range; ensure max >= min and both are positive integers.', {
            demandMin,
            demandMax,
        });
    }

    const rng = new SeededRandom(seed);
    return postals.map(postalCode => ({ postalCode, demand: rng.nextInt(demandMin, demandMax) }));
};

export const formatCustomersCsv = (customers: ReadonlyArray<Customer>): string => {
    const rows = customers.map(({ postalCode, demand }) => `${postalCode},${demand}`);
    const lines = [`${CUSTOMERS_HEADER},demand`, ...rows];
    return `${lines.join('\n')}\n`;
};
