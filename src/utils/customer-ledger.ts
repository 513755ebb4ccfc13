import csv from 'csv-parser';
import fs from 'fs';
import z from 'zod';

import { MalformedInputError } from '../errors';

export const CUSTOMERS_HEADER = 'postal_code';

const customerRowSchema = z.record(z.string(), z.string());

const INTEGER_PATTERN = /^[+-]?\d+$/;

const parseDemand = (raw: string | undefined, postal: string, record: number, filePath: string): number => {
    if (!raw) {
        return 0;
    }
    if (!INTEGER_PATTERN.test(raw)) {
        throw new MalformedInputError(
            `Invalid demand "${raw}" for postal ${postal} in ${filePath} (record ${record})`,
            { path: filePath, record, postalCode: postal },
        );
    }
    return Number.parseInt(raw, 10);
};

/**
 * Reads `postal_code,demand[,...]` lines into a postal code -> demand table.
 * A header whose first field is `postal_code` is skipped, a missing or empty demand counts as 0,
 * and a demand that is not an integer rejects the whole file.
 */
export const loadCustomers = (filePath: string): Promise<Map<string, number>> => {
    return new Promise((resolve, reject) => {
        const demands = new Map<string, number>();
        let record = 0;

        const fail = (error: unknown) => {
            if (error instanceof MalformedInputError) {
                reject(error);
                return;
            }
            const reason = error instanceof Error ? error.message : String(error);
            reject(
                new MalformedInputError(
                    `Failed to read customers from ${filePath}: ${reason}`,
                    { path: filePath },
                    { cause: error },
                ),
            );
        };

        const input = fs.createReadStream(filePath, { encoding: 'utf-8' });
        const parser = csv({ headers: false, mapValues: ({ value }) => String(value).trim() });

        input.on('error', fail);
        parser
            .on('data', (row: unknown) => {
                record++;
                try {
                    const fields = customerRowSchema.parse(row);
                    const postal = fields['0'];
                    if (!postal || postal === CUSTOMERS_HEADER) {
                        return;
                    }
                    demands.set(postal, parseDemand(fields['1'], postal, record, filePath));
                } catch (error) {
                    input.destroy();
                    parser.destroy();
                    fail(error);
                }
            })
            .on('error', fail)
            .on('end', () => resolve(demands));

        input.pipe(parser);
    });
};
