import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { MalformedInputError } from '../errors';
import { loadCustomers } from './customer-ledger';

describe('loadCustomers', () => {
    let dir: string;

    const writeCustomers = async (content: string) => {
        const file = path.join(dir, 'customers.csv');
        await writeFile(file, content);
        return file;
    };

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'route-map-customers-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should skip the header and parse demands', async () => {
        const file = await writeCustomers('postal_code,demand\n529538,480000\n769093,451000\n');

        const demands = await loadCustomers(file);

        expect([...demands]).toEqual([
            ['529538', 480000],
            ['769093', 451000],
        ]);
    });

    it('should read files without a header', async () => {
        const file = await writeCustomers('529538,480000\n');

        expect((await loadCustomers(file)).get('529538')).toBe(480000);
    });

    it('should default a missing or empty demand to 0', async () => {
        const file = await writeCustomers('postal_code,demand\n529538,\n769093\n');

        const demands = await loadCustomers(file);

        expect(demands.get('529538')).toBe(0);
        expect(demands.get('769093')).toBe(0);
    });

    it('should trim fields and ignore extra columns', async () => {
        const file = await writeCustomers(' 529538 , 480000 ,north\n');

        expect([...(await loadCustomers(file))]).toEqual([['529538', 480000]]);
    });

    it('should let a later line override an earlier one for the same postal code', async () => {
        const file = await writeCustomers('529538,1000\n529538,2000\n');

        expect((await loadCustomers(file)).get('529538')).toBe(2000);
    });

    it('should reject a demand that is not an integer', async () => {
        const file = await writeCustomers('postal_code,demand\n529538,abc\n');

        await expect(loadCustomers(file)).rejects.toThrow('Invalid demand "abc" for postal 529538');
    });

    it('should reject a fractional demand', async () => {
        const file = await writeCustomers('529538,12.5\n');

        await expect(loadCustomers(file)).rejects.toBeInstanceOf(MalformedInputError);
    });

    it('should report a missing file as malformed input', async () => {
        const missing = path.join(dir, 'missing.csv');

        await expect(loadCustomers(missing)).rejects.toThrow(`Failed to read customers from ${missing}`);
    });
});
