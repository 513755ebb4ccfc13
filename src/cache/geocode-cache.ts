import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import _ from 'lodash';
import path from 'path';

import { CacheCorruptError } from '../errors';
import { coordinateCacheFileSchema, type CoordinateCache, type LatLng } from '../types/types';

const isMissingFile = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';

/** Reads the persisted cache. A missing file is an empty cache, not an error. */
export const loadCache = async (filePath: string): Promise<CoordinateCache> => {
    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (error) {
        if (isMissingFile(error)) {
            return new Map();
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new CacheCorruptError(filePath, `cannot be read: ${reason}`, { cause: error });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new CacheCorruptError(filePath, error instanceof Error ? error.message : String(error), { cause: error });
    }

    const parsed = coordinateCacheFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? `at "${issue.path.join('.')}"` : 'at top level';
        throw new CacheCorruptError(filePath, `${issue.message} ${where}`, { cause: parsed.error });
    }

    return new Map(Object.entries(parsed.data));
};

/**
 * Writes the cache next to its final location first and renames it into place,
 * so an interrupted write leaves the previous file intact.
 */
export const saveCache = async (filePath: string, cache: CoordinateCache): Promise<void> => {
    await mkdir(path.dirname(filePath), { recursive: true });

    const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    const body = JSON.stringify(Object.fromEntries(cache), null, 2);

    try {
        await writeFile(tmpPath, body, 'utf-8');
        await rename(tmpPath, filePath);
    } catch (error) {
        await rm(tmpPath, { force: true });
        throw error;
    }
};

/** Adds the keys of `fresh` that `existing` lacks. Existing coordinates always win. */
export const mergeCache = (existing: CoordinateCache, fresh: ReadonlyMap<string, LatLng>): CoordinateCache => {
    const merged: CoordinateCache = _.cloneDeep(existing);

    for (const [postal, coords] of fresh) {
        if (!merged.has(postal)) {
            merged.set(postal, [coords[0], coords[1]]);
        }
    }

    return merged;
};
