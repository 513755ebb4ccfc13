import { readFile } from 'fs/promises';
import z from 'zod';

import { MalformedInputError } from '../errors';
import { routeStopSchema, type Route } from '../types/types';

const routesContainerSchema = z.object({ routes: z.unknown() }).passthrough();

/**
 * Normalizes solver output into routes of trimmed, non-empty postal codes.
 * Accepts either a bare list of routes or an object carrying them under `routes`.
 */
export const parseRoutes = (data: unknown): Route[] => {
    const container = routesContainerSchema.safeParse(data);
    const routes = container.success ? container.data.routes : data;

    if (!Array.isArray(routes)) {
        throw new MalformedInputError("Routes JSON must be a list or an object with key 'routes'.");
    }

    return routes.map((route: unknown, idx) => {
        if (!Array.isArray(route)) {
            throw new MalformedInputError(`Route ${idx} is not a list`, { route: idx });
        }

        const normalized: Route = [];
        route.forEach((stop: unknown, stopIdx) => {
            const parsed = routeStopSchema.safeParse(stop);
            if (!parsed.success) {
                throw new MalformedInputError(`Route ${idx} stop ${stopIdx} is not a postal code`, {
                    route: idx,
                    stop: stopIdx,
                });
            }

            const postal = String(parsed.data).trim();
            if (postal) {
                normalized.push(postal);
            }
        });

        return normalized;
    });
};

export const loadRoutes = async (filePath: string): Promise<Route[]> => {
    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (error) {
        throw new MalformedInputError(`Failed to read routes from ${filePath}`, { path: filePath }, { cause: error });
    }

    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (error) {
        const reason = error instanceof SyntaxError ? error.message : String(error);
        throw new MalformedInputError(`Invalid JSON in ${filePath}: ${reason}`, { path: filePath }, { cause: error });
    }

    return parseRoutes(data);
};

/** Every distinct stop, in first-seen order */
export const collectPostalCodes = (routes: ReadonlyArray<Route>): string[] => {
    return [...new Set(routes.flat())];
};
