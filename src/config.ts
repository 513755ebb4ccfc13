import dotenv from 'dotenv';
import z from 'zod';

import { AuthError, MalformedInputError } from './errors';

export const DEFAULT_ONEMAP_BASE_URL = 'https://www.onemap.gov.sg';
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface OneMapConfig {
    email: string;
    password: string;
    baseUrl: string;
    timeoutMs: number;
}

const oneMapEnvSchema = z.object({
    ONE_MAP_EMAIL: z.string().trim().optional(),
    ONE_MAP_PASS: z.string().optional(),
    ONE_MAP_BASE_URL: z.string().url().default(DEFAULT_ONEMAP_BASE_URL),
    ONE_MAP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

/** Loads `.env` into `process.env` without overriding variables that are already set */
export const loadDotenv = (path?: string): void => {
    dotenv.config(path ? { path } : undefined);
};

/**
 * Builds the OneMap client configuration from an environment table.
 * Missing credentials are rejected here, before anything touches the network.
 */
export const loadOneMapConfig = (env: NodeJS.ProcessEnv = process.env): OneMapConfig => {
    const parsed = oneMapEnvSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new MalformedInputError(`Invalid ${issue.path.join('.')}: ${issue.message}`);
    }

    const { ONE_MAP_EMAIL: email, ONE_MAP_PASS: password, ONE_MAP_BASE_URL, ONE_MAP_TIMEOUT_MS } = parsed.data;
    if (!email || !password) {
        throw new AuthError('ONE_MAP_EMAIL and ONE_MAP_PASS must be set in the environment');
    }

    return {
        email,
        password,
        baseUrl: ONE_MAP_BASE_URL.replace(/\/+$/, ''),
        timeoutMs: ONE_MAP_TIMEOUT_MS,
    };
};
