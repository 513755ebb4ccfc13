import { describe, expect, it } from 'vitest';

import { DEFAULT_ONEMAP_BASE_URL, DEFAULT_TIMEOUT_MS, loadOneMapConfig } from './config';
import { AuthError, MalformedInputError } from './errors';

describe('loadOneMapConfig', () => {
    it('should read credentials and apply defaults', () => {
        expect(loadOneMapConfig({ ONE_MAP_EMAIL: 'user@example.com', ONE_MAP_PASS: 'test-secret' })).toEqual({
            email: 'user@example.com',
            password: 'test-secret',
            baseUrl: DEFAULT_ONEMAP_BASE_URL,
            timeoutMs: DEFAULT_TIMEOUT_MS,
        });
    });

    it('should accept overrides for the service URL and timeout', () => {
        const config = loadOneMapConfig({
            ONE_MAP_EMAIL: 'user@example.com',
            ONE_MAP_PASS: 'test-secret',
            ONE_MAP_BASE_URL: 'http://localhost:8080/',
            ONE_MAP_TIMEOUT_MS: '2500',
        });

        expect(config.baseUrl).toBe('http://localhost:8080');
        expect(config.timeoutMs).toBe(2500);
    });

    it('should reject missing credentials', () => {
        expect(() => loadOneMapConfig({ ONE_MAP_EMAIL: 'user@example.com' })).toThrow(AuthError);
        expect(() => loadOneMapConfig({ ONE_MAP_EMAIL: '  ', ONE_MAP_PASS: 'test-secret' })).toThrow(
            'ONE_MAP_EMAIL and ONE_MAP_PASS must be set in the environment',
        );
    });

    it('should reject an invalid timeout', () => {
        const env = { ONE_MAP_EMAIL: 'user@example.com', ONE_MAP_PASS: 'test-secret', ONE_MAP_TIMEOUT_MS: 'soon' };

        expect(() => loadOneMapConfig(env)).toThrow(MalformedInputError);
    });
});
