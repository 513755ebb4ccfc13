import z from 'zod';

export const tokenResponseSchema = z
    .object({
        access_token: z.string().min(1),
        expiry_timestamp: z.union([z.string(), z.number()]).optional(),
    })
    .passthrough();

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

const coordinateValueSchema = z
    .union([z.number(), z.string().trim().min(1).transform(val => Number.parseFloat(val))])
    .refine(val => Number.isFinite(val), 'expected a finite coordinate');

export const searchResultSchema = z
    .object({
        LATITUDE: coordinateValueSchema,
        LONGITUDE: coordinateValueSchema,
        POSTAL: z.string().optional(),
        ADDRESS: z.string().optional(),
    })
    .passthrough();

export const searchResponseSchema = z
    .object({
        found: z.number().optional(),
        results: z.array(searchResultSchema).nullish(),
    })
    .passthrough();

export type SearchResponse = z.infer<typeof searchResponseSchema>;
