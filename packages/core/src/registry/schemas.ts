import { z } from 'zod';
import { LoggerConfigSchema } from '../logger/schemas.js';

export const DUPLICATE_POLICIES = ['ignore', 'warn', 'error'] as const;

export const DuplicatePolicySchema = z
    .enum(DUPLICATE_POLICIES)
    .describe('What to do when a key is registered twice in one family (first registration always wins)');

export type DuplicatePolicy = z.output<typeof DuplicatePolicySchema>;

export const RegistryConfigSchema = z
    .object({
        onDuplicate: DuplicatePolicySchema.default('warn'),
        logger: LoggerConfigSchema.default({}),
    })
    .strict()
    .describe('Process-wide registry settings');

export type RegistryConfig = z.output<typeof RegistryConfigSchema>;
export type RegistryConfigInput = z.input<typeof RegistryConfigSchema>;

export const FamilyOptionsSchema = z
    .object({
        name: z.string().trim().min(1, 'Family name must not be empty'),
        description: z.string().optional(),
    })
    .strict();

export type FamilyOptions = z.input<typeof FamilyOptionsSchema>;
