import { z } from 'zod';
import { LOG_LEVELS } from './types.js';

const MB = 1024 * 1024;

/**
 * Output destinations, discriminated by `type`
 */
export const LoggerTransportSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('silent') }).strict(),
    z
        .object({
            type: z.literal('console'),
            colorize: z.boolean().default(true).describe('Colour level names with chalk'),
        })
        .strict(),
    z
        .object({
            type: z.literal('file'),
            path: z.string().min(1).describe('Log file; parent directories are created'),
            maxSize: z
                .number()
                .int()
                .positive()
                .default(10 * MB)
                .describe('Rotate once the file would exceed this many bytes'),
            maxFiles: z
                .number()
                .int()
                .positive()
                .default(5)
                .describe('Rotated files kept as <path>.1 ... <path>.N'),
        })
        .strict(),
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

export const LoggerConfigSchema = z
    .object({
        level: z.enum(LOG_LEVELS).default('info'),
        instance: z.string().min(1).default('chartvault').describe('Stamped on every entry'),
        transports: z
            .array(LoggerTransportSchema)
            .min(1, 'At least one transport is required')
            .default([{ type: 'console', colorize: true }]),
    })
    .strict();

/** Accepted input, defaults not yet applied */
export type LoggerConfig = z.input<typeof LoggerConfigSchema>;
export type ValidatedLoggerConfig = z.output<typeof LoggerConfigSchema>;
