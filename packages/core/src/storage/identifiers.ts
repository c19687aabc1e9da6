import { z } from 'zod';
import { IMAGE_FORMATS } from './types.js';
import type { GroupToken, ImageFormat } from './types.js';

const GuidSchema = z.string().uuid();

/**
 * Alias charset and length; identical for every backend
 */
export const ALIAS_PATTERN = /^[A-Za-z0-9_-]{3,64}$/;

/**
 * True for a well-formed UUID string (any version, either case)
 */
export function isGuid(value: string): boolean {
    return GuidSchema.safeParse(value).success;
}

export function isValidAlias(value: string): boolean {
    return ALIAS_PATTERN.test(value);
}

export function isImageFormat(value: string): value is ImageFormat {
    return IMAGE_FORMATS.some((format) => format === value);
}

/**
 * Collapses `undefined` to `null` so group comparisons are plain equality
 */
export function normalizeGroup(group: GroupToken): string | null {
    return group ?? null;
}
