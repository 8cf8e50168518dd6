import * as crypto from 'node:crypto';

// Ids double as file names, so they are limited to this alphabet
export const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Timestamp-derived id such as `20240315-142233-a1b2c3`, in UTC. The random
 * suffix keeps ids unique within the same second.
 */
export const timestampId = (date: Date, suffix: string = crypto.randomBytes(3).toString('hex')): string => {
    const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
    const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
    return `${day}-${time}-${suffix}`;
};

export const isValidId = (id: string): boolean => ID_PATTERN.test(id);
