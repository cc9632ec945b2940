// src/shared/utils/rate.util.ts
export interface Rate {
    max: number;
    timeWindow: number; // milliseconds
}

const PERIOD_MS: Record<string, number> = {
    s: 1000,
    m: 60 * 1000,
    h: 60 * 60 * 1000,
    d: 24 * 60 * 60 * 1000
};

/**
 * Parses a rate such as `500/day` or `5/m`. Only the first letter of the
 * period is significant, so `minute`, `min` and `m` are equivalent.
 */
export function parseRate(rate: string): Rate {
    const match = /^\s*(\d+)\s*\/\s*([a-z]+)\s*$/i.exec(rate);
    if (!match) {
        throw new Error(`Invalid rate "${rate}", expected <count>/<period>`);
    }

    const max = parseInt(match[1], 10);
    const timeWindow = PERIOD_MS[match[2].charAt(0).toLowerCase()];

    if (timeWindow === undefined) {
        throw new Error(`Invalid rate period "${match[2]}", expected second, minute, hour or day`);
    }
    if (max < 1) {
        throw new Error(`Invalid rate "${rate}", count must be at least 1`);
    }

    return { max, timeWindow };
}
