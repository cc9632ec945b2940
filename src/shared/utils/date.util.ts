// src/shared/utils/date.util.ts

/**
 * Calendar date (YYYY-MM-DD) of `now` as seen in `timeZone`.
 */
export function todayIn(timeZone: string, now: Date = new Date()): string {
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit'
    }).formatToParts(now);

    const part = (type: Intl.DateTimeFormatPartTypes): string =>
        parts.find(p => p.type === type)?.value ?? '';

    return `${part('year')}-${part('month')}-${part('day')}`;
}
