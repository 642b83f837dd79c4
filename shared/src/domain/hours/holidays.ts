/**
 * HolidayInferer: company holidays from near-universal simultaneous leave.
 *
 * The leave sheet has no holiday calendar; a holiday shows up as most of the
 * team marked on leave the same day. For each day:
 *
 *   fraction = employees on leave / employees with a known marking
 *
 * `unknown` employees are in neither count. A day with no known markings is
 * never a holiday. The comparison with the threshold is strict.
 */

import type { HolidayDayStats, HolidaySet, UnifiedLeaveRecord } from './types.js';

export interface HolidayInferenceOptions {
    threshold: number;
    /** Known markings needed before a day can qualify */
    minKnownHeadcount?: number;
}

export function inferHolidays(
    record: UnifiedLeaveRecord,
    options: HolidayInferenceOptions
): HolidaySet {
    const { threshold } = options;
    const minKnown = Math.max(options.minKnownHeadcount ?? 1, 1);

    const stats: HolidayDayStats[] = record.week.days.map((date, index) => {
        let onLeave = 0;
        let known = 0;

        for (const days of record.entries.values()) {
            const marking = days[index].marking;
            if (marking.kind === 'unknown') continue;
            known++;
            if (marking.kind === 'leave') onLeave++;
        }

        const fraction = known > 0 ? onLeave / known : null;
        const isHoliday = fraction !== null && known >= minKnown && fraction > threshold;
        return { date, onLeave, known, fraction, isHoliday };
    });

    return {
        dates: stats.filter((s) => s.isHoliday).map((s) => s.date).sort(),
        threshold,
        stats,
    };
}
