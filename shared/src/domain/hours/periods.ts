/**
 * PeriodResolver: which leave periods (calendar months) a week spans.
 *
 * A week lies in one month or straddles two. Each resolved period owns the
 * sub-range of the week's dates in its month; together they partition the week.
 */

import { AmbiguousPeriodBoundaryError, UnresolvedPeriodError } from '../../errors/hours.js';
import { monthKey, parseIsoDate } from '../../utils/dateHelpers.js';
import type { AttachedPeriod, LeavePeriod, ReportingWeek, ResolvedPeriod } from './types.js';

/**
 * Resolve the ordered list of periods a week overlaps.
 * One period when start and end share a month, two otherwise, oldest first.
 */
export function resolvePeriods(week: ReportingWeek): ResolvedPeriod[] {
    const periods: ResolvedPeriod[] = [];

    for (const iso of week.days) {
        const date = parseIsoDate(iso);
        if (!date) {
            throw new AmbiguousPeriodBoundaryError(`Week contains an invalid date "${iso}"`, { week });
        }

        const id = monthKey(date.year, date.month);
        let current = periods[periods.length - 1];
        if (!current || current.id !== id) {
            current = { id, year: date.year, month: date.month, dates: [], days: [] };
            periods.push(current);
        }
        current.dates.push(iso);
        current.days.push(date.day);
    }

    // 7 consecutive days can touch at most two months
    if (periods.length === 0 || periods.length > 2) {
        throw new AmbiguousPeriodBoundaryError(
            `Week ${week.start}..${week.end} resolves to ${periods.length} periods`,
            { week, periodIds: periods.map((p) => p.id) }
        );
    }

    return periods;
}

/** Id of the period that owns the last day of the week */
export function latestPeriodId(periods: ResolvedPeriod[]): string | undefined {
    return periods[periods.length - 1]?.id;
}

/**
 * Pair each resolved period with its fetched leave matrix.
 * @throws UnresolvedPeriodError when a period has no matrix
 */
export function attachLeavePeriods(
    resolved: ResolvedPeriod[],
    matrices: Iterable<LeavePeriod>
): AttachedPeriod[] {
    const byId = new Map<string, LeavePeriod>();
    for (const matrix of matrices) byId.set(matrix.id, matrix);

    return resolved.map((period) => {
        const matrix = byId.get(period.id);
        if (!matrix) throw new UnresolvedPeriodError(period.id);

        const outOfRange = period.days.find((day) => day > matrix.daysInMonth);
        if (outOfRange !== undefined) {
            throw new AmbiguousPeriodBoundaryError(
                `Day ${outOfRange} is outside period ${matrix.id} (${matrix.daysInMonth} days)`,
                { periodId: matrix.id, day: outOfRange }
            );
        }

        return { ...period, matrix };
    });
}
