/**
 * Leave-sheet cell parsing.
 *
 * Cells are free text typed by people ("CL", "Half SL", "holiday", "wfh"),
 * so parsing is vocabulary-based. Unrecognised text reads as working.
 */

import { isWeekendDate, parseIsoDate } from '../../utils/dateHelpers.js';
import type { DayMarking, LeaveSubtype } from './types.js';

const WORKING_VALUES = new Set([
    '', '-', '.', 'na', 'n/a', 'nil', 'working', 'present', 'p', '0', 'w/o', 'wo',
]);

const WEEKEND_VALUES = new Set(['weekend', 'week end', 'sat', 'sun', 'saturday', 'sunday']);

const LEAVE_INDICATORS = [
    'leave', 'holiday', 'vacation', 'sick', 'personal', 'casual', 'earned',
    'comp off', 'compoff', 'wfh', 'work from home', 'medical', 'emergency',
    'half', '0.5', '½', 'maternity', 'paternity', 'annual', 'privilege',
    'bereavement', 'marriage', 'study',
];

const LEAVE_CODE_RE = /^(cl|sl|pl|el|co)$/i;

const HALF_DAY_INDICATORS = [
    'half', '0.5', '½', '1/2', 'partial', 'h.d',
    'morning leave', 'afternoon leave', 'short leave',
];

/** First matching rule wins */
const SUBTYPE_RULES: ReadonlyArray<{ subtype: LeaveSubtype; test: RegExp }> = [
    { subtype: 'holiday', test: /holiday/ },
    { subtype: 'casual', test: /casual|\bcl\b/ },
    { subtype: 'sick', test: /sick|\bsl\b/ },
    { subtype: 'earned', test: /earned|\bel\b|privilege/ },
    { subtype: 'personal', test: /personal|\bpl\b/ },
    { subtype: 'comp_off', test: /comp\s?off|\bco\b/ },
    { subtype: 'medical', test: /medical|maternity|paternity/ },
    { subtype: 'work_from_home', test: /wfh|work from home/ },
];

export function isLeaveCell(cell: string): boolean {
    const value = cell.trim().toLowerCase();
    if (WORKING_VALUES.has(value) || WEEKEND_VALUES.has(value)) return false;
    if (LEAVE_CODE_RE.test(value)) return true;
    return LEAVE_INDICATORS.some((indicator) => value.includes(indicator));
}

export function isHalfDayCell(cell: string): boolean {
    const value = cell.trim().toLowerCase();
    if (/\bhd\b/.test(value)) return true;
    return HALF_DAY_INDICATORS.some((indicator) => value.includes(indicator));
}

export function leaveSubtypeOf(cell: string): LeaveSubtype {
    const value = cell.trim().toLowerCase();
    return SUBTYPE_RULES.find((rule) => rule.test.test(value))?.subtype ?? 'other';
}

/**
 * Parse one cell for a given date.
 * Saturdays and Sundays are weekend whatever the cell says; other days never are.
 */
export function parseDayMarking(cell: string | undefined, isoDate: string): DayMarking {
    const date = parseIsoDate(isoDate);
    if (date && isWeekendDate(date)) return { kind: 'weekend' };

    // Weekend words typed on a weekday read as working
    const raw = cell ?? '';
    if (!isLeaveCell(raw)) return { kind: 'working' };

    return {
        kind: 'leave',
        subtype: leaveSubtypeOf(raw),
        fraction: isHalfDayCell(raw) ? 0.5 : 1,
    };
}

/** Leave weight of a marking: 1, 0.5 or 0 */
export function leaveFraction(marking: DayMarking): number {
    return marking.kind === 'leave' ? marking.fraction : 0;
}
