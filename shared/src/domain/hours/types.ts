/**
 * Weekly hours engine: entity types.
 *
 * Every value here is built fresh for one monitoring run and discarded after.
 */

// ============================================
// IDENTITIES
// ============================================

export interface Employee {
    /** Timesheet-side id */
    id: string;
    name: string;
    email: string;
    active: boolean;
    /** Normalized manager name; resolved against the manager mapping, not owned */
    managerKey?: string;
}

// ============================================
// WEEK & PERIODS
// ============================================

/** Monday–Sunday window; always 7 consecutive ISO dates */
export interface ReportingWeek {
    readonly start: string;
    readonly end: string;
    readonly days: readonly string[];
}

/** One calendar month's leave matrix as read from the leave source */
export interface LeavePeriod {
    /** Month key, e.g. "2025-10" */
    id: string;
    year: number;
    month: number;
    daysInMonth: number;
    /**
     * Display name → cells; index 0 is day 1.
     * Shorter rows are allowed, missing cells read as blank.
     */
    rows: Map<string, string[]>;
}

/** The slice of a week owned by one leave period */
export interface ResolvedPeriod {
    id: string;
    year: number;
    month: number;
    /** ISO dates of the week that fall in this month */
    dates: string[];
    /** 1-based day-of-month numbers matching `dates` */
    days: number[];
}

export interface AttachedPeriod extends ResolvedPeriod {
    matrix: LeavePeriod;
}

// ============================================
// MARKINGS
// ============================================

export const LEAVE_SUBTYPES = [
    'casual',
    'sick',
    'earned',
    'personal',
    'comp_off',
    'medical',
    'work_from_home',
    'holiday',
    'other',
] as const;
export type LeaveSubtype = (typeof LEAVE_SUBTYPES)[number];

export type DayMarking =
    | { kind: 'weekend' }
    | { kind: 'working' }
    | { kind: 'unknown' }
    | { kind: 'leave'; subtype: LeaveSubtype; fraction: number };

export type DayMarkingKind = DayMarking['kind'];

export interface DayEntry {
    date: string;
    periodId: string;
    marking: DayMarking;
}

/** Employee name missing from a period's matrix */
export interface IdentityMismatch {
    employeeId: string;
    employeeName: string;
    periodId: string;
}

export interface UnifiedLeaveRecord {
    week: ReportingWeek;
    /** employee id → exactly 7 entries, in week order */
    entries: Map<string, DayEntry[]>;
    mismatches: IdentityMismatch[];
}

// ============================================
// HOLIDAYS
// ============================================

export interface HolidayDayStats {
    date: string;
    onLeave: number;
    known: number;
    /** null when no employee had a known marking */
    fraction: number | null;
    isHoliday: boolean;
}

export interface HolidaySet {
    /** Sorted ISO dates inferred as company-wide holidays */
    dates: string[];
    threshold: number;
    stats: HolidayDayStats[];
}

// ============================================
// HOURS & VERDICTS
// ============================================

export interface HourRecord {
    employeeId: string;
    totalHours: number;
    idleHours: number;
    /** total minus idle, never negative */
    activeHours: number;
}

export const COMPLIANCE_CLASSIFICATIONS = ['compliant', 'non_compliant', 'exempt'] as const;
export type ComplianceClassification = (typeof COMPLIANCE_CLASSIFICATIONS)[number];

export interface Requirement {
    leaveDays: number;
    holidayDays: number;
    effectiveLeaveDays: number;
    requiredHours: number;
    acceptableHours: number;
}

export interface ComplianceVerdict extends Requirement {
    employee: Employee;
    activeHours: number;
    totalHours: number;
    /** Leave, holiday and weekend days together */
    coveredDays: number;
    shortfall: number | null;
    classification: ComplianceClassification;
}

export type ExclusionReason = 'inactive_list' | 'not_in_leave_roster';

export interface ExcludedEmployee {
    employee: Employee;
    reason: ExclusionReason;
}

export interface WeekEvaluation {
    week: ReportingWeek;
    periods: ResolvedPeriod[];
    holidays: HolidaySet;
    verdicts: ComplianceVerdict[];
    excluded: ExcludedEmployee[];
    mismatches: IdentityMismatch[];
}
