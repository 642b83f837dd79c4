/**
 * Week evaluation: the full engine pass over one immutable run snapshot.
 *
 * filter → stitch leave → infer holidays → requirement → classify
 */

import { DataUnavailableError } from '../../errors/hours.js';
import type { MonitorConfig } from '../../schemas/hours.js';
import { classifyCompliance } from './compliance.js';
import { createInactiveListPolicy, filterActiveEmployees, type IdentityPolicy } from './employeeFilter.js';
import { inferHolidays } from './holidays.js';
import { buildUnifiedLeaveRecord, countLeaveDays, countWeekendDays } from './leaveIndex.js';
import { attachLeavePeriods, resolvePeriods } from './periods.js';
import { computeRequirement, holidayTopUp } from './requirements.js';
import type {
    ComplianceVerdict,
    Employee,
    HourRecord,
    LeavePeriod,
    ReportingWeek,
    WeekEvaluation,
} from './types.js';

export interface WeekEvaluationInput {
    week: ReportingWeek;
    /** Full timesheet roster, before filtering */
    employees: Employee[];
    /** One matrix per month the week touches */
    leavePeriods: LeavePeriod[];
    hours: HourRecord[];
    config: MonitorConfig;
    /** Defaults to the configured inactive-names list */
    identityPolicy?: IdentityPolicy;
}

export function evaluateWeek(input: WeekEvaluationInput): WeekEvaluation {
    const { week, config } = input;

    const resolved = resolvePeriods(week);
    const attached = attachLeavePeriods(resolved, input.leavePeriods);

    const currentRoster = attached[attached.length - 1].matrix.rows.keys();
    const policy = input.identityPolicy ?? createInactiveListPolicy(config.inactiveEmployees);
    const { active, excluded } = filterActiveEmployees(input.employees, policy, currentRoster);

    const record = buildUnifiedLeaveRecord(week, active, attached);
    const holidays = inferHolidays(record, {
        threshold: config.holidayThreshold,
        minKnownHeadcount: config.minKnownHeadcount,
    });

    const hoursById = new Map(input.hours.map((h) => [h.employeeId, h] as const));

    const verdicts: ComplianceVerdict[] = active.map((employee) => {
        const hours = hoursById.get(employee.id);
        if (!hours) {
            throw new DataUnavailableError('timesheet', `No hour record for ${employee.name} (${employee.id})`, {
                context: { employeeId: employee.id, week: week.start },
            });
        }

        const days = record.entries.get(employee.id) ?? [];
        const requirement = computeRequirement(countLeaveDays(days), holidayTopUp(days, holidays), config);
        const coveredDays = requirement.effectiveLeaveDays + countWeekendDays(days);
        const decision = classifyCompliance({
            activeHours: hours.activeHours,
            requiredHours: requirement.requiredHours,
            acceptableHours: requirement.acceptableHours,
            coveredDays,
            weekDays: config.weekDays,
        });

        return {
            employee,
            ...requirement,
            activeHours: hours.activeHours,
            totalHours: hours.totalHours,
            coveredDays,
            ...decision,
        };
    });

    verdicts.sort((a, b) => a.employee.name.localeCompare(b.employee.name));

    return {
        week,
        periods: resolved,
        holidays,
        verdicts,
        excluded,
        mismatches: record.mismatches,
    };
}

/** Verdicts that should trigger a shortfall notification */
export function nonCompliantVerdicts(evaluation: WeekEvaluation): ComplianceVerdict[] {
    return evaluation.verdicts.filter((v) => v.classification === 'non_compliant');
}
