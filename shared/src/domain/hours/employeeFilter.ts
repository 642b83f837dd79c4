/**
 * EmployeeFilter: drop people who have left before anything else runs.
 */

import { normalizeNameKey } from './names.js';
import type { Employee, ExcludedEmployee } from './types.js';

/**
 * Decides whether an identity is known to be inactive.
 * Swap in a different policy to drive exclusions from an HR source.
 */
export interface IdentityPolicy {
    isInactive(employee: Employee): boolean;
}

/** Policy backed by a list of names, matched on the normalized key */
export function createInactiveListPolicy(names: Iterable<string>): IdentityPolicy {
    const keys = new Set<string>();
    for (const name of names) {
        const key = normalizeNameKey(name);
        if (key) keys.add(key);
    }
    return {
        isInactive: (employee) => !employee.active || keys.has(normalizeNameKey(employee.name)),
    };
}

export interface FilterResult {
    active: Employee[];
    excluded: ExcludedEmployee[];
}

/**
 * Split the timesheet roster into active and excluded employees.
 *
 * @param leaveRoster - names present in the current leave period; someone on the
 *   timesheet but missing here is treated as having left
 */
export function filterActiveEmployees(
    all: Employee[],
    policy: IdentityPolicy,
    leaveRoster: Iterable<string>
): FilterResult {
    const rosterKeys = new Set<string>();
    for (const name of leaveRoster) rosterKeys.add(normalizeNameKey(name));

    const active: Employee[] = [];
    const excluded: ExcludedEmployee[] = [];

    for (const employee of all) {
        if (policy.isInactive(employee)) {
            excluded.push({ employee, reason: 'inactive_list' });
        } else if (!rosterKeys.has(normalizeNameKey(employee.name))) {
            excluded.push({ employee, reason: 'not_in_leave_roster' });
        } else {
            active.push(employee);
        }
    }

    return { active, excluded };
}
