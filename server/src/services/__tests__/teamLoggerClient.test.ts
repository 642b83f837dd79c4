/**
 * Tests for the timesheet client: hour extraction, the report window and
 * error handling around the HTTP call. axios is replaced in-process.
 */

import { DataUnavailableError, createReportingWeek } from '@hours-monitor/shared';
import {
    fetchWeeklyHours,
    hoursFromReportItem,
    normalizeBaseUrl,
    reportWindow,
} from '../teamLoggerClient.js';

const http = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock('axios', () => ({
    default: {
        create: vi.fn(() => http),
        isAxiosError: (error: unknown) =>
            typeof error === 'object' && error !== null && 'isAxiosError' in error,
    },
}));

const week = createReportingWeek('2025-10-13');

function httpError(status: number): Error {
    return Object.assign(new Error(`Request failed with status code ${status}`), {
        isAxiosError: true,
        response: { status },
    });
}

describe('normalizeBaseUrl', () => {
    it('drops the query string and trailing slashes', () => {
        expect(normalizeBaseUrl('https://api.example.test/v1/?token=x')).toBe('https://api.example.test/v1');
        expect(normalizeBaseUrl('https://api.example.test')).toBe('https://api.example.test');
    });
});

describe('hoursFromReportItem', () => {
    it('uses the hour fields and subtracts idle time', () => {
        expect(hoursFromReportItem({ id: '7', title: 'Asha', totalHours: 40, idleHours: 3.5 })).toEqual({
            employeeId: '7',
            totalHours: 40,
            idleHours: 3.5,
            activeHours: 36.5,
        });
    });

    it('falls back to the second counters', () => {
        const record = hoursFromReportItem({
            id: '8',
            title: 'Bina',
            totalSecondsCount: 144000,
            inactiveSecondsCount: 7200,
        });

        expect(record.totalHours).toBe(40);
        expect(record.idleHours).toBe(2);
        expect(record.activeHours).toBe(38);
    });

    it('reads a report without hours as zero and never goes negative', () => {
        expect(hoursFromReportItem({ id: '9', title: 'Chirag' }).activeHours).toBe(0);
        expect(hoursFromReportItem({ id: '9', title: 'Chirag', totalHours: 1, idleHours: 2 }).activeHours).toBe(0);
    });
});

describe('reportWindow', () => {
    it('spans local midnight Monday to the last millisecond of Sunday', () => {
        expect(reportWindow(week, 'Asia/Kolkata')).toEqual({
            startTime: Date.UTC(2025, 9, 12, 18, 30),
            endTime: Date.UTC(2025, 9, 19, 18, 30) - 1,
        });
    });

    it('uses UTC midnights for the UTC zone', () => {
        expect(reportWindow(week, 'UTC')).toEqual({
            startTime: Date.UTC(2025, 9, 13),
            endTime: Date.UTC(2025, 9, 20) - 1,
        });
    });
});

describe('fetchWeeklyHours', () => {
    beforeEach(() => {
        http.get.mockReset();
    });

    it('builds employees and hour records from the report', async () => {
        http.get.mockResolvedValue({
            data: [
                { id: 7, title: ' Asha Rao ', email: 'asha@example.test', totalHours: 40, idleHours: 2 },
                { id: 'u-8', title: 'Bina Shah', totalSecondsCount: 108000 },
            ],
        });

        const snapshot = await fetchWeeklyHours(week, 'UTC');

        expect(snapshot.employees).toEqual([
            { id: '7', name: 'Asha Rao', email: 'asha@example.test', active: true },
            { id: 'u-8', name: 'Bina Shah', email: '', active: true },
        ]);
        expect(snapshot.hours.map((h) => [h.employeeId, h.activeHours])).toEqual([
            ['7', 38],
            ['u-8', 30],
        ]);
        expect(http.get).toHaveBeenCalledWith('/api/employee_summary_report', {
            params: { startTime: Date.UTC(2025, 9, 13), endTime: Date.UTC(2025, 9, 20) - 1 },
        });
    });

    it('treats an empty report as unavailable data', async () => {
        http.get.mockResolvedValue({ data: [] });

        await expect(fetchWeeklyHours(week, 'UTC')).rejects.toThrow('Timesheet report for 2025-10-13 is empty');
    });

    it('rejects a payload that is not a list of employees', async () => {
        http.get.mockResolvedValue({ data: { error: 'bad token' } });

        await expect(fetchWeeklyHours(week, 'UTC')).rejects.toThrow('Timesheet report has an unexpected shape');
    });

    it('does not retry client errors', async () => {
        http.get.mockRejectedValue(httpError(401));

        const caught = await fetchWeeklyHours(week, 'UTC').catch((error: unknown) => error);

        expect(caught).toBeInstanceOf(DataUnavailableError);
        expect(caught instanceof DataUnavailableError && caught.source).toBe('timesheet');
        expect(caught instanceof DataUnavailableError && caught.context?.status).toBe(401);
        expect(http.get).toHaveBeenCalledTimes(1);
    });
});
