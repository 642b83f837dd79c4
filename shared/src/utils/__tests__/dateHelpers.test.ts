import {
    addDays,
    clockInZone,
    daysInMonth,
    monthTabNames,
    parseIsoDate,
    startOfDayInZone,
    toDisplayDate,
} from '../dateHelpers.js';

describe('dateHelpers', () => {
    it('parses only real calendar dates', () => {
        expect(parseIsoDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
        expect(parseIsoDate('2025-02-29')).toBeNull();
        expect(parseIsoDate('2025-1-5')).toBeNull();
    });

    it('knows month lengths', () => {
        expect(daysInMonth(2024, 2)).toBe(29);
        expect(daysInMonth(2025, 2)).toBe(28);
        expect(daysInMonth(2025, 12)).toBe(31);
    });

    it('adds days across a year end', () => {
        expect(addDays({ year: 2025, month: 12, day: 30 }, 3)).toEqual({ year: 2026, month: 1, day: 2 });
    });

    it('lists the leave tab names tried for a month', () => {
        expect(monthTabNames(2025, 10)).toEqual(['Oct 25', 'October 25', 'October 2025']);
    });

    it('formats display dates', () => {
        expect(toDisplayDate('2025-10-13')).toBe('13 Oct 2025');
    });

    it('reads the wall clock in a time zone', () => {
        // 02:30 UTC is 08:00 in Kolkata on Monday 13 Oct 2025
        expect(clockInZone(new Date('2025-10-13T02:30:00Z'), 'Asia/Kolkata')).toEqual({ weekday: 1, hour: 8 });
    });

    it('finds local midnight in a time zone', () => {
        expect(startOfDayInZone({ year: 2025, month: 10, day: 13 }, 'Asia/Kolkata').toISOString()).toBe(
            '2025-10-12T18:30:00.000Z'
        );
        expect(startOfDayInZone({ year: 2025, month: 10, day: 13 }, 'UTC').toISOString()).toBe(
            '2025-10-13T00:00:00.000Z'
        );
    });
});
