const DAYS = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'];
const MONTHS = [
    'JANUARY', 'FEBRUARY', 'MARCH', 'APRIL', 'MAY', 'JUNE',
    'JULY', 'AUGUST', 'SEPTEMBER', 'OCTOBER', 'NOVEMBER', 'DECEMBER',
];

function pad2(n: number): string {
    return String(n).padStart(2, '0');
}

/**
 * Human-readable, filename-safe stamp in local time,
 * e.g. "MON-19-OCTOBER-2026-02-47-PM".
 */
export function formatStamp(date: Date = new Date()): string {
    const hours = date.getHours();
    const hour12 = hours % 12 === 0 ? 12 : hours % 12;
    const meridiem = hours < 12 ? 'AM' : 'PM';

    return [
        DAYS[date.getDay()],
        pad2(date.getDate()),
        MONTHS[date.getMonth()],
        String(date.getFullYear()),
        pad2(hour12),
        pad2(date.getMinutes()),
        meridiem,
    ].join('-');
}
