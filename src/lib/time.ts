// 날짜는 모두 UTC 자정의 Date로 다룬다 (KST 달력 날짜를 담는 용도).

const KST_OFFSET_MS = 9 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/** YYYYMMDDHHMM → epoch ms (벽시계 시각을 UTC로 취급). 형식이 틀리면 null. */
export function parseTimestamp(raw: string): number | null {
    if (!/^\d{12}$/.test(raw)) return null;
    const year = Number(raw.slice(0, 4));
    const month = Number(raw.slice(4, 6));
    const day = Number(raw.slice(6, 8));
    const hour = Number(raw.slice(8, 10));
    const minute = Number(raw.slice(10, 12));

    if (hour > 23 || minute > 59) return null;
    const ms = Date.UTC(year, month - 1, day, hour, minute);
    const dt = new Date(ms);
    if (dt.getUTCFullYear() !== year || dt.getUTCMonth() !== month - 1 || dt.getUTCDate() !== day) {
        return null;
    }
    return ms;
}

/** epoch ms → "YYYY-MM-DD HH:mm" */
export function formatTimestamp(ms: number): string {
    const dt = new Date(ms);
    return `${formatIsoDate(dt)} ${pad(dt.getUTCHours())}:${pad(dt.getUTCMinutes())}`;
}

/** 통보 시각을 사람이 읽는 형태로. 해석할 수 없으면 원문 그대로. */
export function humanizeTimestamp(raw: string): string {
    const ms = parseTimestamp(raw);
    return ms === null ? raw : formatTimestamp(ms);
}

export function shiftHours(ms: number, hours: number): number {
    return ms + hours * HOUR_MS;
}

/** Date → YYYYMMDD */
export function formatCompactDate(date: Date): string {
    return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

/** Date → YYYY-MM-DD */
export function formatIsoDate(date: Date): string {
    return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** YYYYMMDD → Date. 존재하지 않는 날짜면 null. */
export function parseCompactDate(raw: string): Date | null {
    const ms = parseTimestamp(`${raw.trim()}0000`);
    return ms === null ? null : new Date(ms);
}

export function addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * DAY_MS);
}

/** 주어진 시각의 한국(UTC+9) 달력 날짜 */
export function kstToday(now: Date): Date {
    const kst = new Date(now.getTime() + KST_OFFSET_MS);
    return new Date(Date.UTC(kst.getUTCFullYear(), kst.getUTCMonth(), kst.getUTCDate()));
}

function utcDate(year: number, monthIndex: number, day: number): Date {
    // Date.UTC 는 0~99년을 1900년대로 옮긴다.
    const date = new Date(0);
    date.setUTCFullYear(year, monthIndex, day);
    return date;
}

export function yearRange(year: number): { from: Date; to: Date } {
    return {
        from: utcDate(year, 0, 1),
        to: utcDate(year, 11, 31),
    };
}
