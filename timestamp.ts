import { Timestamp } from './frame-classes';
import { Id3Error } from './errors';

const TIMESTAMP_PATTERN = /^(\d{4})(?:-(\d{2})(?:-(\d{2})(?:T(\d{2})(?::(\d{2})(?::(\d{2}))?)?)?)?)?$/;

/*
**  yyyy, yyyy-MM, yyyy-MM-dd, yyyy-MM-ddTHH, yyyy-MM-ddTHH:mm, yyyy-MM-ddTHH:mm:ss
*/
export function parseTimestamp(value: string): Timestamp {
    const match = TIMESTAMP_PATTERN.exec(value.trim());
    if (!match) {
        throw new Id3Error('Parsing', `Invalid timestamp "${value}"`);
    }
    const [, year, month, day, hour, minute, second] = match;
    const timestamp: Timestamp = { year: Number(year) };
    if (month !== undefined) {
        timestamp.month = Number(month);
    }
    if (day !== undefined) {
        timestamp.day = Number(day);
    }
    if (hour !== undefined) {
        timestamp.hour = Number(hour);
    }
    if (minute !== undefined) {
        timestamp.minute = Number(minute);
    }
    if (second !== undefined) {
        timestamp.second = Number(second);
    }
    return timestamp;
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

export function formatTimestamp(timestamp: Timestamp): string {
    let result = pad(timestamp.year, 4);
    if (timestamp.month === undefined) {
        return result;
    }
    result += `-${pad(timestamp.month, 2)}`;
    if (timestamp.day === undefined) {
        return result;
    }
    result += `-${pad(timestamp.day, 2)}`;
    if (timestamp.hour === undefined) {
        return result;
    }
    result += `T${pad(timestamp.hour, 2)}`;
    if (timestamp.minute === undefined) {
        return result;
    }
    result += `:${pad(timestamp.minute, 2)}`;
    if (timestamp.second === undefined) {
        return result;
    }
    return result + `:${pad(timestamp.second, 2)}`;
}

/*
**  Splits a timestamp into the ID3v2.3 TYER (yyyy), TDAT (DDMM) and TIME (HHMM) values
*/
export function toLegacyDateValues(timestamp: Timestamp): { year: string; date?: string; time?: string } {
    const values: { year: string; date?: string; time?: string } = { year: pad(timestamp.year, 4) };
    if (timestamp.month !== undefined && timestamp.day !== undefined) {
        values.date = pad(timestamp.day, 2) + pad(timestamp.month, 2);
        if (timestamp.hour !== undefined && timestamp.minute !== undefined) {
            values.time = pad(timestamp.hour, 2) + pad(timestamp.minute, 2);
        }
    }
    return values;
}

export function fromLegacyDateValues(year: string, date?: string, time?: string): Timestamp {
    const timestamp = parseTimestamp(year);
    if (date && /^\d{4}$/.test(date)) {
        timestamp.day = Number(date.substring(0, 2));
        timestamp.month = Number(date.substring(2, 4));
        if (time && /^\d{4}$/.test(time)) {
            timestamp.hour = Number(time.substring(0, 2));
            timestamp.minute = Number(time.substring(2, 4));
        }
    }
    return timestamp;
}
