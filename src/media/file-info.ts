import path from 'node:path';
import { TRIMMED_PREFIX } from '@/constants';
import { InvalidTrimRangeError, TimestampFormatError } from '@/errors';

/**
 * A video file and the section of it to keep. Times are in seconds; an absent
 * start means "from the beginning" and an absent end "to the end".
 */
export interface FileInfo {
    readonly name: string;
    readonly start?: number;
    readonly end?: number;
}

const SECONDS_PATTERN = /^\d+(\.\d+)?$/;
const CLOCK_PATTERN = /^(?:(\d+):)?(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/;

// Accepts HH:MM:SS[.fff], MM:SS[.fff] or plain seconds
export const parseTimestamp = (value: string | number): number => {
    if (typeof value === 'number') {
        if (!Number.isFinite(value) || value < 0) {
            throw new TimestampFormatError(String(value));
        }
        return value;
    }

    const text = value.trim();
    if (SECONDS_PATTERN.test(text)) {
        return parseFloat(text);
    }

    const match = CLOCK_PATTERN.exec(text);
    if (!match) {
        throw new TimestampFormatError(value);
    }

    const hours = match[1] ? parseInt(match[1], 10) : 0;
    const minutes = parseInt(match[2], 10);
    const seconds = parseFloat(match[3]);
    if (minutes >= 60 || seconds >= 60) {
        throw new TimestampFormatError(value);
    }
    return hours * 3600 + minutes * 60 + seconds;
}

// ffmpeg accepts fractional seconds; keep millisecond precision and no trailing zeros
export const formatSeconds = (seconds: number): string => {
    return String(Number(seconds.toFixed(3)));
}

export const createFileInfo = (name: string, start?: number, end?: number): FileInfo => {
    if (start !== undefined && end !== undefined && start >= end) {
        throw new InvalidTrimRangeError(name, start, end);
    }
    return {
        name,
        ...(start !== undefined && { start }),
        ...(end !== undefined && { end }),
    };
}

export const hasTrim = (info: FileInfo): boolean => info.start !== undefined || info.end !== undefined;

// Name (not path) of the trimmed copy; position keeps repeated sources apart
export const getOutputName = (info: FileInfo, position?: number): string => {
    const sequence = position === undefined ? '' : `${position}_`;
    return `${TRIMMED_PREFIX}${sequence}${path.basename(info.name)}`;
}
