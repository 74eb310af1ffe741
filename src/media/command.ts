import { DEFAULT_CODEC } from '@/constants';
import { formatSeconds } from '@/media/file-info';

export type FfmpegLogLevel = 'quiet' | 'panic' | 'fatal' | 'error' | 'warning' | 'info' | 'verbose' | 'debug';

/**
 * Options for one fluent-ffmpeg command, split by where ffmpeg reads them:
 * `input` goes before the `-i` it applies to, `output` before the output path.
 * Every logical argument is its own element.
 */
export interface CommandOptions {
    input: string[];
    output: string[];
}

export interface TrimOptionsParams {
    start?: number;
    duration?: number;
    logLevel: FfmpegLogLevel;
}

export interface ConcatOptionsParams {
    codec?: string;
    logLevel: FfmpegLogLevel;
}

// ffmpeg accepts global options anywhere on its command line. Intermediate
// outputs are always replaced; the deliverable is checked before any run.
export const buildGlobalOptions = (logLevel: FfmpegLogLevel): string[] => [
    '-hide_banner',
    '-loglevel', logLevel,
    '-y',
];

/**
 * Stream-copy trim. The seek is an input option (fast input seeking) and the
 * length is a duration, because after an input seek output timestamps
 * restart at zero.
 */
export const buildTrimOptions = (params: TrimOptionsParams): CommandOptions => {
    const input: string[] = [];
    if (params.start !== undefined) {
        input.push('-ss', formatSeconds(params.start));
    }

    const output = buildGlobalOptions(params.logLevel);
    if (params.duration !== undefined) {
        output.push('-t', formatSeconds(params.duration));
    }
    output.push('-c', 'copy');
    return { input, output };
}

export const buildCodecArgs = (codec: string = DEFAULT_CODEC): string[] => {
    if (codec === DEFAULT_CODEC) {
        return ['-c', 'copy'];
    }
    return ['-c:v', codec, '-c:a', 'copy'];
}

// Concat demuxer; -safe 0 lets the manifest name absolute or unusual paths
export const buildConcatOptions = (params: ConcatOptionsParams): CommandOptions => {
    return {
        input: ['-f', 'concat', '-safe', '0'],
        output: [...buildGlobalOptions(params.logLevel), ...buildCodecArgs(params.codec)],
    };
}
