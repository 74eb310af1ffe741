import ffmpeg from 'fluent-ffmpeg';
import type { Logger } from '@/logging';
import * as Storage from '@/util/storage';
import type { Probe } from '@/media/probe';
import { type FfmpegLogLevel, buildTrimOptions } from '@/media/command';
import { runCommand } from '@/media/ffmpeg';
import { type FileInfo, formatSeconds, hasTrim } from '@/media/file-info';
import { InvalidTrimRangeError, TrimFailedError } from '@/errors';

export interface TrimOptions {
    // Seconds to cut from the end of the file, measured from its container duration
    trimEndSeconds?: number;
}

export interface Trimmer {
    trim: (info: FileInfo, output: string, options?: TrimOptions) => Promise<number>;
}

export interface TrimmerConfig {
    ffmpegPath: string;
    logLevel: FfmpegLogLevel;
}

export const create = (
    config: TrimmerConfig,
    deps: { logger: Logger; storage: Storage.Utility; probe: Probe },
): Trimmer => {
    const { logger, storage, probe } = deps;

    const resolveEnd = async (info: FileInfo, options: TrimOptions): Promise<number | undefined> => {
        if (options.trimEndSeconds === undefined) {
            return info.end;
        }
        const duration = await probe.getDurationSeconds(info.name);
        const end = duration - options.trimEndSeconds;
        logger.debug('Trimming last %s seconds from %s (originally %s seconds)', options.trimEndSeconds, info.name, duration);
        return info.end === undefined ? end : Math.min(info.end, end);
    }

    const trim = async (info: FileInfo, output: string, options: TrimOptions = {}): Promise<number> => {
        if (!hasTrim(info) && options.trimEndSeconds === undefined) {
            logger.debug('Nothing to trim in %s, copying to %s', info.name, output);
            await storage.copyFile(info.name, output);
            return 0;
        }

        const start = info.start;
        const end = await resolveEnd(info, options);
        if (end !== undefined && end <= (start ?? 0)) {
            throw new InvalidTrimRangeError(info.name, start ?? 0, end);
        }

        const commandOptions = buildTrimOptions({
            start,
            duration: end === undefined ? undefined : end - (start ?? 0),
            logLevel: config.logLevel,
        });

        logger.info('Trimming %s (from %s to %s)', info.name,
            start === undefined ? 'start' : `${formatSeconds(start)}s`,
            end === undefined ? 'end' : `${formatSeconds(end)}s`);

        const command = ffmpeg(info.name)
            .setFfmpegPath(config.ffmpegPath)
            .inputOptions(commandOptions.input)
            .outputOptions(commandOptions.output)
            .output(output);
        const code = await runCommand(command, logger);
        if (code !== 0) {
            // ffmpeg may leave a truncated file behind
            await storage.deleteFile(output);
            throw new TrimFailedError(info.name, code);
        }
        return code;
    }

    return {
        trim,
    };
}
