import ffmpeg from 'fluent-ffmpeg';
import type { Logger } from '@/logging';
import * as Storage from '@/util/storage';
import { type FfmpegLogLevel, buildConcatOptions } from '@/media/command';
import { runCommand } from '@/media/ffmpeg';
import { writeManifest } from '@/media/manifest';
import { ConcatFailedError } from '@/errors';

export interface Concatenator {
    concat: (files: readonly string[], manifestPath: string, output: string, codec?: string) => Promise<number>;
}

export interface ConcatenatorConfig {
    ffmpegPath: string;
    logLevel: FfmpegLogLevel;
}

/**
 * Joins files with ffmpeg's concat demuxer. Inputs must share codecs and
 * container parameters for a stream copy; a mismatch only shows up as a
 * nonzero ffmpeg exit.
 */
export const create = (
    config: ConcatenatorConfig,
    deps: { logger: Logger; storage: Storage.Utility },
): Concatenator => {
    const { logger, storage } = deps;

    const concat = async (files: readonly string[], manifestPath: string, output: string, codec?: string): Promise<number> => {
        for (const file of files) {
            logger.info('Adding %s to the process queue.', file);
        }
        await writeManifest(storage, manifestPath, files);

        const options = buildConcatOptions({ codec, logLevel: config.logLevel });
        const command = ffmpeg()
            .setFfmpegPath(config.ffmpegPath)
            .input(manifestPath)
            .inputOptions(options.input)
            .outputOptions(options.output)
            .output(output);

        const code = await runCommand(command, logger);
        if (code !== 0) {
            await storage.deleteFile(output);
            throw new ConcatFailedError(output, code);
        }

        logger.info('Concatenated %d file(s) into %s', files.length, output);
        return code;
    }

    return {
        concat,
    };
}
