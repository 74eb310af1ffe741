#!/usr/bin/env node
import 'dotenv/config';
import * as Arguments from '@/arguments';
import { PROGRAM_NAME, VERSION, FFMPEG_DEBUG_LOG_LEVEL, FFMPEG_LOG_LEVEL } from '@/constants';
import { getLogger } from '@/logging';
import { ClipjoinError } from '@/errors';
import * as Pipeline from './pipeline';

const printSummary = (result: Pipeline.RunResult) => {
    // eslint-disable-next-line no-console
    console.info('\n' + '='.repeat(60));
    // eslint-disable-next-line no-console
    console.info(`${PROGRAM_NAME.toUpperCase()} SUMMARY (${result.mode})`);
    // eslint-disable-next-line no-console
    console.info('='.repeat(60));
    // eslint-disable-next-line no-console
    console.info(`Input files: ${result.inputs.length}`);
    for (const input of result.inputs) {
        // eslint-disable-next-line no-console
        console.info(`  ${input}`);
    }
    if (result.configPath) {
        // eslint-disable-next-line no-console
        console.info(`Configuration: ${result.configPath}`);
    }
    if (result.deliverable) {
        // eslint-disable-next-line no-console
        console.info(`Output: ${result.deliverable}`);
    }
    if (result.removed.length > 0 || result.renamed.length > 0) {
        // eslint-disable-next-line no-console
        console.info(`Cleaned up: ${result.removed.length} removed, ${result.renamed.length} renamed`);
    }
    // eslint-disable-next-line no-console
    console.info('='.repeat(60));
}

export async function main(argv: readonly string[] = process.argv) {
    try {
        // Also applies --verbose and --debug to the shared logger
        const config = await Arguments.configure(argv);
        getLogger().info('Running %s version %s', PROGRAM_NAME, VERSION);

        const pipeline = Pipeline.create({
            directory: config.directory,
            pattern: config.pattern,
            output: config.output,
            from: config.from,
            trimEnd: config.trimEnd,
            keepAllFiles: config.keepAllFiles,
            renameProcessed: config.renameProcessed,
            ffmpegPath: config.ffmpegPath,
            ffprobePath: config.ffprobePath,
            ffmpegLogLevel: config.debug ? FFMPEG_DEBUG_LOG_LEVEL : FFMPEG_LOG_LEVEL,
        });

        const result = await pipeline.run(config.mode);
        if (result.inputs.length > 0) {
            printSummary(result);
        }
    } catch (error: unknown) {
        // The level may have changed since startup, so fetch the logger again
        const logger = getLogger();
        if (error instanceof ClipjoinError) {
            logger.error('%s', error.message);
        } else if (error instanceof Error) {
            logger.error('Exiting due to Error: %s, %s', error.message, error.stack);
        } else {
            logger.error('Exiting due to Error: %s', String(error));
        }
        process.exit(1);
    }
}
