import type { FfmpegCommand } from 'fluent-ffmpeg';
import type { Logger } from '@/logging';
import { ToolLaunchError } from '@/errors';

const EXIT_CODE = /ffmpeg exited with code (\d+)/;
const KILLED = /ffmpeg was killed with signal/;

/**
 * Runs a prepared command and resolves with ffmpeg's exit status: 0 when it
 * finished, the code it exited with, or null when a signal ended it. ffmpeg's
 * own output is passed on at debug level. A command that never started
 * rejects with ToolLaunchError.
 */
export const runCommand = (command: FfmpegCommand, logger: Logger): Promise<number | null> => {
    return new Promise<number | null>((resolve, reject) => {
        command
            .on('start', (commandLine: string) => {
                logger.debug('Running: %s', commandLine);
            })
            .on('stderr', (line: string) => {
                logger.debug('ffmpeg: %s', line);
            })
            .on('end', () => {
                resolve(0);
            })
            .on('error', (error: Error) => {
                const exited = EXIT_CODE.exec(error.message);
                if (exited) {
                    logger.error('%s', error.message);
                    resolve(Number(exited[1]));
                    return;
                }
                if (KILLED.test(error.message)) {
                    logger.error('%s', error.message);
                    resolve(null);
                    return;
                }
                reject(new ToolLaunchError('ffmpeg', error));
            })
            .run();
    });
}
