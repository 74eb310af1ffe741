import ffmpeg from 'fluent-ffmpeg';
import type { FfprobeData } from 'fluent-ffmpeg';
import type { Logger } from '@/logging';
import { ProbeFailedError } from '@/errors';

export interface Probe {
    getDurationSeconds: (filePath: string) => Promise<number>;
}

const ffprobeAsync = (filePath: string): Promise<FfprobeData> => {
    return new Promise((resolve, reject) => {
        ffmpeg.ffprobe(filePath, (err: Error | null, metadata: FfprobeData) => {
            if (err) return reject(err);
            resolve(metadata);
        });
    });
};

export const create = (params: { logger: Logger; ffprobePath?: string }): Probe => {
    const { logger } = params;
    if (params.ffprobePath) {
        ffmpeg.setFfprobePath(params.ffprobePath);
    }

    // Container duration as reported by ffprobe's format section
    const getDurationSeconds = async (filePath: string): Promise<number> => {
        let metadata: FfprobeData;
        try {
            metadata = await ffprobeAsync(filePath);
        } catch (error: unknown) {
            throw new ProbeFailedError(filePath, error instanceof Error ? error.message : String(error));
        }

        const duration = Number(metadata.format.duration);
        if (!Number.isFinite(duration) || duration <= 0) {
            throw new ProbeFailedError(filePath, 'ffprobe reported no duration');
        }

        logger.debug('Duration of %s is %s seconds', filePath, duration);
        return duration;
    };

    return {
        getDurationSeconds,
    };
}
