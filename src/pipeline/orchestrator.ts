/**
 * Orchestrator
 *
 * Sequences one run: collect or load the files, trim where asked, concatenate,
 * move the result to the deliverable name and clean up. Any failure aborts the
 * run and leaves every intermediate file in place for inspection.
 */

import path from 'node:path';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import * as Collector from '@/media/collector';
import * as Probe from '@/media/probe';
import * as Trim from '@/media/trim';
import * as Concat from '@/media/concat';
import * as ConfigManager from '@/config/manager';
import { createFileInfo, getOutputName, hasTrim } from '@/media/file-info';
import { CONCAT_OUTPUT_BASENAME, DEFAULT_CODEC, JOIN_MANIFEST_FILENAME, PROCESSED_PREFIX } from '@/constants';
import { ConfigurationError, DeliverableExistsError, MissingInputError } from '@/errors';
import type { PipelineConfig, PlannedFile, RunMode, RunResult } from './types';

export interface OrchestratorDeps {
    logger?: Logging.Logger;
    storage?: Storage.Utility;
    probe?: Probe.Probe;
}

export interface OrchestratorInstance {
    runDefault(): Promise<RunResult>;
    generateConfig(): Promise<RunResult>;
    useConfig(): Promise<RunResult>;
    run(mode: RunMode): Promise<RunResult>;
}

/**
 * --from applies to the first file and --trim-end to the last; a single file
 * gets both, interior files neither.
 */
export const planDefaultRun = (files: readonly string[], from?: number, trimEnd?: number): PlannedFile[] => {
    return files.map((name, i) => ({
        info: createFileInfo(name, i === 0 ? from : undefined),
        ...(i === files.length - 1 && trimEnd !== undefined && { trimEndSeconds: trimEnd }),
    }));
}

export const create = (config: PipelineConfig, deps: OrchestratorDeps = {}): OrchestratorInstance => {
    const logger = deps.logger ?? Logging.getLogger();
    const storage = deps.storage ?? Storage.create({ log: logger.debug.bind(logger) });
    const probe = deps.probe ?? Probe.create({ logger, ffprobePath: config.ffprobePath });

    const collector = Collector.create({ storage, logger });
    const trimmer = Trim.create({ ffmpegPath: config.ffmpegPath, logLevel: config.ffmpegLogLevel }, { logger, storage, probe });
    const concatenator = Concat.create({ ffmpegPath: config.ffmpegPath, logLevel: config.ffmpegLogLevel }, { logger, storage });
    const configManager = ConfigManager.create({ logger, storage, collector });

    const directory = path.resolve(config.directory);
    const deliverable = path.resolve(directory, config.output);

    const ensureDirectory = async (): Promise<void> => {
        if (!await storage.isDirectoryWritable(directory)) {
            throw new ConfigurationError(`Directory does not exist or is not writable: ${directory}`);
        }
    }

    const ensureDeliverableFree = async (): Promise<void> => {
        if (await storage.exists(deliverable)) {
            throw new DeliverableExistsError(deliverable);
        }
    }

    const cleanup = async (inputs: readonly string[], intermediates: readonly string[]): Promise<Pick<RunResult, 'removed' | 'renamed'>> => {
        const removed: string[] = [];
        const renamed: string[] = [];
        if (config.keepAllFiles) {
            logger.info('Keeping all files (%d intermediate)', intermediates.length);
            return { removed, renamed };
        }

        for (const file of intermediates) {
            await storage.deleteFile(file);
            removed.push(file);
            logger.debug('Removed intermediate file %s', file);
        }

        for (const file of new Set(inputs)) {
            if (config.renameProcessed) {
                const target = path.join(path.dirname(file), `${PROCESSED_PREFIX}${path.basename(file)}`);
                await storage.rename(file, target);
                renamed.push(target);
                logger.debug('Renamed %s to %s', file, target);
            } else {
                await storage.deleteFile(file);
                removed.push(file);
                logger.debug('Removed input file %s', file);
            }
        }
        return { removed, renamed };
    }

    // Shared by the default and use-config modes once the file list is known
    const execute = async (mode: RunMode, planned: readonly PlannedFile[], codec: string): Promise<RunResult> => {
        const intermediates: string[] = [];
        const segments: string[] = [];

        for (const [i, { info, trimEndSeconds }] of planned.entries()) {
            if (!hasTrim(info) && trimEndSeconds === undefined) {
                segments.push(info.name);
                continue;
            }
            const trimmed = path.join(directory, getOutputName(info, i + 1));
            await trimmer.trim(info, trimmed, { trimEndSeconds });
            intermediates.push(trimmed);
            segments.push(trimmed);
        }

        const manifest = path.join(directory, JOIN_MANIFEST_FILENAME);
        const concatOutput = path.join(directory, `${CONCAT_OUTPUT_BASENAME}${path.extname(deliverable)}`);
        intermediates.push(manifest);

        // The concat demuxer resolves entries against the manifest's directory
        const entries = segments.map(segment => path.relative(directory, segment));
        await concatenator.concat(entries, manifest, concatOutput, codec);

        await storage.rename(concatOutput, deliverable);
        logger.info('Wrote %s', deliverable);

        const inputs = planned.map(({ info }) => info.name);
        const { removed, renamed } = await cleanup(inputs, intermediates);

        return { mode, inputs, deliverable, removed, renamed };
    }

    const runDefault = async (): Promise<RunResult> => {
        await ensureDirectory();

        const names = await collector.collect(directory, config.pattern);
        if (names.length === 0) {
            logger.warn('No files matching %s in %s, nothing to do.', config.pattern, directory);
            return { mode: 'default', inputs: [], removed: [], renamed: [] };
        }
        await ensureDeliverableFree();

        const files = names.map(name => path.join(directory, name));
        const planned = planDefaultRun(files, config.from, config.trimEnd);
        return execute('default', planned, DEFAULT_CODEC);
    }

    const generateConfig = async (): Promise<RunResult> => {
        await ensureDirectory();

        const generated = await configManager.generate(directory, config.pattern);
        const inputs = Object.values(generated.document.files).map(entry => path.join(directory, entry.name));
        logger.info('Wrote configuration for %d file(s) to %s', inputs.length, generated.path);

        return { mode: 'generate-config', inputs, configPath: generated.path, removed: [], renamed: [] };
    }

    const useConfig = async (): Promise<RunResult> => {
        await ensureDirectory();

        const loaded = await configManager.load(directory);
        if (loaded.files.length === 0) {
            logger.warn('Configuration %s lists no files, nothing to do.', loaded.path);
            return { mode: 'use-config', inputs: [], configPath: loaded.path, removed: [], renamed: [] };
        }

        const missing: string[] = [];
        for (const info of loaded.files) {
            if (!await storage.exists(info.name)) {
                missing.push(info.name);
            }
        }
        if (missing.length > 0) {
            throw new MissingInputError(missing);
        }
        await ensureDeliverableFree();

        const result = await execute('use-config', loaded.files.map(info => ({ info })), loaded.codec);
        return { ...result, configPath: loaded.path };
    }

    const run = async (mode: RunMode): Promise<RunResult> => {
        switch (mode) {
            case 'generate-config':
                return generateConfig();
            case 'use-config':
                return useConfig();
            case 'default':
                return runDefault();
        }
    }

    return {
        runDefault,
        generateConfig,
        useConfig,
        run,
    };
}
