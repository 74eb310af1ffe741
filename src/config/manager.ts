/**
 * Config Manager
 *
 * Persists what a run should do with each file (trim points, codec) to a YAML
 * document next to the videos, so it can be edited by hand and replayed with
 * --use-config.
 */

import path from 'node:path';
import * as yaml from 'js-yaml';
import type { Logger } from '@/logging';
import * as Storage from '@/util/storage';
import type { Collector } from '@/media/collector';
import { type FileInfo, createFileInfo, parseTimestamp } from '@/media/file-info';
import { CONFIG_ENTRY_PREFIX, CONFIG_FILENAME, DEFAULT_CODEC } from '@/constants';
import { ConfigDocumentSchema, type ConfigDocument, type FileEntry } from '@/config/schema';
import { ClipjoinError, ConfigMalformedError, ConfigNotFoundError } from '@/errors';

export interface LoadedConfig {
    path: string;
    codec: string;
    files: FileInfo[];
}

export interface GeneratedConfig {
    path: string;
    document: ConfigDocument;
}

export interface Manager {
    getConfigPath: (directory: string) => string;
    generate: (directory: string, pattern: string) => Promise<GeneratedConfig>;
    load: (directory: string) => Promise<LoadedConfig>;
}

export const buildDocument = (files: readonly string[], codec: string = DEFAULT_CODEC): ConfigDocument => {
    const entries: Record<string, FileEntry> = {};
    files.forEach((name, i) => {
        entries[`${CONFIG_ENTRY_PREFIX}${i + 1}`] = { name };
    });
    return { codec, files: entries };
}

const toSeconds = (value: string | number | null | undefined): number | undefined => {
    if (value === null || value === undefined) {
        return undefined;
    }
    return parseTimestamp(value);
}

// Parsed mappings list array-index keys first, in ascending order, whatever
// their position in the document
const isIndexKey = (key: string): boolean => /^(?:0|[1-9]\d*)$/.test(key) && Number(key) <= 4294967294;

// Relative names in the document are relative to the directory it lives in
const toFileInfo = (directory: string, entry: FileEntry): FileInfo => {
    return createFileInfo(
        path.resolve(directory, entry.name),
        toSeconds(entry.start),
        toSeconds(entry.end),
    );
}

export const create = (deps: { logger: Logger; storage: Storage.Utility; collector: Collector }): Manager => {
    const { logger, storage, collector } = deps;

    const getConfigPath = (directory: string): string => path.join(directory, CONFIG_FILENAME);

    const generate = async (directory: string, pattern: string): Promise<GeneratedConfig> => {
        const configPath = getConfigPath(directory);
        const files = await collector.collect(directory, pattern);
        if (files.length === 0) {
            logger.warn('No files matching %s in %s; writing a configuration with no files', pattern, directory);
        }

        const document = buildDocument(files);
        const content = yaml.dump(document, {
            indent: 2,
            lineWidth: 120,
            quotingType: '"',
            forceQuotes: false,
        });

        if (await storage.exists(configPath)) {
            logger.info('Overwriting existing configuration %s', configPath);
        }
        await storage.writeFile(configPath, content);
        logger.debug('Wrote configuration with %d file(s) to %s', files.length, configPath);

        return { path: configPath, document };
    }

    const load = async (directory: string): Promise<LoadedConfig> => {
        const configPath = getConfigPath(directory);
        if (!await storage.exists(configPath)) {
            throw new ConfigNotFoundError(configPath);
        }

        let raw: unknown;
        try {
            raw = yaml.load(await storage.readFile(configPath));
        } catch (error: unknown) {
            if (error instanceof yaml.YAMLException) {
                throw new ConfigMalformedError(configPath, [error.message]);
            }
            throw error;
        }

        const parsed = ConfigDocumentSchema.safeParse(raw);
        if (!parsed.success) {
            const problems = parsed.error.issues.map(issue => {
                const where = issue.path.length > 0 ? issue.path.join('.') : 'document';
                return `${where}: ${issue.message}`;
            });
            throw new ConfigMalformedError(configPath, problems);
        }

        const problems = Object.keys(parsed.data.files)
            .filter(isIndexKey)
            .map(key => `files.${key}: a bare number as key loses its place in the file order; use a name such as ${CONFIG_ENTRY_PREFIX}${key}`);
        const files: FileInfo[] = [];
        for (const [key, entry] of Object.entries(parsed.data.files)) {
            try {
                files.push(toFileInfo(directory, entry));
            } catch (error: unknown) {
                if (!(error instanceof ClipjoinError)) {
                    throw error;
                }
                problems.push(`files.${key}: ${error.message}`);
            }
        }
        if (problems.length > 0) {
            throw new ConfigMalformedError(configPath, problems);
        }

        const codec = parsed.data.codec ?? DEFAULT_CODEC;
        logger.debug('Loaded configuration %s with %d file(s), codec %s', configPath, files.length, codec);
        return { path: configPath, codec, files };
    }

    return {
        getConfigPath,
        generate,
        load,
    };
}
