import * as Storage from '@/util/storage';
import type { Logger } from '@/logging';

export interface Collector {
    collect: (directory: string, pattern: string | RegExp) => Promise<string[]>;
}

/**
 * The number a filename is ordered by: the pattern's first capture group when
 * it has one, otherwise the first run of digits in the name.
 */
export const extractIndex = (filename: string, regex: RegExp): number | undefined => {
    const match = regex.exec(filename);
    const source = match?.[1] ?? /\d+/.exec(filename)?.[0];
    if (source === undefined) {
        return undefined;
    }
    const index = parseInt(source, 10);
    return Number.isNaN(index) ? undefined : index;
}

const compareNames = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

// join9 before join10; names without an index go last
export const sortByIndex = (filenames: readonly string[], regex: RegExp): string[] => {
    return filenames
        .map(name => ({ name, index: extractIndex(name, regex) }))
        .sort((a, b) => {
            if (a.index !== b.index) {
                if (a.index === undefined) return 1;
                if (b.index === undefined) return -1;
                return a.index - b.index;
            }
            return compareNames(a.name, b.name);
        })
        .map(entry => entry.name);
}

export const create = (params: { storage: Storage.Utility; logger: Logger }): Collector => {
    const { storage, logger } = params;

    const collect = async (directory: string, pattern: string | RegExp): Promise<string[]> => {
        // A global flag would make exec() stateful between names
        const regex = typeof pattern === 'string' ? new RegExp(pattern) : new RegExp(pattern.source, pattern.flags.replace('g', ''));

        const files = await storage.listFiles(directory);
        logger.debug('Found files in directory %s: %j', directory, files);

        const matched = files.filter(file => regex.test(file));
        const ordered = sortByIndex(matched, regex);
        logger.debug('Found files to join: %j', ordered);

        return ordered;
    }

    return {
        collect,
    };
}
