import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'node:path';
import { glob } from 'glob';
import { DEFAULT_CHARACTER_ENCODING } from '@/constants';

export interface Utility {
    exists: (path: string) => Promise<boolean>;
    isDirectory: (path: string) => Promise<boolean>;
    isDirectoryWritable: (path: string) => Promise<boolean>;
    listFiles: (directory: string) => Promise<string[]>;
    readFile: (path: string) => Promise<string>;
    writeFile: (path: string, data: string) => Promise<void>;
    copyFile: (source: string, destination: string) => Promise<void>;
    rename: (source: string, destination: string) => Promise<void>;
    deleteFile: (path: string) => Promise<void>;
}

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    // eslint-disable-next-line no-console
    const log = params.log || console.log;

    const exists = async (path: string): Promise<boolean> => {
        try {
            await fs.stat(path);
            return true;
        } catch {
            return false;
        }
    }

    const isDirectory = async (path: string): Promise<boolean> => {
        const stats = await fs.stat(path);
        if (!stats.isDirectory()) {
            log(`${path} is not a directory`);
            return false;
        }
        return true;
    }

    const isWritable = async (path: string): Promise<boolean> => {
        try {
            await fs.access(path, fsConstants.W_OK);
        } catch (error: unknown) {
            log(`${path} is not writable: %s`, error);
            return false;
        }
        return true;
    }

    const isDirectoryWritable = async (path: string): Promise<boolean> => {
        return await exists(path) && await isDirectory(path) && await isWritable(path);
    }

    // Plain names of the regular files directly inside a directory
    const listFiles = async (directory: string): Promise<string[]> => {
        const files = await glob('*', { cwd: directory, nodir: true, dot: false });
        return files.map(file => path.basename(file));
    }

    const readFile = async (path: string): Promise<string> => {
        return await fs.readFile(path, { encoding: DEFAULT_CHARACTER_ENCODING });
    }

    const writeFile = async (path: string, data: string): Promise<void> => {
        await fs.writeFile(path, data, { encoding: DEFAULT_CHARACTER_ENCODING });
    }

    const copyFile = async (source: string, destination: string): Promise<void> => {
        await fs.copyFile(source, destination);
    }

    const rename = async (source: string, destination: string): Promise<void> => {
        await fs.rename(source, destination);
    }

    const deleteFile = async (path: string): Promise<void> => {
        try {
            await fs.unlink(path);
        } catch (error: unknown) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                log(`${path} was already removed`);
                return;
            }
            throw error;
        }
    }

    return {
        exists,
        isDirectory,
        isDirectoryWritable,
        listFiles,
        readFile,
        writeFile,
        copyFile,
        rename,
        deleteFile,
    };
}
