import * as Storage from '@/util/storage';

// Concat demuxer list syntax: one `file '<path>'` line per input
const FILE_DIRECTIVE = 'file';
const LINE_PATTERN = /^file\s+'(.*)'$/;

// Inside single quotes the only special character is the quote itself
const quote = (filename: string): string => `'${filename.replace(/'/g, `'\\''`)}'`;
const unquote = (quoted: string): string => quoted.replace(/'\\''/g, `'`);

export const formatManifest = (files: readonly string[]): string => {
    return files.map(file => `${FILE_DIRECTIVE} ${quote(file)}\n`).join('');
}

export const parseManifest = (content: string): string[] => {
    const files: string[] = [];
    for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (trimmed === '' || trimmed.startsWith('#')) {
            continue;
        }
        const match = LINE_PATTERN.exec(trimmed);
        if (match) {
            files.push(unquote(match[1]));
        }
    }
    return files;
}

export const writeManifest = async (storage: Storage.Utility, manifestPath: string, files: readonly string[]): Promise<void> => {
    await storage.writeFile(manifestPath, formatManifest(files));
}

export const readManifest = async (storage: Storage.Utility, manifestPath: string): Promise<string[]> => {
    return parseManifest(await storage.readFile(manifestPath));
}
