/**
 * Tests for the run orchestrator, against a temp directory and a stand-in ffmpeg
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import type { PipelineConfig } from '../../src/pipeline';
import { parseManifest } from '../../src/media/manifest';
import {
    ConcatFailedError,
    ConfigMalformedError,
    ConfigNotFoundError,
    DeliverableExistsError,
    MissingInputError,
    TrimFailedError,
} from '../../src/errors';
import { createFfmpegMock, createLoggerMock, type RecordedCall } from '../mocks';

const mockFfmpeg = createFfmpegMock();

vi.mock('fluent-ffmpeg', () => ({
    default: mockFfmpeg.ffmpeg,
}));

const Pipeline = await import('../../src/pipeline');

const valueAfter = (args: string[], flag: string): string | undefined => {
    const i = args.indexOf(flag);
    return i === -1 ? undefined : args[i + 1];
};

/**
 * Behaves enough like ffmpeg for the pipeline: a trim writes a marker file,
 * a concat joins the contents of the manifest's entries.
 */
const fakeFfmpeg = async ({ args }: RecordedCall): Promise<number> => {
    const output = args[args.length - 1];
    const input = valueAfter(args, '-i') ?? '';
    if (args.includes('concat')) {
        const entries = parseManifest(await fs.readFile(input, 'utf-8'));
        const parts = await Promise.all(entries.map(entry => fs.readFile(path.resolve(path.dirname(input), entry), 'utf-8')));
        await fs.writeFile(output, parts.join('|'));
    } else {
        const original = await fs.readFile(input, 'utf-8');
        await fs.writeFile(output, `${original}[${valueAfter(args, '-ss') ?? '0'}+${valueAfter(args, '-t') ?? 'all'}]`);
    }
    return 0;
};

describe('Orchestrator', () => {
    let tempDir: string;
    const logger = createLoggerMock();
    const probe = { getDurationSeconds: vi.fn() };
    const calls = mockFfmpeg.calls;

    const baseConfig = (): PipelineConfig => ({
        directory: tempDir,
        pattern: '^join(\\d+)__.*\\.mp4$',
        output: 'output.mp4',
        keepAllFiles: false,
        renameProcessed: false,
        ffmpegPath: 'ffmpeg',
        ffmpegLogLevel: 'error',
    });

    const addFiles = async (...names: string[]) => {
        for (const name of names) {
            await fs.writeFile(path.join(tempDir, name), name.replace(/\.mp4$/, ''));
        }
    };

    const listDir = async () => (await fs.readdir(tempDir)).sort();

    beforeEach(async () => {
        vi.clearAllMocks();
        mockFfmpeg.reset();
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'clipjoin-pipeline-test-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true });
    });

    describe('planDefaultRun', () => {
        it('should apply --from to the first file and --trim-end to the last only', () => {
            expect(Pipeline.planDefaultRun(['a', 'b', 'c'], 10, 5)).toEqual([
                { info: { name: 'a', start: 10 } },
                { info: { name: 'b' } },
                { info: { name: 'c' }, trimEndSeconds: 5 },
            ]);
        });

        it('should apply both to a single file', () => {
            expect(Pipeline.planDefaultRun(['only'], 10, 5)).toEqual([
                { info: { name: 'only', start: 10 }, trimEndSeconds: 5 },
            ]);
        });

        it('should plan no trims without flags', () => {
            expect(Pipeline.planDefaultRun(['a', 'b'])).toEqual([{ info: { name: 'a' } }, { info: { name: 'b' } }]);
        });
    });

    describe('default mode', () => {
        it('should join files in index order and leave only the deliverable', async () => {
            await addFiles('join1__intro.mp4', 'join2__body.mp4', 'join10__outro.mp4');
            mockFfmpeg.respond(fakeFfmpeg);

            const result = await Pipeline.create(baseConfig(), { logger, probe }).runDefault();

            expect(calls).toHaveLength(1);
            expect(await listDir()).toEqual(['output.mp4']);
            expect(await fs.readFile(path.join(tempDir, 'output.mp4'), 'utf-8')).toBe('join1__intro|join2__body|join10__outro');
            expect(result.inputs).toEqual([
                path.join(tempDir, 'join1__intro.mp4'),
                path.join(tempDir, 'join2__body.mp4'),
                path.join(tempDir, 'join10__outro.mp4'),
            ]);
            expect(result.deliverable).toBe(path.join(tempDir, 'output.mp4'));
        });

        it('should trim the start of the first file and the end of the last only', async () => {
            await addFiles('join1__a.mp4', 'join2__b.mp4', 'join3__c.mp4');
            probe.getDurationSeconds.mockResolvedValueOnce(40);
            mockFfmpeg.respond(fakeFfmpeg);

            await Pipeline.create({ ...baseConfig(), from: 10, trimEnd: 5 }, { logger, probe }).runDefault();

            expect(calls).toHaveLength(3);
            expect(valueAfter(calls[0].args, '-i')).toBe(path.join(tempDir, 'join1__a.mp4'));
            expect(valueAfter(calls[0].args, '-ss')).toBe('10');
            expect(valueAfter(calls[0].args, '-t')).toBeUndefined();
            expect(valueAfter(calls[1].args, '-i')).toBe(path.join(tempDir, 'join3__c.mp4'));
            expect(valueAfter(calls[1].args, '-ss')).toBeUndefined();
            expect(valueAfter(calls[1].args, '-t')).toBe('35');
            expect(probe.getDurationSeconds).toHaveBeenCalledWith(path.join(tempDir, 'join3__c.mp4'));

            expect(await fs.readFile(path.join(tempDir, 'output.mp4'), 'utf-8')).toBe('join1__a[10+all]|join2__b|join3__c[0+35]');
            expect(await listDir()).toEqual(['output.mp4']);
        });

        it('should trim both ends of a single file', async () => {
            await addFiles('join1__only.mp4');
            probe.getDurationSeconds.mockResolvedValueOnce(30);
            mockFfmpeg.respond(fakeFfmpeg);

            await Pipeline.create({ ...baseConfig(), from: 10, trimEnd: 5 }, { logger, probe }).runDefault();

            expect(valueAfter(calls[0].args, '-ss')).toBe('10');
            expect(valueAfter(calls[0].args, '-t')).toBe('15');
            expect(await fs.readFile(path.join(tempDir, 'output.mp4'), 'utf-8')).toBe('join1__only[10+15]');
        });

        it('should treat no matching files as a successful no-op', async () => {
            await addFiles('holiday.mp4');
            mockFfmpeg.respond(fakeFfmpeg);

            const result = await Pipeline.create(baseConfig(), { logger, probe }).runDefault();

            expect(result).toEqual({ mode: 'default', inputs: [], removed: [], renamed: [] });
            expect(calls).toHaveLength(0);
            expect(logger.warn).toHaveBeenCalledTimes(1);
            expect(await listDir()).toEqual(['holiday.mp4']);
        });

        it('should refuse to overwrite an existing deliverable before running ffmpeg', async () => {
            await addFiles('join1__a.mp4', 'output.mp4');
            mockFfmpeg.respond(fakeFfmpeg);

            await expect(Pipeline.create(baseConfig(), { logger, probe }).runDefault()).rejects.toThrow(DeliverableExistsError);
            expect(calls).toHaveLength(0);
        });

        it('should keep every file with keepAllFiles', async () => {
            await addFiles('join1__a.mp4', 'join2__b.mp4');
            mockFfmpeg.respond(fakeFfmpeg);

            const result = await Pipeline.create({ ...baseConfig(), keepAllFiles: true, from: 1 }, { logger, probe }).runDefault();

            expect(result.removed).toEqual([]);
            expect(await listDir()).toEqual(['join.txt', 'join1__a.mp4', 'join2__b.mp4', 'output.mp4', 'trimmed_1_join1__a.mp4']);
            expect(parseManifest(await fs.readFile(path.join(tempDir, 'join.txt'), 'utf-8'))).toEqual(['trimmed_1_join1__a.mp4', 'join2__b.mp4']);
        });

        it('should rename inputs instead of deleting them with renameProcessed', async () => {
            await addFiles('join1__a.mp4', 'join2__b.mp4');
            mockFfmpeg.respond(fakeFfmpeg);

            const result = await Pipeline.create({ ...baseConfig(), renameProcessed: true }, { logger, probe }).runDefault();

            expect(await listDir()).toEqual(['output.mp4', 'processed_join1__a.mp4', 'processed_join2__b.mp4']);
            expect(result.renamed).toEqual([
                path.join(tempDir, 'processed_join1__a.mp4'),
                path.join(tempDir, 'processed_join2__b.mp4'),
            ]);
            expect(result.removed).toEqual([path.join(tempDir, 'join.txt')]);
        });

        it('should stop at a failed trim and leave everything in place', async () => {
            await addFiles('join1__a.mp4', 'join2__b.mp4');
            mockFfmpeg.respond(() => 1);

            await expect(Pipeline.create({ ...baseConfig(), from: 3 }, { logger, probe }).runDefault())
                .rejects.toThrow(TrimFailedError);
            expect(calls).toHaveLength(1);
            expect(await listDir()).toEqual(['join1__a.mp4', 'join2__b.mp4']);
        });

        it('should skip cleanup when the concat fails', async () => {
            await addFiles('join1__a.mp4', 'join2__b.mp4');
            mockFfmpeg.respond(async (call) => (call.args.includes('concat') ? 1 : fakeFfmpeg(call)));

            await expect(Pipeline.create({ ...baseConfig(), from: 3 }, { logger, probe }).runDefault())
                .rejects.toThrow(ConcatFailedError);
            expect(await listDir()).toEqual(['join.txt', 'join1__a.mp4', 'join2__b.mp4', 'trimmed_1_join1__a.mp4']);
        });

        it('should fail for a directory that does not exist', async () => {
            mockFfmpeg.respond(fakeFfmpeg);

            await expect(Pipeline.create({ ...baseConfig(), directory: path.join(tempDir, 'missing') }, { logger, probe }).runDefault())
                .rejects.toThrow('Directory does not exist or is not writable');
        });
    });

    describe('generate-config mode', () => {
        it('should write the document and touch nothing else', async () => {
            await addFiles('join2__b.mp4', 'join1__a.mp4');
            mockFfmpeg.respond(fakeFfmpeg);

            const result = await Pipeline.create(baseConfig(), { logger, probe }).run('generate-config');

            expect(result.configPath).toBe(path.join(tempDir, 'clipjoin.yaml'));
            expect(result.inputs).toEqual([path.join(tempDir, 'join1__a.mp4'), path.join(tempDir, 'join2__b.mp4')]);
            expect(calls).toHaveLength(0);
            expect(await listDir()).toEqual(['clipjoin.yaml', 'join1__a.mp4', 'join2__b.mp4']);
        });
    });

    describe('use-config mode', () => {
        const writeConfig = (content: string) => fs.writeFile(path.join(tempDir, 'clipjoin.yaml'), content, 'utf-8');

        it('should trim declared entries and join in document order with the codec', async () => {
            await addFiles('intro.mp4', 'talk.mp4');
            await writeConfig([
                'codec: libx265',
                'files:',
                '  opening:',
                '    name: talk.mp4',
                '    start: "00:01:00"',
                '    end: "00:02:30"',
                '  closing:',
                '    name: intro.mp4',
                '',
            ].join('\n'));
            mockFfmpeg.respond(fakeFfmpeg);

            const result = await Pipeline.create(baseConfig(), { logger, probe }).run('use-config');

            expect(calls).toHaveLength(2);
            expect(valueAfter(calls[0].args, '-ss')).toBe('60');
            expect(valueAfter(calls[0].args, '-t')).toBe('90');
            expect(valueAfter(calls[1].args, '-c:v')).toBe('libx265');
            expect(await fs.readFile(path.join(tempDir, 'output.mp4'), 'utf-8')).toBe('talk[60+90]|intro');
            expect(result.configPath).toBe(path.join(tempDir, 'clipjoin.yaml'));
            expect(await listDir()).toEqual(['clipjoin.yaml', 'output.mp4']);
        });

        it('should allow the same source twice with different ranges', async () => {
            await addFiles('talk.mp4');
            await writeConfig('files:\n  a:\n    name: talk.mp4\n    end: 10\n  b:\n    name: talk.mp4\n    start: 20\n');
            mockFfmpeg.respond(fakeFfmpeg);

            await Pipeline.create(baseConfig(), { logger, probe }).useConfig();

            expect(await fs.readFile(path.join(tempDir, 'output.mp4'), 'utf-8')).toBe('talk[0+10]|talk[20+all]');
            expect(await listDir()).toEqual(['clipjoin.yaml', 'output.mp4']);
        });

        it('should fail with ConfigNotFound without a document', async () => {
            mockFfmpeg.respond(fakeFfmpeg);

            await expect(Pipeline.create(baseConfig(), { logger, probe }).useConfig()).rejects.toThrow(ConfigNotFoundError);
        });

        it('should reject an entry without a name before invoking ffmpeg', async () => {
            await addFiles('a.mp4');
            await writeConfig('files:\n  one:\n    name: a.mp4\n    start: 1\n  two:\n    start: 2\n');
            mockFfmpeg.respond(fakeFfmpeg);

            await expect(Pipeline.create(baseConfig(), { logger, probe }).useConfig()).rejects.toThrow(ConfigMalformedError);
            expect(calls).toHaveLength(0);
        });

        it('should report every missing file before invoking ffmpeg', async () => {
            await addFiles('a.mp4');
            await writeConfig('files:\n  one:\n    name: a.mp4\n    start: 1\n  two:\n    name: gone.mp4\n  three:\n    name: lost.mp4\n');
            mockFfmpeg.respond(fakeFfmpeg);

            const error = await Pipeline.create(baseConfig(), { logger, probe }).useConfig().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(MissingInputError);
            expect(error).toMatchObject({ files: [path.join(tempDir, 'gone.mp4'), path.join(tempDir, 'lost.mp4')] });
            expect(calls).toHaveLength(0);
        });

        it('should do nothing for a document without files', async () => {
            await writeConfig('files: {}\n');
            mockFfmpeg.respond(fakeFfmpeg);

            const result = await Pipeline.create(baseConfig(), { logger, probe }).useConfig();

            expect(result.inputs).toEqual([]);
            expect(calls).toHaveLength(0);
        });
    });
});
