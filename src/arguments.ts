import path from "node:path";
import { Command, Option } from "commander";
import { z } from "zod";
import {
    CLIPJOIN_DEFAULTS,
    PROGRAM_NAME,
    VERSION
} from "@/constants";
import { getLogger, setLogLevel } from "@/logging";
import { parseTimestamp } from "@/media/file-info";
import type { RunMode } from "@/pipeline";
import { ConfigurationError } from "@/errors";

export interface Args {
    from?: string;
    trimEnd?: string;
    keepAllFiles?: boolean;
    renameProcessed?: boolean;
    generateConfig?: boolean;
    useConfig?: boolean;
    directory?: string;
    pattern?: string;
    output?: string;
    ffmpeg?: string;
    ffprobe?: string;
    verbose?: boolean;
    debug?: boolean;
}

const isValidPattern = (pattern: string): boolean => {
    try {
        new RegExp(pattern);
        return true;
    } catch {
        return false;
    }
}

export const ConfigSchema = z.object({
    mode: z.enum(['default', 'generate-config', 'use-config']),
    directory: z.string().min(1),
    pattern: z.string().min(1).refine(isValidPattern, { message: 'not a valid regular expression' }),
    output: z.string().min(1).refine(output => path.extname(output) !== '', { message: 'needs a file extension, e.g. output.mp4' }),
    from: z.number().nonnegative().optional(),
    trimEnd: z.number().positive().optional(),
    keepAllFiles: z.boolean(),
    renameProcessed: z.boolean(),
    ffmpegPath: z.string().min(1),
    ffprobePath: z.string().min(1),
    verbose: z.boolean(),
    debug: z.boolean(),
});

export type Config = z.infer<typeof ConfigSchema>;

export const createProgram = (): Command => {
    return new Command()
        .name(PROGRAM_NAME)
        .summary('Trim and concatenate numbered video clips with ffmpeg')
        .description('clipjoin collects files named like join1__intro.mp4, join2__body.mp4, ... from a directory, optionally trims the start of the first and the end of the last, and joins them into one file without re-encoding')
        .option('--from <timestamp>', 'start the output at this timestamp of the first file (HH:MM:SS or seconds)')
        .option('--trim-end <seconds>', 'number of seconds to cut off the end of the last file')
        .option('--keep-all-files', 'keep inputs and intermediate files; useful for debugging')
        .option('--rename-processed', 'rename inputs to processed_<name> instead of deleting them')
        .addOption(new Option('--generate-config', 'write a clipjoin.yaml describing the matched files, then exit')
            .conflicts(['useConfig', 'from', 'trimEnd']))
        .addOption(new Option('--use-config', 'process the files listed in clipjoin.yaml')
            .conflicts(['from', 'trimEnd']))
        .option('-d, --directory <directory>', 'directory holding the clips', CLIPJOIN_DEFAULTS.directory)
        .option('--pattern <pattern>', 'regular expression selecting the clips; group 1 orders them', CLIPJOIN_DEFAULTS.pattern)
        .option('-o, --output <output>', 'name of the joined file', CLIPJOIN_DEFAULTS.output)
        .option('--ffmpeg <path>', 'ffmpeg binary (default: $FFMPEG_PATH or ffmpeg)')
        .option('--ffprobe <path>', 'ffprobe binary (default: $FFPROBE_PATH or ffprobe)')
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging')
        .version(VERSION);
}

const toSeconds = (value: string | undefined, option: string): number | undefined => {
    if (value === undefined) {
        return undefined;
    }
    try {
        return parseTimestamp(value);
    } catch (error: unknown) {
        throw new ConfigurationError(`${option}: ${error instanceof Error ? error.message : String(error)}`);
    }
}

const selectMode = (args: Args): RunMode => {
    if (args.generateConfig) return 'generate-config';
    if (args.useConfig) return 'use-config';
    return 'default';
}

export const configure = async (argv: readonly string[] = process.argv, program: Command = createProgram()): Promise<Config> => {
    program.parse([...argv]);

    const cliArgs: Args = program.opts<Args>();

    // Set before the first log line below
    if (cliArgs.debug === true) {
        setLogLevel('debug');
    } else if (cliArgs.verbose === true) {
        setLogLevel('verbose');
    }
    const logger = getLogger();
    logger.debug('Command Line Options: %s', JSON.stringify(cliArgs, null, 2));

    // Merge configurations: Defaults -> CLI (highest precedence)
    const mergedConfig = {
        ...CLIPJOIN_DEFAULTS,
        mode: selectMode(cliArgs),
        ...(cliArgs.directory !== undefined && { directory: cliArgs.directory }),
        ...(cliArgs.pattern !== undefined && { pattern: cliArgs.pattern }),
        ...(cliArgs.output !== undefined && { output: cliArgs.output }),
        ...(cliArgs.ffmpeg !== undefined && { ffmpegPath: cliArgs.ffmpeg }),
        ...(cliArgs.ffprobe !== undefined && { ffprobePath: cliArgs.ffprobe }),
        ...(cliArgs.keepAllFiles !== undefined && { keepAllFiles: cliArgs.keepAllFiles }),
        ...(cliArgs.renameProcessed !== undefined && { renameProcessed: cliArgs.renameProcessed }),
        ...(cliArgs.verbose !== undefined && { verbose: cliArgs.verbose }),
        ...(cliArgs.debug !== undefined && { debug: cliArgs.debug }),
        from: toSeconds(cliArgs.from, '--from'),
        trimEnd: toSeconds(cliArgs.trimEnd, '--trim-end'),
    };

    const config = validateConfig(mergedConfig);
    logger.debug('Final configuration: %s', JSON.stringify(config, null, 2));
    return config;
}

export const validateConfig = (candidate: unknown): Config => {
    const result = ConfigSchema.safeParse(candidate);
    if (!result.success) {
        const problems = result.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
        throw new ConfigurationError(`Invalid options:\n  - ${problems.join('\n  - ')}`);
    }
    return result.data;
}
