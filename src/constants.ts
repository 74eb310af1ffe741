export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_TAGS__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'clipjoin';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';

export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;
export const DEFAULT_KEEP_ALL_FILES = false;
export const DEFAULT_RENAME_PROCESSED = false;
export const DEFAULT_DIRECTORY = '.';

// Matches join1__intro.mp4, join10__outro.mp4, ...; group 1 is the ordering index
export const DEFAULT_FILE_PATTERN = '^join(\\d+)__.*\\.mp4$';

export const DEFAULT_OUTPUT_FILENAME = 'output.mp4';
export const DEFAULT_CODEC = 'copy';

export const DEFAULT_FFMPEG_PATH = process.env.FFMPEG_PATH || 'ffmpeg';
export const DEFAULT_FFPROBE_PATH = process.env.FFPROBE_PATH || 'ffprobe';

// ffmpeg's own -loglevel, raised to 'info' with --debug
export const FFMPEG_LOG_LEVEL = 'error';
export const FFMPEG_DEBUG_LOG_LEVEL = 'info';

// Intermediate artifacts, all created inside the working directory
export const JOIN_MANIFEST_FILENAME = 'join.txt';
export const CONCAT_OUTPUT_BASENAME = 'clipjoin_concat';
export const TRIMMED_PREFIX = 'trimmed_';
export const PROCESSED_PREFIX = 'processed_';

export const CONFIG_FILENAME = 'clipjoin.yaml';
export const CONFIG_ENTRY_PREFIX = 'clip';

export const CLIPJOIN_DEFAULTS = {
    directory: DEFAULT_DIRECTORY,
    pattern: DEFAULT_FILE_PATTERN,
    output: DEFAULT_OUTPUT_FILENAME,
    keepAllFiles: DEFAULT_KEEP_ALL_FILES,
    renameProcessed: DEFAULT_RENAME_PROCESSED,
    ffmpegPath: DEFAULT_FFMPEG_PATH,
    ffprobePath: DEFAULT_FFPROBE_PATH,
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
};
