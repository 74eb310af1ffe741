/**
 * Error taxonomy for clipjoin.
 *
 * Every failure that should end a run with a readable message extends
 * ClipjoinError; anything else reaching the entry point is a bug.
 */

export class ClipjoinError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ClipjoinError';
    }
}

export class ConfigurationError extends ClipjoinError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class TimestampFormatError extends ClipjoinError {
    constructor(readonly value: string) {
        super(`Invalid timestamp "${value}": expected HH:MM:SS, MM:SS or a number of seconds`);
        this.name = 'TimestampFormatError';
    }
}

export class InvalidTrimRangeError extends ClipjoinError {
    constructor(readonly file: string, readonly start: number, readonly end: number) {
        super(`Invalid trim range for ${file}: start (${start}s) must be before end (${end}s)`);
        this.name = 'InvalidTrimRangeError';
    }
}

export class ToolLaunchError extends ClipjoinError {
    constructor(readonly command: string, cause: Error) {
        super(`Could not start ${command}: ${cause.message}`);
        this.name = 'ToolLaunchError';
        this.cause = cause;
    }
}

export class ProbeFailedError extends ClipjoinError {
    constructor(readonly file: string, reason: string) {
        super(`Could not read the duration of ${file}: ${reason}`);
        this.name = 'ProbeFailedError';
    }
}

export class TrimFailedError extends ClipjoinError {
    constructor(readonly file: string, readonly code: number | null) {
        super(`Trimming ${file} failed (ffmpeg exit code ${code ?? 'none'})`);
        this.name = 'TrimFailedError';
    }
}

export class ConcatFailedError extends ClipjoinError {
    constructor(readonly output: string, readonly code: number | null) {
        super(`Concatenating into ${output} failed (ffmpeg exit code ${code ?? 'none'})`);
        this.name = 'ConcatFailedError';
    }
}

export class ConfigNotFoundError extends ClipjoinError {
    constructor(readonly path: string) {
        super(`Configuration file not found: ${path}. Run with --generate-config to create one.`);
        this.name = 'ConfigNotFoundError';
    }
}

export class ConfigMalformedError extends ClipjoinError {
    constructor(readonly path: string, readonly problems: string[]) {
        super(`Configuration file ${path} is malformed:\n  - ${problems.join('\n  - ')}`);
        this.name = 'ConfigMalformedError';
    }
}

export class MissingInputError extends ClipjoinError {
    constructor(readonly files: string[]) {
        super(`Input file(s) not found: ${files.join(', ')}`);
        this.name = 'MissingInputError';
    }
}

export class DeliverableExistsError extends ClipjoinError {
    constructor(readonly path: string) {
        super(`Refusing to overwrite existing output ${path}. Move it away or pass a different --output.`);
        this.name = 'DeliverableExistsError';
    }
}
