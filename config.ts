import { Encoding, TagVersion } from './frame-classes';

export const DEFAULT_PADDING_SIZE = 0;          // Padding written inside the tag unless the caller asks for more
export const DEFAULT_CHUNK_SIZE = 64 * 1024;    // Block size used when shifting audio data inside a file
export const DEFAULT_LOG_LEVEL = 'warn';

/*
 **  Encoding used for frames that carry no recorded encoding of their own
 */
export function defaultEncodingFor(version: TagVersion): Encoding {
    return version === TagVersion.v24 ? Encoding.UTF8 : Encoding.UTF16;
}

export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): string {
    return env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
}

export interface ReadOptions {
    /** Return the frames that decoded cleanly instead of throwing when some were skipped */
    partialTagOk?: boolean;
}

export interface WriteOptions {
    version: TagVersion;
    /** Overrides the encoding recorded on each frame */
    encoding?: Encoding;
    /** Zero bytes reserved after the last frame, counted in the header size */
    padding?: number;
    unsynchronisation?: boolean;
    /** Deflate every frame body (not available for ID3v2.2) */
    compression?: boolean;
    /** ID3v2.4 only */
    footer?: boolean;
}

export interface SpliceOptions {
    chunkSize?: number;
}
