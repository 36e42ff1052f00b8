import type { Tag } from './tag';

export type ErrorKind =
    | 'NoTag'
    | 'UnsupportedVersion'
    | 'Parsing'
    | 'UnsupportedFeature'
    | 'StringDecoding'
    | 'InvalidInput'
    | 'Io';

export class Id3Error extends Error {
    public readonly kind: ErrorKind;

    /*
    **  Set when frames were skipped while walking an otherwise readable tag
    */
    public partialTag?: Tag;

    constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'Id3Error';
        this.kind = kind;
    }
}

export function isId3Error(err: unknown, kind?: ErrorKind): err is Id3Error {
    return err instanceof Id3Error && (kind === undefined || err.kind === kind);
}

/*
**  Errors raised by fs calls surface as Io, anything already classified passes through
*/
export function toIoError(err: unknown, action: string): Id3Error {
    if (err instanceof Id3Error) {
        return err;
    }
    const reason = err instanceof Error ? err.message : String(err);
    return new Id3Error('Io', `${action}: ${reason}`, { cause: err });
}

/**
 * Runs a read and treats the absence of a tag as a valid outcome.
 */
export function noTagOk<T>(read: () => T): T | undefined {
    try {
        return read();
    } catch (err) {
        if (isId3Error(err, 'NoTag')) {
            return undefined;
        }
        throw err;
    }
}

/**
 * Runs a read and accepts a tag from which some frames had to be skipped.
 */
export function partialTagOk(read: () => Tag): Tag {
    try {
        return read();
    } catch (err) {
        if (err instanceof Id3Error && err.partialTag) {
            return err.partialTag;
        }
        throw err;
    }
}
