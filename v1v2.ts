import { ReadOptions, SpliceOptions, WriteOptions } from './config';
import { Id3Error, isId3Error } from './errors';
import { hasId3v1, id3v1ToTag, readId3v1, removeId3v1 } from './id3v1';
import { hasTag, readTag, removeTag, Storage, withFileStorage, writeTag } from './storage';
import { Tag } from './tag';

/*
 **  Presence of both tag format versions in one file
 */
export enum FormatVersion {
    None = 'none',
    Id3v1 = 'ID3v1',
    Id3v2 = 'ID3v2',
    Both = 'both',
}

function formatVersionOf(v1: boolean, v2: boolean): FormatVersion {
    if (v1 && v2) {
        return FormatVersion.Both;
    }
    if (v2) {
        return FormatVersion.Id3v2;
    }
    return v1 ? FormatVersion.Id3v1 : FormatVersion.None;
}

export function detectFormats(storage: Storage): FormatVersion {
    return formatVersionOf(hasId3v1(storage), hasTag(storage));
}

/*
**  Reads the ID3v2 tag, falling back to the ID3v1 trailer
*/
export function readAny(storage: Storage, options: ReadOptions = {}): Tag {
    try {
        return readTag(storage, options);
    } catch (err) {
        if (!isId3Error(err, 'NoTag')) {
            throw err;
        }
    }
    try {
        return id3v1ToTag(readId3v1(storage));
    } catch (err) {
        if (!isId3Error(err, 'NoTag')) {
            throw err;
        }
    }
    throw new Id3Error('NoTag', 'Neither an ID3v2 nor an ID3v1 tag was found');
}

/*
**  An ID3v1 trailer cannot represent an ID3v2 tag, so it is removed
*/
export function writeAny(storage: Storage, tag: Tag, options: WriteOptions & SpliceOptions): void {
    writeTag(storage, tag, options);
    removeId3v1(storage);
}

/*
**  Removes both versions, returns what was present before
*/
export function removeAny(storage: Storage, options: SpliceOptions = {}): FormatVersion {
    const v1 = removeId3v1(storage);
    const v2 = removeTag(storage, options);
    return formatVersionOf(v1, v2);
}

export function detectFormatsInFile(path: string): FormatVersion {
    return withFileStorage(path, false, detectFormats);
}

export function readFromPath(path: string, options: ReadOptions = {}): Tag {
    return withFileStorage(path, false, storage => readAny(storage, options));
}

export function writeToPath(path: string, tag: Tag, options: WriteOptions & SpliceOptions): void {
    withFileStorage(path, true, storage => writeAny(storage, tag, options));
}

export function removeFromPath(path: string, options: SpliceOptions = {}): FormatVersion {
    return withFileStorage(path, true, storage => removeAny(storage, options));
}
