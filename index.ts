import { ReadOptions, SpliceOptions, WriteOptions } from './config';
import { noTagOk } from './errors';
import { BufferStorage } from './storage';
import { Tag } from './tag';
import {
    detectFormats,
    detectFormatsInFile,
    FormatVersion,
    readAny,
    readFromPath,
    removeAny,
    removeFromPath,
    writeAny,
    writeToPath,
} from './v1v2';
import { encodeTag } from './tag-codec';
import { logger } from './logger';

/*
 **  Used specifications: http://id3.org/id3v2-00, http://id3.org/id3v2.3.0,
 **  http://id3.org/id3v2.4.0-structure, http://id3.org/ID3v1
 */

/*
 **  Write options; the version defaults to the version of the tag being written
 */
export type TaggerWriteOptions = Partial<WriteOptions> & SpliceOptions;

/*
 **  Text changes keyed by frame ID or alias; null removes the frame
 */
export type TagChanges = Record<string, string | string[] | null>;

export class Id3Tagger {

    /*
    **  Read ID3-Tags from passed buffer/filepath. The ID3v2 tag is preferred,
    **  an ID3v1 trailer is used when there is none.
    **  file     => String || Buffer
    **  options  => ReadOptions
    */
    public read(file: string | Buffer, options: ReadOptions = {}): Tag {
        if (typeof file === 'string') {
            return readFromPath(file, options);
        }
        return readAny(new BufferStorage(file), options);
    }

    /*
    **  Serialize a tag without touching any file
    */
    public create(tag: Tag, options: TaggerWriteOptions = {}): Buffer {
        return encodeTag(tag, this.writeOptionsFor(tag, options));
    }

    /*
    **  Write passed tag to a file/buffer. Any ID3v1 trailer is removed.
    **  A buffer is returned updated, a file is changed in place.
    */
    public write(tag: Tag, file: Buffer, options?: TaggerWriteOptions): Buffer;
    public write(tag: Tag, file: string, options?: TaggerWriteOptions): void;
    public write(tag: Tag, file: string | Buffer, options: TaggerWriteOptions = {}): Buffer | undefined {
        const writeOptions = this.writeOptionsFor(tag, options);
        if (typeof file === 'string') {
            writeToPath(file, tag, writeOptions);
            return undefined;
        }
        const storage = new BufferStorage(file);
        writeAny(storage, tag, writeOptions);
        return storage.toBuffer();
    }

    /*
    **  Update ID3-Tags in passed buffer/filepath, keeping the frames not named
    **  in changes. The existing tag's version is kept unless options name one.
    */
    public update(changes: TagChanges, file: Buffer, options?: TaggerWriteOptions): Buffer;
    public update(changes: TagChanges, file: string, options?: TaggerWriteOptions): void;
    public update(changes: TagChanges, file: string | Buffer, options: TaggerWriteOptions = {}): Buffer | undefined {
        const tag = noTagOk(() => this.read(file)) ?? new Tag(options.version);
        Object.keys(changes).forEach(key => {
            const value = changes[key];
            if (value === null) {
                tag.remove(key);
            } else {
                tag.setText(key, value);
            }
        });
        logger.debug({ changed: Object.keys(changes), version: tag.version }, 'Updating tag');
        if (typeof file === 'string') {
            this.write(tag, file, options);
            return undefined;
        }
        return this.write(tag, file, options);
    }

    /*
    **  Remove ID3v2 and ID3v1 tags, returns what was found
    */
    public removeTags(file: string, options?: SpliceOptions): FormatVersion;
    public removeTags(file: Buffer, options?: SpliceOptions): Buffer;
    public removeTags(file: string | Buffer, options: SpliceOptions = {}): FormatVersion | Buffer {
        if (typeof file === 'string') {
            return removeFromPath(file, options);
        }
        const storage = new BufferStorage(file);
        removeAny(storage, options);
        return storage.toBuffer();
    }

    public formats(file: string | Buffer): FormatVersion {
        if (typeof file === 'string') {
            return detectFormatsInFile(file);
        }
        return detectFormats(new BufferStorage(file));
    }

    private writeOptionsFor(tag: Tag, options: TaggerWriteOptions): WriteOptions & SpliceOptions {
        return { ...options, version: options.version ?? tag.version };
    }
}

export const id3 = new Id3Tagger();

export * from './frame-classes';
export { FrameAliases, resolveFrameId } from './frame-definitions';
export { Id3Error, isId3Error, noTagOk, partialTagOk } from './errors';
export type { ErrorKind } from './errors';
export type { ReadOptions, SpliceOptions, WriteOptions } from './config';
export { Tag } from './tag';
export type { SkippedFrame } from './frame-codec';
export { decodeTag, encodeTag } from './tag-codec';
export { BufferStorage, FileStorage, hasTag, readTag, removeTag, withFileStorage, writeTag } from './storage';
export type { Storage } from './storage';
export { decodeId3v1, encodeId3v1, hasId3v1, id3v1ToTag, readId3v1, removeId3v1, writeId3v1 } from './id3v1';
export type { Id3v1Tag } from './id3v1';
export { genreId, genreName, resolveGenre } from './genres';
export { FormatVersion, readAny, removeAny, writeAny } from './v1v2';
