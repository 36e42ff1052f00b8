import * as fs from 'fs';
import { DEFAULT_CHUNK_SIZE, ReadOptions, SpliceOptions, WriteOptions } from './config';
import { Id3Error, toIoError } from './errors';
import { decodeTag, encodeTag, getTagRegionLength, hasTagMagic, parseTagHeader, TAG_HEADER_SIZE, TagHeader } from './tag-codec';
import { Tag } from './tag';
import { logger } from './logger';

/*
**  Seekable byte store the splicer works against. Positions are absolute, so
**  no separate seek is needed.
*/
export interface Storage {
    /** Fills as much of buffer as the store holds from position on, returns the byte count */
    read(buffer: Buffer, position: number): number;
    write(buffer: Buffer, position: number): void;
    size(): number;
    /** Shortens the store, or extends it with zero bytes */
    truncate(length: number): void;
}

export class FileStorage implements Storage {
    constructor(private readonly fd: number) {}

    public read(buffer: Buffer, position: number): number {
        let total = 0;
        try {
            while (total < buffer.length) {
                const count = fs.readSync(this.fd, buffer, total, buffer.length - total, position + total);
                if (count === 0) {
                    break;
                }
                total += count;
            }
        } catch (err) {
            throw toIoError(err, `Reading ${buffer.length} bytes at ${position} failed`);
        }
        return total;
    }

    public write(buffer: Buffer, position: number): void {
        let total = 0;
        try {
            while (total < buffer.length) {
                total += fs.writeSync(this.fd, buffer, total, buffer.length - total, position + total);
            }
        } catch (err) {
            throw toIoError(err, `Writing ${buffer.length} bytes at ${position} failed`);
        }
    }

    public size(): number {
        try {
            return fs.fstatSync(this.fd).size;
        } catch (err) {
            throw toIoError(err, 'Reading the file size failed');
        }
    }

    public truncate(length: number): void {
        try {
            fs.ftruncateSync(this.fd, length);
        } catch (err) {
            throw toIoError(err, `Resizing the file to ${length} bytes failed`);
        }
    }
}

/*
**  Growable in-memory store, used for Buffer input
*/
export class BufferStorage implements Storage {
    private data: Buffer;
    private length: number;

    constructor(initial: Buffer = Buffer.alloc(0)) {
        this.data = Buffer.from(initial);
        this.length = initial.length;
    }

    public read(buffer: Buffer, position: number): number {
        if (position >= this.length) {
            return 0;
        }
        return this.data.copy(buffer, 0, position, Math.min(this.length, position + buffer.length));
    }

    public write(buffer: Buffer, position: number): void {
        const end = position + buffer.length;
        this.ensureCapacity(end);
        if (position > this.length) {
            this.data.fill(0, this.length, position);
        }
        buffer.copy(this.data, position);
        this.length = Math.max(this.length, end);
    }

    public size(): number {
        return this.length;
    }

    public truncate(length: number): void {
        this.ensureCapacity(length);
        if (length > this.length) {
            this.data.fill(0, this.length, length);
        }
        this.length = length;
    }

    public toBuffer(): Buffer {
        return Buffer.from(this.data.subarray(0, this.length));
    }

    private ensureCapacity(capacity: number): void {
        if (capacity <= this.data.length) {
            return;
        }
        const grown = Buffer.alloc(Math.max(capacity, this.data.length * 2));
        this.data.copy(grown, 0, 0, this.length);
        this.data = grown;
    }
}

/*
**  Opens a file for the duration of one call; the descriptor is always closed
*/
export function withFileStorage<T>(path: string, writable: boolean, action: (storage: FileStorage) => T): T {
    let fd: number;
    try {
        fd = fs.openSync(path, writable ? 'r+' : 'r');
    } catch (err) {
        throw toIoError(err, `Opening ${path} failed`);
    }
    try {
        return action(new FileStorage(fd));
    } finally {
        fs.closeSync(fd);
    }
}

export function readAt(storage: Storage, position: number, length: number): Buffer {
    const buffer = Buffer.alloc(length);
    const count = storage.read(buffer, position);
    return count === length ? buffer : buffer.subarray(0, count);
}

export interface TagLocation {
    header: TagHeader;
    /** Offset of the first byte after the declared tag, footer included */
    declaredEnd: number;
    /**
     * declaredEnd plus the zero bytes that follow it, left behind when a tag shrank.
     * Audio data that itself starts with zero bytes loses them when the tag grows or is removed.
     */
    end: number;
}

function countZeros(storage: Storage, start: number, chunkSize: number): number {
    const chunk = Buffer.alloc(chunkSize);
    let count = 0;
    for (;;) {
        const read = storage.read(chunk, start + count);
        const nonZero = chunk.subarray(0, read).findIndex(byte => byte !== 0x00);
        if (nonZero !== -1) {
            return count + nonZero;
        }
        count += read;
        if (read < chunk.length) {
            return count;
        }
    }
}

/*
**  Locates the ID3v2 region at the start of the store. Returns undefined when
**  there is no tag, throws when there is one this codec cannot handle.
*/
export function locateTag(storage: Storage, chunkSize = DEFAULT_CHUNK_SIZE): TagLocation | undefined {
    const header = readAt(storage, 0, TAG_HEADER_SIZE);
    if (header.length < TAG_HEADER_SIZE || !hasTagMagic(header)) {
        return undefined;
    }
    const parsed = parseTagHeader(header);
    const declaredEnd = getTagRegionLength(parsed);
    const location = { header: parsed, declaredEnd, end: declaredEnd + countZeros(storage, declaredEnd, chunkSize) };
    logger.debug({ version: parsed.version, declaredEnd, end: location.end }, 'Located ID3v2 tag');
    return location;
}

export function hasTag(storage: Storage): boolean {
    return hasTagMagic(readAt(storage, 0, 3));
}

export function readTag(storage: Storage, options: ReadOptions = {}): Tag {
    const location = locateTag(storage);
    if (!location) {
        throw new Id3Error('NoTag', 'No ID3v2 tag found');
    }
    const region = readAt(storage, 0, location.declaredEnd);
    if (region.length < location.declaredEnd) {
        throw new Id3Error('Parsing', `Tag region ends at ${location.declaredEnd} but the data ends at ${region.length}`);
    }
    return decodeTag(region, options);
}

/*
**  Moves [start, end) by distance bytes towards the end of the store. Blocks
**  are copied back to front so no source byte is overwritten before it is read.
*/
function shiftForward(storage: Storage, start: number, end: number, distance: number, chunkSize: number): void {
    const chunk = Buffer.alloc(Math.min(chunkSize, Math.max(end - start, 0)));
    for (let blockEnd = end; blockEnd > start; ) {
        const blockStart = Math.max(start, blockEnd - chunk.length);
        const block = chunk.subarray(0, blockEnd - blockStart);
        if (storage.read(block, blockStart) !== block.length) {
            throw new Id3Error('Io', `Short read at ${blockStart} while moving audio data`);
        }
        storage.write(block, blockStart + distance);
        blockEnd = blockStart;
    }
}

/*
**  Moves [start, end) by distance bytes towards the start, front to back
*/
function shiftBackward(storage: Storage, start: number, end: number, distance: number, chunkSize: number): void {
    const chunk = Buffer.alloc(Math.min(chunkSize, Math.max(end - start, 0)));
    for (let blockStart = start; blockStart < end; ) {
        const blockEnd = Math.min(end, blockStart + chunk.length);
        const block = chunk.subarray(0, blockEnd - blockStart);
        if (storage.read(block, blockStart) !== block.length) {
            throw new Id3Error('Io', `Short read at ${blockStart} while moving audio data`);
        }
        storage.write(block, blockStart - distance);
        blockStart = blockEnd;
    }
}

function writeZeros(storage: Storage, start: number, end: number, chunkSize: number): void {
    const zeros = Buffer.alloc(Math.min(chunkSize, Math.max(end - start, 0)));
    for (let position = start; position < end; position += zeros.length) {
        storage.write(zeros.subarray(0, Math.min(zeros.length, end - position)), position);
    }
}

function chunkSizeOf(options: SpliceOptions): number {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new Id3Error('InvalidInput', `Invalid chunk size ${chunkSize}`);
    }
    return chunkSize;
}

/**
 * Replaces the ID3v2 region with a freshly encoded tag.
 *
 * A smaller tag is written in place and the rest of the old region is zeroed.
 * A larger one first extends the store, moves the audio data, writes the frames
 * and writes the header last, so an interrupted shift still leaves the old
 * header in place.
 */
export function writeTag(storage: Storage, tag: Tag, options: WriteOptions & SpliceOptions): void {
    const chunkSize = chunkSizeOf(options);
    const encoded = encodeTag(tag, options);
    const location = locateTag(storage, chunkSize);
    const oldTagEnd = location ? location.end : 0;

    if (encoded.length <= oldTagEnd) {
        logger.debug({ newLength: encoded.length, oldTagEnd }, 'Writing tag in place');
        storage.write(encoded, 0);
        writeZeros(storage, encoded.length, oldTagEnd, chunkSize);
        return;
    }

    const fileEnd = storage.size();
    const distance = encoded.length - oldTagEnd;
    logger.debug({ newLength: encoded.length, oldTagEnd, distance, moved: fileEnd - oldTagEnd }, 'Growing tag region');
    storage.truncate(fileEnd + distance);
    shiftForward(storage, oldTagEnd, fileEnd, distance, chunkSize);
    storage.write(encoded.subarray(TAG_HEADER_SIZE), TAG_HEADER_SIZE);
    storage.write(encoded.subarray(0, TAG_HEADER_SIZE), 0);
}

/**
 * Cuts the ID3v2 region out of the store.
 *
 * @returns whether a tag was present
 */
export function removeTag(storage: Storage, options: SpliceOptions = {}): boolean {
    const chunkSize = chunkSizeOf(options);
    const location = locateTag(storage, chunkSize);
    if (!location) {
        return false;
    }
    const fileEnd = storage.size();
    const tagEnd = Math.min(location.end, fileEnd);
    logger.debug({ tagEnd, moved: fileEnd - tagEnd }, 'Removing tag region');
    shiftBackward(storage, tagEnd, fileEnd, tagEnd, chunkSize);
    storage.truncate(fileEnd - tagEnd);
    return true;
}
