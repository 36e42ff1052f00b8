import { createFrame, Frame, majorVersionOf, TagVersion, Timestamp, versionFromMajor } from './frame-classes';
import { LegacyDateFrames } from './frame-definitions';
import { DEFAULT_PADDING_SIZE, ReadOptions, WriteOptions } from './config';
import { Id3Error } from './errors';
import { decodeFrameSequence, encodeFrame } from './frame-codec';
import { decodeSize, writeSize } from './syncsafe';
import { applyUnsynchronisation, removeUnsynchronisation } from './unsynchronisation';
import { Tag } from './tag';
import { fromLegacyDateValues, toLegacyDateValues } from './timestamp';

/*
 **  Used specifications: http://id3.org/id3v2-00, http://id3.org/id3v2.3.0,
 **  http://id3.org/id3v2.4.0-structure
 */

export const TAG_HEADER_SIZE = 10;
export const TAG_FOOTER_SIZE = 10;

export interface TagHeaderFlags {
    unsynchronisation: boolean;
    extendedHeader: boolean;
    experimental: boolean;
    footer: boolean;
    /** ID3v2.2 only, no compression scheme was ever defined */
    compression: boolean;
}

export interface TagHeader {
    version: TagVersion;
    revision: number;
    flags: TagHeaderFlags;
    /** Size after the header: extended header, frames and padding, without the footer */
    size: number;
}

export function hasTagMagic(buffer: Buffer): boolean {
    return buffer.length >= 3 && buffer.toString('latin1', 0, 3) === 'ID3';
}

export function parseTagHeader(buffer: Buffer): TagHeader {
    if (buffer.length < TAG_HEADER_SIZE || !hasTagMagic(buffer)) {
        throw new Id3Error('NoTag', 'No ID3v2 tag found');
    }
    const major = buffer[3];
    const revision = buffer[4];
    const version = versionFromMajor(major);
    if (version === undefined || revision === 0xFF) {
        throw new Id3Error('UnsupportedVersion', `Unsupported ID3v2 version 2.${major}.${revision}`);
    }
    const flagsByte = buffer[5];
    return {
        version,
        revision,
        flags: {
            unsynchronisation: !!(flagsByte & 0x80),
            extendedHeader: version !== TagVersion.v22 && !!(flagsByte & 0x40),
            experimental: version !== TagVersion.v22 && !!(flagsByte & 0x20),
            footer: version === TagVersion.v24 && !!(flagsByte & 0x10),
            compression: version === TagVersion.v22 && !!(flagsByte & 0x40),
        },
        size: decodeSize(buffer, 6),
    };
}

/*
**  Bytes from the start of the header to the end of the footer
*/
export function getTagRegionLength(header: TagHeader): number {
    return TAG_HEADER_SIZE + header.size + (header.flags.footer ? TAG_FOOTER_SIZE : 0);
}

function readExtendedHeader(body: Buffer, version: TagVersion): Buffer {
    if (body.length < 4) {
        throw new Id3Error('Parsing', 'Extended header is truncated');
    }
    // v2.3 counts the bytes after the size field, v2.4 counts the whole header
    const size = version === TagVersion.v23 ? body.readUInt32BE(0) + 4 : decodeSize(body, 0);
    if (size < 4 || size > body.length) {
        throw new Id3Error('Parsing', `Invalid extended header size ${size}`);
    }
    return Buffer.from(body.subarray(0, size));
}

/*
**  Parses a complete tag region starting with its header
*/
export function decodeTag(buffer: Buffer, options: ReadOptions = {}): Tag {
    const header = parseTagHeader(buffer);
    const { version, flags } = header;
    if (buffer.length < TAG_HEADER_SIZE + header.size) {
        throw new Id3Error('Parsing', `Tag declares ${header.size} bytes but only ${buffer.length - TAG_HEADER_SIZE} are present`);
    }
    if (flags.compression) {
        throw new Id3Error('UnsupportedFeature', 'ID3v2.2 compression is not supported');
    }

    let body = buffer.subarray(TAG_HEADER_SIZE, TAG_HEADER_SIZE + header.size);
    if (flags.unsynchronisation && version !== TagVersion.v24) {
        body = removeUnsynchronisation(body);
    }

    const tag = new Tag(version);
    if (flags.extendedHeader) {
        tag.extendedHeader = readExtendedHeader(body, version);
        body = body.subarray(tag.extendedHeader.length);
    }

    const { frames, skipped } = decodeFrameSequence(body, version, flags.unsynchronisation && version === TagVersion.v24);
    frames.forEach(frame => tag.add(frame));
    tag.skipped = skipped;

    if (skipped.length > 0 && !options.partialTagOk) {
        const first = skipped[0].error;
        const error = new Id3Error(first.kind, `${skipped.length} frame(s) could not be read: ${first.message}`, { cause: first });
        error.partialTag = tag;
        throw error;
    }
    return tag;
}

/*
**  Create header (or footer, with the "3DI" magic) for an ID3v2 tag
*/
export function createTagHeader(version: TagVersion, flags: Partial<TagHeaderFlags>, size: number, magic = 'ID3'): Buffer {
    const header = Buffer.alloc(TAG_HEADER_SIZE);
    header.write(magic, 0, 'latin1');
    header[3] = majorVersionOf(version);
    header[4] = 0;
    header[5] = (flags.unsynchronisation ? 0x80 : 0) | (flags.footer ? 0x10 : 0);
    writeSize(size, header, 6);
    return header;
}

function textFrameLike(source: Frame, id: string, value: string): Frame {
    const frame = createFrame(id, { type: 'text', values: [value] }, source.flags);
    if (source.encoding !== undefined) {
        frame.encoding = source.encoding;
    }
    return frame;
}

function textOf(frames: Frame[], id: string): string | undefined {
    const content = frames.find(frame => frame.id === id)?.content;
    return content?.type === 'text' ? content.values[0] : undefined;
}

function timestampFrameLike(source: Frame, id: string, timestamp: Timestamp): Frame {
    const frame = createFrame(id, { type: 'timestamp', timestamp }, source.flags);
    if (source.encoding !== undefined) {
        frame.encoding = source.encoding;
    }
    return frame;
}

function isYear(value: string | undefined): value is string {
    return value !== undefined && /^\d{4}$/.test(value);
}

/*
**  ID3v2.4 replaced TYER/TDAT/TIME with TDRC and TORY with TDOR. Frames are
**  converted where they stand so the order of the tag is kept; a frame of the
**  target version wins over the frames it would be converted from.
*/
export function convertDateFrames(frames: Frame[], version: TagVersion): Frame[] {
    const result: Frame[] = [];
    const has = (id: string) => frames.some(frame => frame.id === id);

    if (version === TagVersion.v24) {
        const year = textOf(frames, 'TYER');
        const originalYear = textOf(frames, 'TORY');
        const mergeDate = has('TDRC') || isYear(year);
        const mergeOriginalDate = has('TDOR') || isYear(originalYear);
        frames.forEach(frame => {
            if (frame.id === 'TYER' && !has('TDRC') && isYear(year)) {
                const timestamp = fromLegacyDateValues(year, textOf(frames, 'TDAT'), textOf(frames, 'TIME'));
                result.push(timestampFrameLike(frame, 'TDRC', timestamp));
            } else if (frame.id === 'TORY' && !has('TDOR') && isYear(originalYear)) {
                result.push(timestampFrameLike(frame, 'TDOR', fromLegacyDateValues(originalYear)));
            } else if (LegacyDateFrames[frame.id] === 'TDRC' && mergeDate) {
                return;
            } else if (LegacyDateFrames[frame.id] === 'TDOR' && mergeOriginalDate) {
                return;
            } else {
                result.push(frame);
            }
        });
        return result;
    }

    const splitDate = frames.some(frame => frame.id === 'TDRC' && frame.content.type === 'timestamp');
    const splitOriginalDate = frames.some(frame => frame.id === 'TDOR' && frame.content.type === 'timestamp');
    frames.forEach(frame => {
        const content = frame.content;
        if (content.type === 'timestamp') {
            const values = toLegacyDateValues(content.timestamp);
            if (frame.id === 'TDRC') {
                result.push(textFrameLike(frame, 'TYER', values.year));
                if (values.date !== undefined) {
                    result.push(textFrameLike(frame, 'TDAT', values.date));
                }
                if (values.time !== undefined) {
                    result.push(textFrameLike(frame, 'TIME', values.time));
                }
            } else if (frame.id === 'TDOR') {
                result.push(textFrameLike(frame, 'TORY', values.year));
            } else {
                throw new Id3Error('UnsupportedFeature', `Frame ${frame.id} has no ${version} equivalent`);
            }
        } else if (LegacyDateFrames[frame.id] === 'TDRC' && splitDate) {
            return;
        } else if (LegacyDateFrames[frame.id] === 'TDOR' && splitOriginalDate) {
            return;
        } else {
            result.push(frame);
        }
    });
    return result;
}

/*
**  Serializes a tag: header, frames, padding and the optional footer
*/
export function encodeTag(tag: Tag, options: WriteOptions): Buffer {
    const { version } = options;
    const footer = !!options.footer;
    const unsynchronisation = !!options.unsynchronisation;
    if (footer && version !== TagVersion.v24) {
        throw new Id3Error('InvalidInput', `${version} tags have no footer`);
    }
    if (options.compression && version === TagVersion.v22) {
        throw new Id3Error('UnsupportedFeature', 'ID3v2.2 compression is not supported');
    }

    const frames = convertDateFrames(tag.frames(), version).map(frame => encodeFrame(frame, version, {
        encoding: options.encoding,
        compression: options.compression,
        unsynchronisation: unsynchronisation && version === TagVersion.v24,
    }));
    let body: Buffer = Buffer.concat(frames);
    if (unsynchronisation && version !== TagVersion.v24) {
        body = applyUnsynchronisation(body, version);
    }

    // ID3v2.4 does not allow padding together with a footer
    const padding = footer ? 0 : options.padding ?? DEFAULT_PADDING_SIZE;
    if (!Number.isInteger(padding) || padding < 0) {
        throw new Id3Error('InvalidInput', `Invalid padding size ${padding}`);
    }
    const size = body.length + padding;
    const flags = { unsynchronisation, footer };
    const parts = [createTagHeader(version, flags, size), body, Buffer.alloc(padding)];
    if (footer) {
        parts.push(createTagHeader(version, flags, size, '3DI'));
    }
    return Buffer.concat(parts);
}
