import { deflateSync, inflateSync } from 'zlib';
import { defaultFrameFlags, Encoding, Frame, FrameFlags, TagVersion } from './frame-classes';
import { contentShapeOf, getIdentifierSize, isValidFrameId, toCanonicalId, toVersionedId } from './frame-definitions';
import { decodeContent, encodeContent } from './content';
import { encodingForWrite } from './encoding';
import { Id3Error, isId3Error } from './errors';
import { defaultEncodingFor } from './config';
import { decodeSize, encodeSize } from './syncsafe';
import { applyUnsynchronisation, removeUnsynchronisation } from './unsynchronisation';
import { logger } from './logger';

export interface FrameHeader {
    id: string;
    size: number;
    statusFlags: number;
    formatFlags: number;
}

export interface FrameEncodeOptions {
    encoding?: Encoding;
    compression?: boolean;
    unsynchronisation?: boolean;
}

/*
**  A frame left out of a tag because it could not be decoded
*/
export interface SkippedFrame {
    id: string;
    offset: number;
    error: Id3Error;
}

export function getFrameHeaderSize(version: TagVersion): number {
    switch (version) {
        case TagVersion.v22:
            return 6;
        case TagVersion.v23:
        case TagVersion.v24:
            return 10;
    }
}

export function readFrameHeader(data: Buffer, position: number, version: TagVersion): FrameHeader {
    const identifierSize = getIdentifierSize(version);
    const id = data.toString('latin1', position, position + identifierSize);
    switch (version) {
        case TagVersion.v22:
            return { id, size: data.readUIntBE(position + 3, 3), statusFlags: 0, formatFlags: 0 };
        case TagVersion.v23:
            return { id, size: data.readUInt32BE(position + 4), statusFlags: data[position + 8], formatFlags: data[position + 9] };
        case TagVersion.v24:
            return { id, size: decodeSize(data, position + 4), statusFlags: data[position + 8], formatFlags: data[position + 9] };
    }
}

export function parseFrameFlags(version: TagVersion, status: number, format: number): FrameFlags {
    switch (version) {
        case TagVersion.v22:
            return defaultFrameFlags();
        case TagVersion.v23:
            return {
                tagAlterPreservation: !!(status & 0x80),
                fileAlterPreservation: !!(status & 0x40),
                readOnly: !!(status & 0x20),
                compression: !!(format & 0x80),
                encryption: !!(format & 0x40),
                unsynchronisation: false,
                dataLengthIndicator: false,
            };
        case TagVersion.v24:
            return {
                tagAlterPreservation: !!(status & 0x40),
                fileAlterPreservation: !!(status & 0x20),
                readOnly: !!(status & 0x10),
                compression: !!(format & 0x08),
                encryption: !!(format & 0x04),
                unsynchronisation: !!(format & 0x02),
                dataLengthIndicator: !!(format & 0x01),
            };
    }
}

function hasGroupingFlag(version: TagVersion, format: number): boolean {
    switch (version) {
        case TagVersion.v22:
            return false;
        case TagVersion.v23:
            return !!(format & 0x20);
        case TagVersion.v24:
            return !!(format & 0x40);
    }
}

function requireBytes(body: Buffer, position: number, count: number, id: string): void {
    if (position + count > body.length) {
        throw new Id3Error('Parsing', `Frame ${id} is too short for its flags`);
    }
}

/*
**  Decodes one frame body. Extra header data is read first, then per-frame
**  unsynchronisation is undone, then the body is inflated.
*/
export function decodeFrame(header: FrameHeader, body: Buffer, version: TagVersion, tagUnsynchronised: boolean): Frame {
    if (!isValidFrameId(header.id, version)) {
        throw new Id3Error('Parsing', `Invalid frame identifier ${JSON.stringify(header.id)}`);
    }
    const id = toCanonicalId(header.id, version);
    const flags = parseFrameFlags(version, header.statusFlags, header.formatFlags);
    let position = 0;

    if (version === TagVersion.v23) {
        if (flags.compression) {
            requireBytes(body, position, 4, id);
            position += 4;  // decompressed size
        }
        if (flags.encryption) {
            requireBytes(body, position, 1, id);
            position += 1;  // encryption method
        }
    }
    if (hasGroupingFlag(version, header.formatFlags)) {
        requireBytes(body, position, 1, id);
        flags.groupingIdentifier = body[position];
        position += 1;
    }
    if (version === TagVersion.v24) {
        if (flags.encryption) {
            requireBytes(body, position, 1, id);
            position += 1;
        }
        if (flags.dataLengthIndicator) {
            requireBytes(body, position, 4, id);
            decodeSize(body, position);
            position += 4;
        }
    }

    let data = body.subarray(position);
    if (version === TagVersion.v24 && (flags.unsynchronisation || tagUnsynchronised)) {
        data = removeUnsynchronisation(data);
    }
    if (flags.encryption) {
        throw new Id3Error('UnsupportedFeature', `Frame ${id} is encrypted`);
    }
    if (flags.compression) {
        try {
            data = inflateSync(data);
        } catch (err) {
            throw new Id3Error('Parsing', `Frame ${id} could not be decompressed`, { cause: err });
        }
    }

    const decoded = decodeContent(id, data, version);
    const frame: Frame = { id, content: decoded.content, flags };
    if (decoded.encoding !== undefined) {
        frame.encoding = decoded.encoding;
    }
    return frame;
}

function isAllZero(data: Buffer): boolean {
    return data.every(byte => byte === 0x00);
}

/*
**  Walks frames until the data is used up or padding starts. Frames that fail
**  to decode are skipped; a header that cannot be trusted ends the walk.
*/
export function decodeFrameSequence(
    data: Buffer,
    version: TagVersion,
    tagUnsynchronised: boolean,
): { frames: Frame[]; skipped: SkippedFrame[] } {
    const frames: Frame[] = [];
    const skipped: SkippedFrame[] = [];
    const headerSize = getFrameHeaderSize(version);
    const identifierSize = getIdentifierSize(version);
    let position = 0;

    while (position + headerSize <= data.length) {
        if (isAllZero(data.subarray(position, position + identifierSize))) {
            break;  // padding
        }
        let header: FrameHeader;
        try {
            header = readFrameHeader(data, position, version);
        } catch (err) {
            if (!isId3Error(err)) {
                throw err;
            }
            skipped.push({ id: data.toString('latin1', position, position + identifierSize), offset: position, error: err });
            break;
        }
        const end = position + headerSize + header.size;
        if (end > data.length) {
            const error = new Id3Error('Parsing', `Frame ${header.id} overruns the tag (${header.size} bytes)`);
            skipped.push({ id: header.id, offset: position, error });
            break;
        }
        try {
            frames.push(decodeFrame(header, data.subarray(position + headerSize, end), version, tagUnsynchronised));
        } catch (err) {
            if (!isId3Error(err) || !isRecoverable(err)) {
                throw err;
            }
            logger.warn({ frame: header.id, offset: position, kind: err.kind }, err.message);
            skipped.push({ id: header.id, offset: position, error: err });
        }
        position = end;
    }

    return { frames, skipped };
}

function isRecoverable(err: Id3Error): boolean {
    return err.kind === 'Parsing' || err.kind === 'UnsupportedFeature' || err.kind === 'StringDecoding';
}

function statusByte(version: TagVersion, flags: FrameFlags): number {
    if (version === TagVersion.v23) {
        return (flags.tagAlterPreservation ? 0x80 : 0) | (flags.fileAlterPreservation ? 0x40 : 0) | (flags.readOnly ? 0x20 : 0);
    }
    return (flags.tagAlterPreservation ? 0x40 : 0) | (flags.fileAlterPreservation ? 0x20 : 0) | (flags.readOnly ? 0x10 : 0);
}

/*
**  Content encode -> compression -> unsynchronisation -> header
*/
export function encodeFrame(frame: Frame, version: TagVersion, options: FrameEncodeOptions = {}): Buffer {
    const flags = frame.flags;
    if (flags.encryption) {
        throw new Id3Error('UnsupportedFeature', `Frame ${frame.id} is encrypted and cannot be written`);
    }
    const shape = contentShapeOf(frame.id);
    if (shape !== frame.content.type) {
        throw new Id3Error('InvalidInput', `Frame ${frame.id} cannot hold ${frame.content.type} content`);
    }
    const id = toVersionedId(frame.id, version);
    const encoding = encodingForWrite(options.encoding ?? frame.encoding ?? defaultEncodingFor(version), version);
    const content = encodeContent(frame, version, encoding, options);

    switch (version) {
        case TagVersion.v22: {
            if (content.length > 0xFFFFFF) {
                throw new Id3Error('InvalidInput', `Frame ${frame.id} is too large for ${version}`);
            }
            const header = Buffer.alloc(6);
            header.write(id, 0, 'latin1');
            header.writeUIntBE(content.length, 3, 3);
            return Buffer.concat([header, content]);
        }
        case TagVersion.v23: {
            const compressed = !!options.compression || flags.compression;
            const extras: Buffer[] = [];
            if (compressed) {
                const decompressedSize = Buffer.alloc(4);
                decompressedSize.writeUInt32BE(content.length, 0);
                extras.push(decompressedSize);
            }
            if (flags.groupingIdentifier !== undefined) {
                extras.push(Buffer.from([flags.groupingIdentifier]));
            }
            const body = Buffer.concat([...extras, compressed ? deflateSync(content) : content]);
            const header = Buffer.alloc(10);
            header.write(id, 0, 'latin1');
            header.writeUInt32BE(body.length, 4);
            header[8] = statusByte(version, flags);
            header[9] = (compressed ? 0x80 : 0) | (flags.groupingIdentifier !== undefined ? 0x20 : 0);
            return Buffer.concat([header, body]);
        }
        case TagVersion.v24: {
            const compressed = !!options.compression || flags.compression;
            const unsynchronised = !!options.unsynchronisation || flags.unsynchronisation;
            const dataLengthIndicator = compressed || flags.dataLengthIndicator;
            let data: Buffer = compressed ? deflateSync(content) : content;
            if (unsynchronised) {
                data = applyUnsynchronisation(data, version);
            }
            const extras: Buffer[] = [];
            if (flags.groupingIdentifier !== undefined) {
                extras.push(Buffer.from([flags.groupingIdentifier]));
            }
            if (dataLengthIndicator) {
                extras.push(encodeSize(content.length));
            }
            const body = Buffer.concat([...extras, data]);
            const header = Buffer.alloc(10);
            header.write(id, 0, 'latin1');
            encodeSize(body.length).copy(header, 4);
            header[8] = statusByte(version, flags);
            header[9] = (flags.groupingIdentifier !== undefined ? 0x40 : 0)
                | (compressed ? 0x08 : 0)
                | (unsynchronised ? 0x02 : 0)
                | (dataLengthIndicator ? 0x01 : 0);
            return Buffer.concat([header, body]);
        }
    }
}
