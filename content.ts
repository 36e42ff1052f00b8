import {
    ChapterContent,
    CommentContent,
    Content,
    Encoding,
    ExtendedLinkContent,
    ExtendedTextContent,
    Frame,
    PictureContent,
    PopularimeterContent,
    TagVersion,
} from './frame-classes';
import { contentShapeOf } from './frame-definitions';
import {
    encodeText,
    joinValues,
    parseEncodingByte,
    readFinalString,
    readTerminatedString,
    splitValues,
    terminator,
} from './encoding';
import { Id3Error } from './errors';
import { decodeFrameSequence, encodeFrame, FrameEncodeOptions } from './frame-codec';
import { formatTimestamp, parseTimestamp } from './timestamp';

const NO_OFFSET = 0xFFFFFFFF;

export interface DecodedContent {
    content: Content;
    encoding?: Encoding;
}

/*
**  The single dispatch point from identifier to payload layout
*/
export function decodeContent(id: string, body: Buffer, version: TagVersion): DecodedContent {
    switch (contentShapeOf(id)) {
        case 'text': {
            const encoding = parseEncodingByte(body[0], version);
            return { content: { type: 'text', values: splitValues(body.subarray(1), encoding) }, encoding };
        }
        case 'timestamp': {
            const encoding = parseEncodingByte(body[0], version);
            const timestamp = parseTimestamp(readFinalString(body, 1, encoding));
            return { content: { type: 'timestamp', timestamp }, encoding };
        }
        case 'extendedText':
            return readExtendedTextFrame(body, version);
        case 'extendedLink':
            return readExtendedLinkFrame(body, version);
        case 'link':
            return { content: { type: 'link', url: readFinalString(body, 0, Encoding.Latin1) } };
        case 'comment':
            return readCommentFrame(body, version);
        case 'picture':
            return readPictureFrame(body, version);
        case 'popularimeter':
            return { content: readPopularimeterFrame(body) };
        case 'chapter':
            return { content: readChapterFrame(body, version) };
        case 'unknown':
            return { content: { type: 'unknown', data: Buffer.from(body) } };
    }
}

function readExtendedTextFrame(body: Buffer, version: TagVersion): DecodedContent {
    const encoding = parseEncodingByte(body[0], version);
    const description = readTerminatedString(body, 1, encoding);
    const content: ExtendedTextContent = {
        type: 'extendedText',
        description: description.text,
        value: readFinalString(body, description.next, encoding),
    };
    return { content, encoding };
}

function readExtendedLinkFrame(body: Buffer, version: TagVersion): DecodedContent {
    const encoding = parseEncodingByte(body[0], version);
    const description = readTerminatedString(body, 1, encoding);
    const content: ExtendedLinkContent = {
        type: 'extendedLink',
        description: description.text,
        link: readFinalString(body, description.next, Encoding.Latin1),
    };
    return { content, encoding };
}

/*
**  COMM and USLT share this layout. The language is kept as found, even when
**  it is not three ASCII letters.
*/
function readCommentFrame(body: Buffer, version: TagVersion): DecodedContent {
    const encoding = parseEncodingByte(body[0], version);
    if (body.length < 4) {
        throw new Id3Error('Parsing', 'Comment frame is truncated');
    }
    const description = readTerminatedString(body, 4, encoding);
    const content: CommentContent = {
        type: 'comment',
        language: body.toString('latin1', 1, 4),
        description: description.text,
        text: readFinalString(body, description.next, encoding),
    };
    return { content, encoding };
}

/*
**  ID3v2.2 stores a 3 character image format instead of a MIME type
*/
export function formatToMimeType(format: string): string {
    switch (format.toUpperCase()) {
        case 'JPG':
            return 'image/jpeg';
        case 'PNG':
            return 'image/png';
        default:
            return `image/${format.toLowerCase()}`;
    }
}

export function mimeTypeToFormat(mimeType: string): string {
    switch (mimeType.toLowerCase()) {
        case 'image/jpeg':
        case 'image/jpg':
            return 'JPG';
        case 'image/png':
            return 'PNG';
    }
    const format = mimeType.substring(mimeType.indexOf('/') + 1).toUpperCase();
    if (format.length !== 3) {
        throw new Id3Error('UnsupportedFeature', `MIME type ${mimeType} has no ID3v2.2 image format`);
    }
    return format;
}

function readPictureFrame(body: Buffer, version: TagVersion): DecodedContent {
    const encoding = parseEncodingByte(body[0], version);
    let mimeType: string;
    let position: number;
    if (version === TagVersion.v22) {
        if (body.length < 4) {
            throw new Id3Error('Parsing', 'Picture frame is truncated');
        }
        mimeType = formatToMimeType(body.toString('latin1', 1, 4));
        position = 4;
    } else {
        const mime = readTerminatedString(body, 1, Encoding.Latin1);
        mimeType = mime.text;
        position = mime.next;
    }
    const pictureType = body[position];
    if (pictureType === undefined) {
        throw new Id3Error('Parsing', 'Picture frame is missing its picture type');
    }
    const description = readTerminatedString(body, position + 1, encoding);
    const content: PictureContent = {
        type: 'picture',
        mimeType,
        pictureType,
        description: description.text,
        data: Buffer.from(body.subarray(description.next)),
    };
    return { content, encoding };
}

/*
**  The play counter fills whatever is left of the frame, at any width
*/
function readPopularimeterFrame(body: Buffer): PopularimeterContent {
    const email = readTerminatedString(body, 0, Encoding.Latin1);
    const rating = body[email.next];
    if (rating === undefined) {
        throw new Id3Error('Parsing', 'Popularimeter frame is missing its rating');
    }
    const counterBytes = body.subarray(email.next + 1);
    const counter = counterBytes.length > 0 ? BigInt(`0x${counterBytes.toString('hex')}`) : 0n;
    return { type: 'popularimeter', email: email.text, rating, counter };
}

function readChapterFrame(body: Buffer, version: TagVersion): ChapterContent {
    const elementId = readTerminatedString(body, 0, Encoding.Latin1);
    if (body.length - elementId.next < 16) {
        throw new Id3Error('Parsing', 'Chapter frame is truncated');
    }
    const position = elementId.next;
    const startOffset = body.readUInt32BE(position + 8);
    const endOffset = body.readUInt32BE(position + 12);
    const embedded = decodeFrameSequence(body.subarray(position + 16), version, false);
    if (embedded.skipped.length > 0) {
        throw embedded.skipped[0].error;
    }
    const chapter: ChapterContent = {
        type: 'chapter',
        elementId: elementId.text,
        startTimeMs: body.readUInt32BE(position),
        endTimeMs: body.readUInt32BE(position + 4),
        frames: embedded.frames,
    };
    if (startOffset !== NO_OFFSET) {
        chapter.startOffsetBytes = startOffset;
    }
    if (endOffset !== NO_OFFSET) {
        chapter.endOffsetBytes = endOffset;
    }
    return chapter;
}

export function createLanguage(language: string): Buffer {
    if (!language) {
        language = 'eng';
    }
    if (language.length !== 3) {
        throw new Id3Error('InvalidInput', `Language "${language}" must be 3 characters long`);
    }
    return encodeText(language, Encoding.Latin1);
}

function createUInt32(value: number | undefined): Buffer {
    const buffer = Buffer.alloc(4, 0xFF);
    if (value !== undefined) {
        buffer.writeUInt32BE(value, 0);
    }
    return buffer;
}

function createCounter(counter: bigint): Buffer {
    if (counter < 0n) {
        throw new Id3Error('InvalidInput', 'Play counter cannot be negative');
    }
    let hex = counter.toString(16);
    if (hex.length % 2 !== 0) {
        hex = `0${hex}`;
    }
    return Buffer.from(hex.padStart(8, '0'), 'hex');
}

/*
**  Serializes a frame's payload; encoding has already been checked against the version
*/
export function encodeContent(frame: Frame, version: TagVersion, encoding: Encoding, options: FrameEncodeOptions): Buffer {
    const content = frame.content;
    const encodingByte = Buffer.from([encoding]);
    switch (content.type) {
        case 'text':
            if (content.values.length === 0) {
                throw new Id3Error('InvalidInput', `Text frame ${frame.id} has no values`);
            }
            return Buffer.concat([encodingByte, joinValues(content.values, encoding)]);
        case 'timestamp':
            return Buffer.concat([encodingByte, encodeText(formatTimestamp(content.timestamp), encoding)]);
        case 'extendedText':
            return Buffer.concat([
                encodingByte,
                encodeText(content.description, encoding),
                terminator(encoding),
                encodeText(content.value, encoding),
            ]);
        case 'extendedLink':
            return Buffer.concat([
                encodingByte,
                encodeText(content.description, encoding),
                terminator(encoding),
                encodeText(content.link, Encoding.Latin1),
            ]);
        case 'link':
            return encodeText(content.url, Encoding.Latin1);
        case 'comment':
            return Buffer.concat([
                encodingByte,
                createLanguage(content.language),
                encodeText(content.description, encoding),
                terminator(encoding),
                encodeText(content.text, encoding),
            ]);
        case 'picture': {
            if (!Number.isInteger(content.pictureType) || content.pictureType < 0 || content.pictureType > 0xFF) {
                throw new Id3Error('InvalidInput', `Invalid picture type ${content.pictureType}`);
            }
            const mimeType = version === TagVersion.v22
                ? encodeText(mimeTypeToFormat(content.mimeType), Encoding.Latin1)
                : Buffer.concat([encodeText(content.mimeType, Encoding.Latin1), terminator(Encoding.Latin1)]);
            return Buffer.concat([
                encodingByte,
                mimeType,
                Buffer.from([content.pictureType]),
                encodeText(content.description, encoding),
                terminator(encoding),
                content.data,
            ]);
        }
        case 'popularimeter':
            if (!Number.isInteger(content.rating) || content.rating < 0 || content.rating > 0xFF) {
                throw new Id3Error('InvalidInput', `Invalid rating ${content.rating}`);
            }
            return Buffer.concat([
                encodeText(content.email, Encoding.Latin1),
                terminator(Encoding.Latin1),
                Buffer.from([content.rating]),
                createCounter(content.counter),
            ]);
        case 'chapter':
            return Buffer.concat([
                encodeText(content.elementId, Encoding.Latin1),
                terminator(Encoding.Latin1),
                createUInt32(content.startTimeMs),
                createUInt32(content.endTimeMs),
                createUInt32(content.startOffsetBytes),
                createUInt32(content.endOffsetBytes),
                ...content.frames.map(embedded => encodeFrame(embedded, version, options)),
            ]);
        case 'unknown':
            return content.data;
    }
}
