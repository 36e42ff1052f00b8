import * as iconv from 'iconv-lite';
import { Encoding, TagVersion } from './frame-classes';
import { Id3Error } from './errors';

const UTF16_LE_BOM = Buffer.from([0xFF, 0xFE]);
const UTF16_BE_BOM = Buffer.from([0xFE, 0xFF]);

export function isEncodingAllowed(encoding: Encoding, version: TagVersion): boolean {
    return version === TagVersion.v24 || encoding === Encoding.Latin1 || encoding === Encoding.UTF16;
}

/*
**  ID3v2.2/2.3 only know Latin1 and UTF-16 with BOM; anything else is written as UTF-16
*/
export function encodingForWrite(encoding: Encoding, version: TagVersion): Encoding {
    return isEncodingAllowed(encoding, version) ? encoding : Encoding.UTF16;
}

export function parseEncodingByte(byte: number | undefined, version: TagVersion): Encoding {
    switch (byte) {
        case Encoding.Latin1:
        case Encoding.UTF16:
        case Encoding.UTF16BE:
        case Encoding.UTF8:
            if (!isEncodingAllowed(byte, version)) {
                throw new Id3Error('Parsing', `Text encoding ${byte} is not permitted in ${version}`);
            }
            return byte;
        case undefined:
            throw new Id3Error('Parsing', 'Missing text encoding byte');
        default:
            throw new Id3Error('Parsing', `Invalid text encoding byte ${byte}`);
    }
}

export function getTerminationCount(encoding: Encoding): number {
    if (encoding === Encoding.Latin1 || encoding === Encoding.UTF8) {
        return 1;
    } else {
        return 2;
    }
}

export function terminator(encoding: Encoding): Buffer {
    return Buffer.alloc(getTerminationCount(encoding), 0x00);
}

export function decodeText(data: Buffer, encoding: Encoding): string {
    switch (encoding) {
        case Encoding.Latin1:
            return iconv.decode(data, 'latin1');
        case Encoding.UTF16:
            if (data.length === 0) {
                return '';
            }
            if (data.length % 2 !== 0) {
                throw new Id3Error('StringDecoding', 'UTF-16 text has an odd byte length');
            }
            if (data[0] === 0xFF && data[1] === 0xFE) {
                return iconv.decode(data.subarray(2), 'utf16le', { stripBOM: false });
            }
            if (data[0] === 0xFE && data[1] === 0xFF) {
                return iconv.decode(data.subarray(2), 'utf16be', { stripBOM: false });
            }
            throw new Id3Error('StringDecoding', 'UTF-16 text without a valid byte order mark');
        case Encoding.UTF16BE:
            if (data.length % 2 !== 0) {
                throw new Id3Error('StringDecoding', 'UTF-16BE text has an odd byte length');
            }
            return iconv.decode(data, 'utf16be', { stripBOM: false });
        case Encoding.UTF8: {
            const text = iconv.decode(data, 'utf8', { stripBOM: false });
            // the decoder substitutes U+FFFD for bad sequences, so a lossless round trip proves validity
            if (!iconv.encode(text, 'utf8').equals(data)) {
                throw new Id3Error('StringDecoding', 'Invalid UTF-8 sequence');
            }
            return text;
        }
    }
}

export function encodeText(text: string, encoding: Encoding): Buffer {
    switch (encoding) {
        case Encoding.Latin1:
            for (let i = 0; i < text.length; i++) {
                if (text.charCodeAt(i) > 0xFF) {
                    throw new Id3Error('InvalidInput', `"${text}" cannot be represented in Latin1`);
                }
            }
            return iconv.encode(text, 'latin1');
        case Encoding.UTF16:
            return Buffer.concat([UTF16_LE_BOM, iconv.encode(text, 'utf16le')]);
        case Encoding.UTF16BE:
            return iconv.encode(text, 'utf16be');
        case Encoding.UTF8:
            return iconv.encode(text, 'utf8');
    }
}

/*
**  Position of the next terminator at or after offset, -1 if there is none.
**  16-bit terminators are only matched on code unit boundaries.
*/
export function findTerminator(data: Buffer, offset: number, encoding: Encoding): number {
    if (getTerminationCount(encoding) === 1) {
        return data.indexOf(0x00, offset);
    }
    for (let i = offset; i + 1 < data.length; i += 2) {
        if (data[i] === 0x00 && data[i + 1] === 0x00) {
            return i;
        }
    }
    return -1;
}

export interface DecodedString {
    text: string;
    next: number;
}

/*
**  Reads a string that must be followed by a terminator, returns the text and
**  the offset behind the terminator
*/
export function readTerminatedString(data: Buffer, offset: number, encoding: Encoding): DecodedString {
    const end = findTerminator(data, offset, encoding);
    if (end === -1) {
        throw new Id3Error('Parsing', 'Missing string terminator');
    }
    return {
        text: decodeText(data.subarray(offset, end), encoding),
        next: end + getTerminationCount(encoding),
    };
}

/*
**  Reads the last string of a frame body; one trailing terminator is tolerated
*/
export function readFinalString(data: Buffer, offset: number, encoding: Encoding): string {
    return decodeText(stripTerminator(data.subarray(offset), encoding), encoding);
}

export function stripTerminator(data: Buffer, encoding: Encoding): Buffer {
    const count = getTerminationCount(encoding);
    if (data.length >= count && data.subarray(data.length - count).every(byte => byte === 0x00)) {
        if (count === 1 || data.length % 2 === 0) {
            return data.subarray(0, data.length - count);
        }
    }
    return data;
}

/*
**  Splits a multi-value text payload on its terminators
*/
export function splitValues(data: Buffer, encoding: Encoding): string[] {
    const payload = stripTerminator(data, encoding);
    const values: string[] = [];
    let position = 0;
    for (;;) {
        const end = findTerminator(payload, position, encoding);
        if (end === -1) {
            values.push(decodeText(payload.subarray(position), encoding));
            return values;
        }
        values.push(decodeText(payload.subarray(position, end), encoding));
        position = end + getTerminationCount(encoding);
    }
}

/*
**  Joins values with terminators. An empty last value of several gets a
**  trailing terminator, since reading drops one.
*/
export function joinValues(values: string[], encoding: Encoding): Buffer {
    const parts: Buffer[] = [];
    values.forEach((value, index) => {
        if (index > 0) {
            parts.push(terminator(encoding));
        }
        parts.push(encodeText(value, encoding));
    });
    if (values.length > 1 && parts[parts.length - 1].length === 0) {
        parts.push(terminator(encoding));
    }
    return Buffer.concat(parts);
}
