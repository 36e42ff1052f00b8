import * as iconv from 'iconv-lite';
import { createFrame, TagVersion } from './frame-classes';
import { Id3Error } from './errors';
import { genreName } from './genres';
import { readAt, Storage } from './storage';
import { Tag } from './tag';

/*
 **  Fixed 128 byte trailer: "TAG", title 30, artist 30, album 30, year 4,
 **  comment 30 (ID3v1.1: comment 28, zero byte, track), genre 1
 */
export const ID3V1_SIZE = 128;

const NO_GENRE = 0xFF;

export interface Id3v1Tag {
    title: string;
    artist: string;
    album: string;
    year: string;
    comment: string;
    track?: number;
    genreId: number;
}

function readField(buffer: Buffer, start: number, length: number): string {
    const field = buffer.subarray(start, start + length);
    const end = field.indexOf(0x00);
    return iconv.decode(end === -1 ? field : field.subarray(0, end), 'latin1').trimEnd();
}

function writeField(target: Buffer, value: string, start: number, length: number): void {
    const encoded = iconv.encode(value, 'latin1');
    encoded.copy(target, start, 0, Math.min(encoded.length, length));
}

export function isId3v1(buffer: Buffer): boolean {
    return buffer.length === ID3V1_SIZE && buffer.toString('latin1', 0, 3) === 'TAG';
}

export function decodeId3v1(buffer: Buffer): Id3v1Tag {
    if (!isId3v1(buffer)) {
        throw new Id3Error('NoTag', 'No ID3v1 tag found');
    }
    const tag: Id3v1Tag = {
        title: readField(buffer, 3, 30),
        artist: readField(buffer, 33, 30),
        album: readField(buffer, 63, 30),
        year: readField(buffer, 93, 4),
        comment: readField(buffer, 97, 30),
        genreId: buffer[127],
    };
    if (buffer[125] === 0x00 && buffer[126] !== 0x00) {
        tag.comment = readField(buffer, 97, 28);
        tag.track = buffer[126];
    }
    return tag;
}

export function encodeId3v1(tag: Id3v1Tag): Buffer {
    const buffer = Buffer.alloc(ID3V1_SIZE);
    buffer.write('TAG', 0, 'latin1');
    writeField(buffer, tag.title, 3, 30);
    writeField(buffer, tag.artist, 33, 30);
    writeField(buffer, tag.album, 63, 30);
    writeField(buffer, tag.year, 93, 4);
    if (tag.track !== undefined && tag.track > 0 && tag.track <= 0xFF) {
        writeField(buffer, tag.comment, 97, 28);
        buffer[126] = tag.track;
    } else {
        writeField(buffer, tag.comment, 97, 30);
    }
    buffer[127] = tag.genreId;
    return buffer;
}

function trailer(storage: Storage): Buffer | undefined {
    const size = storage.size();
    if (size < ID3V1_SIZE) {
        return undefined;
    }
    const buffer = readAt(storage, size - ID3V1_SIZE, ID3V1_SIZE);
    return isId3v1(buffer) ? buffer : undefined;
}

export function hasId3v1(storage: Storage): boolean {
    return trailer(storage) !== undefined;
}

export function readId3v1(storage: Storage): Id3v1Tag {
    const buffer = trailer(storage);
    if (!buffer) {
        throw new Id3Error('NoTag', 'No ID3v1 tag found');
    }
    return decodeId3v1(buffer);
}

/*
**  Replaces an existing trailer or appends a new one
*/
export function writeId3v1(storage: Storage, tag: Id3v1Tag): void {
    const size = storage.size();
    storage.write(encodeId3v1(tag), hasId3v1(storage) ? size - ID3V1_SIZE : size);
}

export function removeId3v1(storage: Storage): boolean {
    if (!hasId3v1(storage)) {
        return false;
    }
    storage.truncate(storage.size() - ID3V1_SIZE);
    return true;
}

/*
**  Lifts an ID3v1 tag into the ID3v2 model; empty fields are left out
*/
export function id3v1ToTag(v1: Id3v1Tag): Tag {
    const tag = new Tag(TagVersion.v24);
    if (v1.title) {
        tag.setTitle(v1.title);
    }
    if (v1.artist) {
        tag.setArtist(v1.artist);
    }
    if (v1.album) {
        tag.setAlbum(v1.album);
    }
    if (/^\d{4}$/.test(v1.year)) {
        tag.setYear(Number(v1.year));
    }
    if (v1.comment) {
        tag.add(createFrame('COMM', { type: 'comment', language: 'eng', description: '', text: v1.comment }));
    }
    if (v1.track !== undefined) {
        tag.setTrackNumber(v1.track);
    }
    const genre = v1.genreId === NO_GENRE ? undefined : genreName(v1.genreId);
    if (genre !== undefined) {
        tag.setGenre(genre);
    }
    return tag;
}
