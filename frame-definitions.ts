import { ContentShape, TagVersion } from './frame-classes';
import { Id3Error } from './errors';
import legacyFrameIds from './legacy-frame-ids.json';

/*
 **  List of official text information frames
 **  LibraryName: "T***"
 **  Value is the ID of the text frame, the object's keys are just for
 **  simplicity, you can also use the ID directly.
 */
export const FrameAliases: Record<string, string> = {
    album:                  'TALB',
    albumArtist:            'TPE2',
    albumSortOrder:         'TSOA',
    artist:                 'TPE1',
    artistSortOrder:        'TSOP',
    bpm:                    'TBPM',
    composer:               'TCOM',
    conductor:              'TPE3',
    contentGroup:           'TIT1',
    copyright:              'TCOP',
    date:                   'TDRC',
    discNumber:             'TPOS',
    encodedBy:              'TENC',
    encodingTechnology:     'TSSE',
    fileOwner:              'TOWN',
    fileType:               'TFLT',
    genre:                  'TCON',
    initialKey:             'TKEY',
    internetRadioName:      'TRSN',
    internetRadioOwner:     'TRSO',
    isrc:                   'TSRC',
    language:               'TLAN',
    length:                 'TLEN',
    mediaType:              'TMED',
    mood:                   'TMOO',
    originalArtist:         'TOPE',
    originalFilename:       'TOFN',
    originalReleaseDate:    'TDOR',
    originalTextwriter:     'TOLY',
    originalTitle:          'TOAL',
    playlistDelay:          'TDLY',
    producedNotice:         'TPRO',
    publisher:              'TPUB',
    remixArtist:            'TPE4',
    subtitle:               'TIT3',
    textWriter:             'TEXT',
    title:                  'TIT2',
    titleSortOrder:         'TSOT',
    trackNumber:            'TRCK',
    year:                   'TYER',
};

/*
 **  Non-text frames which follow their own layout; every other T*** frame is
 **  plain text and every other W*** frame a bare link
 */
const SpecialFrameShapes: Record<string, ContentShape> = {
    TXXX: 'extendedText',
    WXXX: 'extendedLink',
    COMM: 'comment',
    USLT: 'comment',
    APIC: 'picture',
    POPM: 'popularimeter',
    CHAP: 'chapter',
    TDRC: 'timestamp',
    TDOR: 'timestamp',
    TDRL: 'timestamp',
    TDEN: 'timestamp',
    TDTG: 'timestamp',
};

/**
 * These are v2.3 date frames that were folded into timestamp frames in v2.4
 * http://id3.org/id3v2.4.0-changes
 */
export const LegacyDateFrames: Record<string, string> = {
    TYER: 'TDRC',
    TDAT: 'TDRC',
    TIME: 'TDRC',
    TORY: 'TDOR',
};

const LegacyToCanonical: Record<string, string> = legacyFrameIds;
const CanonicalToLegacy: Record<string, string> = Object.fromEntries(
    Object.entries(LegacyToCanonical).map(([legacy, canonical]) => [canonical, legacy]),
);

export function resolveFrameId(idOrAlias: string): string {
    return FrameAliases[idOrAlias] || idOrAlias;
}

/*
**  Identifier as stored in a Tag; unmapped ID3v2.2 identifiers keep their 3 characters
*/
export function toCanonicalId(id: string, version: TagVersion): string {
    if (version !== TagVersion.v22) {
        return id;
    }
    return LegacyToCanonical[id] || id;
}

export function toVersionedId(id: string, version: TagVersion): string {
    if (version === TagVersion.v22) {
        if (id.length === 3) {
            return id;
        }
        const legacy = CanonicalToLegacy[id];
        if (!legacy) {
            throw new Id3Error('UnsupportedFeature', `Frame ${id} has no ID3v2.2 equivalent`);
        }
        return legacy;
    }
    if (id.length !== 4) {
        throw new Id3Error('UnsupportedFeature', `Frame ${id} can only be written as ${TagVersion.v22}`);
    }
    return id;
}

export function getIdentifierSize(version: TagVersion): number {
    switch (version) {
        case TagVersion.v22:
            return 3;
        case TagVersion.v23:
        case TagVersion.v24:
            return 4;
    }
}

export function isValidFrameId(id: string, version: TagVersion): boolean {
    return id.length === getIdentifierSize(version) && /^[A-Z0-9]+$/.test(id);
}

export function contentShapeOf(id: string): ContentShape {
    const special = SpecialFrameShapes[id];
    if (special) {
        return special;
    }
    if (id.length === 4 && id[0] === 'T') {
        return 'text';
    }
    if (id.length === 4 && id[0] === 'W') {
        return 'link';
    }
    return 'unknown';
}
