export enum TagVersion {
    v22 = 'ID3v2.2',
    v23 = 'ID3v2.3',
    v24 = 'ID3v2.4',
}

/*
 **  Text encoding byte values as they appear on the wire
 */
export enum Encoding {
    Latin1 = 0x00,
    UTF16 = 0x01,
    UTF16BE = 0x02,
    UTF8 = 0x03,
}

export type ContentShape =
    | 'text'
    | 'extendedText'
    | 'extendedLink'
    | 'link'
    | 'comment'
    | 'picture'
    | 'timestamp'
    | 'popularimeter'
    | 'chapter'
    | 'unknown';

export interface TextContent {
    type: 'text';
    values: string[];
}

export interface ExtendedTextContent {
    type: 'extendedText';
    description: string;
    value: string;
}

export interface ExtendedLinkContent {
    type: 'extendedLink';
    description: string;
    link: string;
}

export interface LinkContent {
    type: 'link';
    url: string;
}

/*
 **  Shared by COMM and USLT
 */
export interface CommentContent {
    type: 'comment';
    language: string;
    description: string;
    text: string;
}

export interface PictureContent {
    type: 'picture';
    mimeType: string;
    pictureType: number;
    description: string;
    data: Buffer;
}

export interface PopularimeterContent {
    type: 'popularimeter';
    email: string;
    rating: number;
    counter: bigint;
}

export interface TimestampContent {
    type: 'timestamp';
    timestamp: Timestamp;
}

export interface ChapterContent {
    type: 'chapter';
    elementId: string;
    startTimeMs: number;
    endTimeMs: number;
    startOffsetBytes?: number;
    endOffsetBytes?: number;
    frames: Frame[];
}

export interface UnknownContent {
    type: 'unknown';
    data: Buffer;
}

export type Content =
    | TextContent
    | ExtendedTextContent
    | ExtendedLinkContent
    | LinkContent
    | CommentContent
    | PictureContent
    | PopularimeterContent
    | TimestampContent
    | ChapterContent
    | UnknownContent;

/*
 **  Partial ISO-8601 date; components after the first absent one are absent too
 */
export interface Timestamp {
    year: number;
    month?: number;
    day?: number;
    hour?: number;
    minute?: number;
    second?: number;
}

export interface FrameFlags {
    tagAlterPreservation: boolean;
    fileAlterPreservation: boolean;
    readOnly: boolean;
    groupingIdentifier?: number;
    compression: boolean;
    encryption: boolean;
    unsynchronisation: boolean;
    dataLengthIndicator: boolean;
}

export interface Frame {
    id: string;
    content: Content;
    flags: FrameFlags;
    encoding?: Encoding;
}

export function defaultFrameFlags(): FrameFlags {
    return {
        tagAlterPreservation: false,
        fileAlterPreservation: false,
        readOnly: false,
        compression: false,
        encryption: false,
        unsynchronisation: false,
        dataLengthIndicator: false,
    };
}

export function createFrame(id: string, content: Content, flags?: Partial<FrameFlags>): Frame {
    return { id, content, flags: { ...defaultFrameFlags(), ...flags } };
}

/*
 **  Officially available types of the picture frame
 */
export const PictureTypes = [
    'other',
    'file icon',
    'other file icon',
    'front cover',
    'back cover',
    'leaflet page',
    'media',
    'lead artist',
    'artist',
    'conductor',
    'band',
    'composer',
    'lyricist',
    'recording location',
    'during recording',
    'during performance',
    'video screen capture',
    'a bright coloured fish',
    'illustration',
    'band logotype',
    'publisher logotype',
] as const;

export function pictureTypeName(pictureType: number): string | undefined {
    return PictureTypes[pictureType];
}

export function majorVersionOf(version: TagVersion): number {
    switch (version) {
        case TagVersion.v22:
            return 2;
        case TagVersion.v23:
            return 3;
        case TagVersion.v24:
            return 4;
    }
}

export function versionFromMajor(major: number): TagVersion | undefined {
    switch (major) {
        case 2:
            return TagVersion.v22;
        case 3:
            return TagVersion.v23;
        case 4:
            return TagVersion.v24;
        default:
            return undefined;
    }
}
