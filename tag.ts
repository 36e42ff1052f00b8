import {
    CommentContent,
    Content,
    createFrame,
    Frame,
    PictureContent,
    TagVersion,
    Timestamp,
} from './frame-classes';
import { contentShapeOf, resolveFrameId } from './frame-definitions';
import { Id3Error } from './errors';
import type { SkippedFrame } from './frame-codec';
import { resolveGenre } from './genres';
import { parseTimestamp } from './timestamp';

/*
**  Frames sharing a key cannot coexist; frames without a key may repeat
*/
export function frameKey(frame: Frame): string | undefined {
    const content = frame.content;
    switch (content.type) {
        case 'text':
        case 'link':
        case 'timestamp':
            return frame.id;
        case 'extendedText':
        case 'extendedLink':
            return `${frame.id}:${content.description}`;
        case 'comment':
            return `${frame.id}:${content.language}:${content.description}`;
        case 'picture':
            return `${frame.id}:${content.pictureType}`;
        case 'popularimeter':
            return `${frame.id}:${content.email}`;
        case 'chapter':
            return `${frame.id}:${content.elementId}`;
        case 'unknown':
            return undefined;
    }
}

export class Tag {
    public version: TagVersion;

    /*
    **  Frames dropped while reading under the partial-tag policy
    */
    public skipped: SkippedFrame[] = [];

    /*
    **  Extended header as read, kept opaque and not written back
    */
    public extendedHeader?: Buffer;

    private frameList: Frame[] = [];

    constructor(version: TagVersion = TagVersion.v24) {
        this.version = version;
    }

    public frames(): Frame[] {
        return [...this.frameList];
    }

    public get(idOrAlias: string): Frame | undefined {
        const id = resolveFrameId(idOrAlias);
        return this.frameList.find(frame => frame.id === id);
    }

    public getAll(idOrAlias: string): Frame[] {
        const id = resolveFrameId(idOrAlias);
        return this.frameList.filter(frame => frame.id === id);
    }

    /**
     * Adds a frame, replacing in place the frame it may not coexist with.
     *
     * @returns the replaced frame, if any
     */
    public add(frame: Frame): Frame | undefined {
        const key = frameKey(frame);
        if (key !== undefined) {
            const index = this.frameList.findIndex(existing => frameKey(existing) === key);
            if (index !== -1) {
                const replaced = this.frameList[index];
                this.frameList[index] = frame;
                return replaced;
            }
        }
        this.frameList.push(frame);
        return undefined;
    }

    public remove(idOrAlias: string): Frame[] {
        const id = resolveFrameId(idOrAlias);
        const removed = this.frameList.filter(frame => frame.id === id);
        this.frameList = this.frameList.filter(frame => frame.id !== id);
        return removed;
    }

    public removeWhere(predicate: (frame: Frame) => boolean): Frame[] {
        const removed = this.frameList.filter(predicate);
        this.frameList = this.frameList.filter(frame => !predicate(frame));
        return removed;
    }

    public isEmpty(): boolean {
        return this.frameList.length === 0;
    }

    public textValues(idOrAlias: string): string[] | undefined {
        const content = this.get(idOrAlias)?.content;
        if (content?.type === 'text') {
            return [...content.values];
        }
        return undefined;
    }

    public text(idOrAlias: string): string | undefined {
        return this.textValues(idOrAlias)?.[0];
    }

    /*
    **  Sets a text or timestamp frame from its string form
    */
    public setText(idOrAlias: string, value: string | string[]): void {
        const id = resolveFrameId(idOrAlias);
        const values = Array.isArray(value) ? value : [value];
        let content: Content;
        switch (contentShapeOf(id)) {
            case 'text':
                content = { type: 'text', values };
                break;
            case 'timestamp':
                content = { type: 'timestamp', timestamp: parseTimestamp(values[0] ?? '') };
                break;
            default:
                throw new Id3Error('InvalidInput', `${id} is not a text frame`);
        }
        this.add(createFrame(id, content));
    }

    public title(): string | undefined {
        return this.text('TIT2');
    }

    public setTitle(title: string): void {
        this.setText('TIT2', title);
    }

    public artist(): string | undefined {
        return this.text('TPE1');
    }

    public setArtist(artist: string): void {
        this.setText('TPE1', artist);
    }

    public album(): string | undefined {
        return this.text('TALB');
    }

    public setAlbum(album: string): void {
        this.setText('TALB', album);
    }

    public albumArtist(): string | undefined {
        return this.text('TPE2');
    }

    public setAlbumArtist(albumArtist: string): void {
        this.setText('TPE2', albumArtist);
    }

    /*
    **  Genre with numeric references resolved to their names
    */
    public genre(): string | undefined {
        const raw = this.text('TCON');
        return raw === undefined ? undefined : resolveGenre(raw);
    }

    public setGenre(genre: string): void {
        this.setText('TCON', genre);
    }

    public date(): Timestamp | undefined {
        const content = this.get('TDRC')?.content;
        return content?.type === 'timestamp' ? { ...content.timestamp } : undefined;
    }

    public setDate(timestamp: Timestamp): void {
        this.add(createFrame('TDRC', { type: 'timestamp', timestamp }));
    }

    public year(): number | undefined {
        const date = this.date();
        if (date) {
            return date.year;
        }
        const year = this.text('TYER');
        return year !== undefined && /^\d+$/.test(year) ? Number(year) : undefined;
    }

    public setYear(year: number): void {
        if (this.version === TagVersion.v24) {
            this.setDate({ year });
        } else {
            this.setText('TYER', String(year));
        }
    }

    public trackNumber(): number | undefined {
        return this.parseNumberPair('TRCK');
    }

    public setTrackNumber(track: number, total?: number): void {
        this.setText('TRCK', total === undefined ? String(track) : `${track}/${total}`);
    }

    public discNumber(): number | undefined {
        return this.parseNumberPair('TPOS');
    }

    public comments(): CommentContent[] {
        return this.contentsOf('COMM', 'comment');
    }

    public addComment(comment: Omit<CommentContent, 'type'>): void {
        this.add(createFrame('COMM', { type: 'comment', ...comment }));
    }

    public lyrics(): CommentContent[] {
        return this.contentsOf('USLT', 'comment');
    }

    public addLyrics(lyrics: Omit<CommentContent, 'type'>): void {
        this.add(createFrame('USLT', { type: 'comment', ...lyrics }));
    }

    public pictures(): PictureContent[] {
        return this.contentsOf('APIC', 'picture');
    }

    public addPicture(picture: Omit<PictureContent, 'type'>): void {
        this.add(createFrame('APIC', { type: 'picture', ...picture }));
    }

    public removePicture(pictureType: number): void {
        this.removeWhere(frame => frame.content.type === 'picture' && frame.content.pictureType === pictureType);
    }

    private contentsOf<T extends Content['type']>(id: string, type: T): Extract<Content, { type: T }>[] {
        const contents: Extract<Content, { type: T }>[] = [];
        this.getAll(id).forEach(frame => {
            if (isContentOf(frame.content, type)) {
                contents.push(frame.content);
            }
        });
        return contents;
    }

    private parseNumberPair(id: string): number | undefined {
        const value = this.text(id);
        if (value === undefined) {
            return undefined;
        }
        const number = parseInt(value.split('/')[0], 10);
        return isNaN(number) ? undefined : number;
    }
}

function isContentOf<T extends Content['type']>(content: Content, type: T): content is Extract<Content, { type: T }> {
    return content.type === type;
}
