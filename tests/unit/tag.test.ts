import assert from 'node:assert/strict';
import { test } from 'node:test';
import { createFrame, TagVersion } from '../../frame-classes';
import { frameKey, Tag } from '../../tag';
import { expectDefined } from '../helpers/expect-defined';
import { kind } from '../helpers/error-kind';

void test('add replaces a conflicting frame where it stands', () => {
    const tag = new Tag();
    tag.setTitle('First');
    tag.setArtist('Band');
    const replaced = tag.add(createFrame('TIT2', { type: 'text', values: ['Second'] }));
    assert.deepStrictEqual(expectDefined(replaced).content, { type: 'text', values: ['First'] });
    assert.deepStrictEqual(tag.frames().map(frame => tag.text(frame.id)), ['Second', 'Band']);
});

void test('frames with distinct descriptors coexist', () => {
    const tag = new Tag();
    tag.addComment({ language: 'eng', description: '', text: 'one' });
    tag.addComment({ language: 'eng', description: 'notes', text: 'two' });
    tag.addComment({ language: 'deu', description: '', text: 'drei' });
    tag.addComment({ language: 'eng', description: '', text: 'four' });
    assert.deepStrictEqual(tag.comments().map(comment => comment.text), ['four', 'two', 'drei']);

    tag.add(createFrame('TXXX', { type: 'extendedText', description: 'a', value: '1' }));
    tag.add(createFrame('TXXX', { type: 'extendedText', description: 'b', value: '2' }));
    assert.strictEqual(tag.getAll('TXXX').length, 2);
});

void test('frames without a key may repeat', () => {
    const tag = new Tag();
    const priv = createFrame('PRIV', { type: 'unknown', data: Buffer.from([0x01]) });
    assert.strictEqual(frameKey(priv), undefined);
    tag.add(priv);
    tag.add(createFrame('PRIV', { type: 'unknown', data: Buffer.from([0x02]) }));
    assert.strictEqual(tag.getAll('PRIV').length, 2);
});

void test('remove takes every frame with the identifier', () => {
    const tag = new Tag();
    tag.setTitle('Song');
    tag.addComment({ language: 'eng', description: 'a', text: 'x' });
    tag.addComment({ language: 'eng', description: 'b', text: 'y' });
    assert.strictEqual(tag.remove('COMM').length, 2);
    assert.deepStrictEqual(tag.frames().map(frame => frame.id), ['TIT2']);
    assert.strictEqual(tag.remove('title').length, 1);
    assert.ok(tag.isEmpty());
});

void test('setText resolves aliases and parses timestamp frames', () => {
    const tag = new Tag();
    tag.setText('albumArtist', 'Various');
    tag.setText('date', '2003-07-14');
    tag.setText('TPE1', ['A', 'B']);
    assert.strictEqual(tag.albumArtist(), 'Various');
    assert.deepStrictEqual(tag.date(), { year: 2003, month: 7, day: 14 });
    assert.deepStrictEqual(tag.textValues('artist'), ['A', 'B']);
    assert.throws(() => tag.setText('COMM', 'x'), kind('InvalidInput'));
    assert.throws(() => tag.setText('date', 'soon'), kind('Parsing'));
});

void test('textValues returns a copy', () => {
    const tag = new Tag();
    tag.setText('TPE1', ['A', 'B']);
    expectDefined(tag.textValues('TPE1')).push('C');
    assert.deepStrictEqual(tag.textValues('TPE1'), ['A', 'B']);
});

void test('genre resolves numeric references', () => {
    const tag = new Tag();
    tag.setGenre('(31)');
    assert.strictEqual(tag.genre(), 'Trance');
    assert.strictEqual(tag.text('TCON'), '(31)');
});

void test('year uses the date frame of the tag version', () => {
    const v24 = new Tag(TagVersion.v24);
    v24.setYear(2003);
    assert.deepStrictEqual(v24.date(), { year: 2003 });
    assert.strictEqual(v24.year(), 2003);

    const v23 = new Tag(TagVersion.v23);
    v23.setYear(1999);
    assert.strictEqual(v23.text('TYER'), '1999');
    assert.strictEqual(v23.year(), 1999);
});

void test('track and disc numbers read the part before the slash', () => {
    const tag = new Tag();
    tag.setTrackNumber(3, 12);
    tag.setText('discNumber', '1/2');
    assert.strictEqual(tag.text('TRCK'), '3/12');
    assert.strictEqual(tag.trackNumber(), 3);
    assert.strictEqual(tag.discNumber(), 1);
    tag.setText('TRCK', 'side A');
    assert.strictEqual(tag.trackNumber(), undefined);
});

void test('pictures are keyed by picture type', () => {
    const tag = new Tag();
    tag.addPicture({ mimeType: 'image/png', pictureType: 3, description: '', data: Buffer.from([0x01]) });
    tag.addPicture({ mimeType: 'image/png', pictureType: 4, description: '', data: Buffer.from([0x02]) });
    tag.addPicture({ mimeType: 'image/jpeg', pictureType: 3, description: '', data: Buffer.from([0x03]) });
    assert.deepStrictEqual(tag.pictures().map(picture => picture.mimeType), ['image/jpeg', 'image/png']);
    tag.removePicture(3);
    assert.deepStrictEqual(tag.pictures().map(picture => picture.pictureType), [4]);
});

void test('lyrics are kept apart from comments', () => {
    const tag = new Tag();
    tag.addLyrics({ language: 'eng', description: '', text: 'la la' });
    assert.deepStrictEqual(tag.comments(), []);
    assert.deepStrictEqual(tag.lyrics(), [{ type: 'comment', language: 'eng', description: '', text: 'la la' }]);
});
