import assert from 'node:assert/strict';
import { test } from 'node:test';
import { createFrame, Encoding, TagVersion } from '../../frame-classes';
import { Id3Error, isId3Error, noTagOk, partialTagOk } from '../../errors';
import { convertDateFrames, decodeTag, encodeTag, getTagRegionLength, parseTagHeader } from '../../tag-codec';
import { Tag } from '../../tag';
import { applyUnsynchronisation } from '../../unsynchronisation';
import { latin1Text, tagBuffer, v22Frame, v23Frame, v24Frame } from '../fixtures/id3-fixtures';
import { expectDefined } from '../helpers/expect-defined';
import { kind } from '../helpers/error-kind';

const header = (...bytes: number[]): Buffer => Buffer.concat([Buffer.from('ID3', 'latin1'), Buffer.from(bytes)]);

void test('parseTagHeader reads version, flags and size', () => {
    const parsed = parseTagHeader(header(0x04, 0x00, 0x90, 0x00, 0x00, 0x02, 0x01));
    assert.strictEqual(parsed.version, TagVersion.v24);
    assert.ok(parsed.flags.unsynchronisation);
    assert.ok(parsed.flags.footer);
    assert.strictEqual(parsed.size, 257);
    assert.strictEqual(getTagRegionLength(parsed), 277);
});

void test('parseTagHeader classifies unreadable headers', () => {
    assert.throws(() => parseTagHeader(Buffer.from('TAG0000000', 'latin1')), kind('NoTag'));
    assert.throws(() => parseTagHeader(header(0x05, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00)), kind('UnsupportedVersion'));
    assert.throws(() => parseTagHeader(header(0x03, 0xFF, 0x00, 0x00, 0x00, 0x00, 0x00)), kind('UnsupportedVersion'));
    assert.throws(() => parseTagHeader(header(0x03, 0x00, 0x00, 0x00, 0x00, 0x80, 0x00)), kind('Parsing'));
});

void test('decodeTag reads the frames of an ID3v2.3 tag and ignores padding', () => {
    const tag = decodeTag(tagBuffer(3, [v23Frame('TIT2', latin1Text('Song')), v23Frame('TPE1', latin1Text('Artist'))], 0, 10));
    assert.strictEqual(tag.version, TagVersion.v23);
    assert.strictEqual(tag.title(), 'Song');
    assert.strictEqual(tag.artist(), 'Artist');
    assert.strictEqual(tag.frames().length, 2);
});

void test('decodeTag reports skipped frames together with the partial tag', () => {
    const encrypted = v23Frame('TALB', Buffer.concat([Buffer.from([0x80]), latin1Text('Secret')]), 0, 0x40);
    const data = tagBuffer(3, [v23Frame('TIT2', latin1Text('Song')), encrypted]);
    let caught: unknown;
    try {
        decodeTag(data);
    } catch (err) {
        caught = err;
    }
    assert.ok(isId3Error(caught, 'UnsupportedFeature'));
    assert.ok(caught instanceof Id3Error);
    assert.strictEqual(expectDefined(caught.partialTag).title(), 'Song');

    const partial = decodeTag(data, { partialTagOk: true });
    assert.strictEqual(partial.title(), 'Song');
    assert.strictEqual(partial.skipped.length, 1);
    assert.strictEqual(partial.skipped[0].id, 'TALB');
    assert.strictEqual(partialTagOk(() => decodeTag(data)).title(), 'Song');
});

void test('noTagOk turns a missing tag into undefined and passes other errors on', () => {
    assert.strictEqual(noTagOk(() => decodeTag(Buffer.from('not a tag', 'latin1'))), undefined);
    assert.throws(() => noTagOk(() => decodeTag(header(9, 0, 0, 0, 0, 0, 0))), kind('UnsupportedVersion'));
});

void test('decodeTag undoes whole tag unsynchronisation before ID3v2.4', () => {
    const frame = v23Frame('TIT2', latin1Text('aÿà'));
    const tag = decodeTag(tagBuffer(3, [applyUnsynchronisation(frame, TagVersion.v23)], 0x80));
    assert.strictEqual(tag.title(), 'aÿà');
});

void test('decodeTag keeps extended headers opaque', () => {
    const v23Extended = Buffer.from([0x00, 0x00, 0x00, 0x06, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00]);
    const v23 = decodeTag(tagBuffer(3, [v23Extended, v23Frame('TIT2', latin1Text('Song'))], 0x40));
    assert.deepStrictEqual(v23.extendedHeader, v23Extended);
    assert.strictEqual(v23.title(), 'Song');

    const v24Extended = Buffer.from([0x00, 0x00, 0x00, 0x06, 0x01, 0x00]);
    const v24 = decodeTag(tagBuffer(4, [v24Extended, v24Frame('TIT2', latin1Text('Song'))], 0x40));
    assert.deepStrictEqual(v24.extendedHeader, v24Extended);
    assert.strictEqual(v24.title(), 'Song');
});

void test('decodeTag rejects truncated tags and ID3v2.2 compression', () => {
    const complete = tagBuffer(3, [v23Frame('TIT2', latin1Text('Song'))]);
    assert.throws(() => decodeTag(complete.subarray(0, complete.length - 1)), kind('Parsing'));
    assert.throws(() => decodeTag(tagBuffer(2, [], 0x40)), kind('UnsupportedFeature'));
});

void test('encodeTag writes header and frames', () => {
    const tag = new Tag();
    tag.setTitle('Song');
    assert.deepStrictEqual([...encodeTag(tag, { version: TagVersion.v24, encoding: Encoding.Latin1 })], [
        0x49, 0x44, 0x33, 0x04, 0x00, 0x00, 0x00, 0x00, 0x00, 0x0F,
        0x54, 0x49, 0x54, 0x32, 0x00, 0x00, 0x00, 0x05, 0x00, 0x00,
        0x00, 0x53, 0x6F, 0x6E, 0x67,
    ]);
});

void test('encodeTag counts padding in the header size', () => {
    const tag = new Tag();
    tag.setTitle('Song');
    const data = encodeTag(tag, { version: TagVersion.v24, encoding: Encoding.Latin1, padding: 100 });
    assert.strictEqual(data.length, 125);
    assert.strictEqual(parseTagHeader(data).size, 115);
    assert.ok(data.subarray(25).every(byte => byte === 0x00));
    assert.throws(() => encodeTag(tag, { version: TagVersion.v24, padding: -1 }), kind('InvalidInput'));
});

void test('encodeTag appends a footer to ID3v2.4 tags only', () => {
    const tag = new Tag();
    tag.setTitle('Song');
    const data = encodeTag(tag, { version: TagVersion.v24, encoding: Encoding.Latin1, footer: true, padding: 50 });
    assert.strictEqual(data.length, 35);
    assert.strictEqual(data.toString('latin1', 25, 28), '3DI');
    assert.strictEqual(data[5], 0x10);
    assert.deepStrictEqual(data.subarray(28), data.subarray(3, 10));
    assert.strictEqual(decodeTag(data).title(), 'Song');
    assert.throws(() => encodeTag(tag, { version: TagVersion.v23, footer: true }), kind('InvalidInput'));
});

void test('encodeTag refuses ID3v2.2 compression', () => {
    assert.throws(() => encodeTag(new Tag(), { version: TagVersion.v22, compression: true }), kind('UnsupportedFeature'));
});

void test('unsynchronised ID3v2.3 tags survive an encode and decode', () => {
    const tag = new Tag(TagVersion.v23);
    tag.setTitle('aÿà');
    const data = encodeTag(tag, { version: TagVersion.v23, encoding: Encoding.Latin1, unsynchronisation: true });
    assert.strictEqual(data[5], 0x80);
    assert.strictEqual(decodeTag(data).title(), 'aÿà');
});

void test('an ID3v2.2 tag is written back byte for byte', () => {
    const original = tagBuffer(2, [v22Frame('TT2', latin1Text('Song')), v22Frame('TP1', latin1Text('Band'))]);
    const tag = decodeTag(original);
    assert.strictEqual(expectDefined(tag.get('TIT2')).id, 'TIT2');
    assert.strictEqual(tag.artist(), 'Band');
    assert.deepStrictEqual(encodeTag(tag, { version: TagVersion.v22 }), original);
});

void test('convertDateFrames merges the ID3v2.3 date frames into TDRC', () => {
    const frames = [
        createFrame('TIT2', { type: 'text', values: ['Song'] }),
        createFrame('TYER', { type: 'text', values: ['2003'] }),
        createFrame('TDAT', { type: 'text', values: ['1407'] }),
        createFrame('TORY', { type: 'text', values: ['1999'] }),
    ];
    assert.deepStrictEqual(convertDateFrames(frames, TagVersion.v24), [
        frames[0],
        createFrame('TDRC', { type: 'timestamp', timestamp: { year: 2003, month: 7, day: 14 } }),
        createFrame('TDOR', { type: 'timestamp', timestamp: { year: 1999 } }),
    ]);
});

void test('convertDateFrames splits TDRC for older versions', () => {
    const frames = [createFrame('TDRC', { type: 'timestamp', timestamp: { year: 2003, month: 7, day: 14, hour: 9, minute: 5 } })];
    assert.deepStrictEqual(convertDateFrames(frames, TagVersion.v23).map(frame => [frame.id, frame.content]), [
        ['TYER', { type: 'text', values: ['2003'] }],
        ['TDAT', { type: 'text', values: ['1407'] }],
        ['TIME', { type: 'text', values: ['0905'] }],
    ]);
    const release = [createFrame('TDRL', { type: 'timestamp', timestamp: { year: 2003 } })];
    assert.throws(() => convertDateFrames(release, TagVersion.v23), kind('UnsupportedFeature'));
});

void test('dates survive a round trip through ID3v2.3', () => {
    const tag = new Tag();
    tag.setDate({ year: 2003, month: 7, day: 14, hour: 9, minute: 5 });
    const v23 = decodeTag(encodeTag(tag, { version: TagVersion.v23 }));
    assert.strictEqual(v23.text('TYER'), '2003');
    assert.strictEqual(v23.text('TDAT'), '1407');
    assert.strictEqual(v23.text('TIME'), '0905');
    const v24 = decodeTag(encodeTag(v23, { version: TagVersion.v24 }));
    assert.deepStrictEqual(v24.date(), { year: 2003, month: 7, day: 14, hour: 9, minute: 5 });
    assert.strictEqual(v24.get('TYER'), undefined);
});
