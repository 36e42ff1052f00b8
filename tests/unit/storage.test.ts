import assert from 'node:assert/strict';
import * as fs from 'fs';
import { test } from 'node:test';
import { TagVersion } from '../../frame-classes';
import { BufferStorage, hasTag, locateTag, readTag, removeTag, withFileStorage, writeTag } from '../../storage';
import { encodeTag } from '../../tag-codec';
import { Tag } from '../../tag';
import { expectDefined } from '../helpers/expect-defined';
import { kind } from '../helpers/error-kind';
import { withTempFile } from '../helpers/temp-file';

const options = { version: TagVersion.v24 };
const audio = Buffer.from(Array.from({ length: 1000 }, (_, i) => (i % 251) + 1));

const tagWithTitle = (title: string): Tag => {
    const tag = new Tag();
    tag.setTitle(title);
    return tag;
};

class RecordingStorage extends BufferStorage {
    public writes: Array<[number, number]> = [];

    public write(buffer: Buffer, position: number): void {
        this.writes.push([position, buffer.length]);
        super.write(buffer, position);
    }
}

class ReadRecordingStorage extends BufferStorage {
    public reads: number[] = [];

    public read(buffer: Buffer, position: number): number {
        this.reads.push(buffer.length);
        return super.read(buffer, position);
    }
}

void test('BufferStorage grows with zero bytes and reads short at the end', () => {
    const storage = new BufferStorage(Buffer.from([0x01, 0x02]));
    storage.truncate(4);
    assert.deepStrictEqual([...storage.toBuffer()], [0x01, 0x02, 0x00, 0x00]);
    storage.write(Buffer.from([0x09]), 6);
    assert.deepStrictEqual([...storage.toBuffer()], [0x01, 0x02, 0x00, 0x00, 0x00, 0x00, 0x09]);
    const target = Buffer.alloc(4);
    assert.strictEqual(storage.read(target, 5), 2);
    assert.strictEqual(storage.read(target, 7), 0);
    storage.truncate(1);
    assert.deepStrictEqual([...storage.toBuffer()], [0x01]);
});

void test('a smaller tag is written in place and the rest of the old region is zeroed', () => {
    const original = Buffer.concat([encodeTag(tagWithTitle('x'.repeat(100)), { ...options, padding: 200 }), audio]);
    const oldTagEnd = original.length - audio.length;
    const storage = new BufferStorage(original);
    const smaller = tagWithTitle('Short');
    writeTag(storage, smaller, options);

    const result = storage.toBuffer();
    const encoded = encodeTag(smaller, options);
    assert.strictEqual(result.length, original.length);
    assert.deepStrictEqual(result.subarray(0, encoded.length), encoded);
    assert.ok(result.subarray(encoded.length, oldTagEnd).every(byte => byte === 0x00));
    assert.deepStrictEqual(result.subarray(oldTagEnd), audio);
    assert.strictEqual(readTag(storage).title(), 'Short');
    assert.strictEqual(expectDefined(locateTag(storage)).end, oldTagEnd);
});

void test('removeTag also cuts the zero bytes a shrunk tag left behind', () => {
    const original = Buffer.concat([encodeTag(tagWithTitle('x'.repeat(100)), options), audio]);
    const storage = new BufferStorage(original);
    writeTag(storage, tagWithTitle('Short'), options);
    assert.ok(removeTag(storage));
    assert.deepStrictEqual(storage.toBuffer(), audio);
});

void test('locating the zero run after a shrunk tag reads in the requested block size', () => {
    const original = Buffer.concat([encodeTag(tagWithTitle('x'.repeat(100)), { ...options, padding: 200 }), audio]);
    const storage = new ReadRecordingStorage(original);
    writeTag(storage, tagWithTitle('Short'), { ...options, chunkSize: 16 });
    assert.ok(removeTag(storage, { chunkSize: 16 }));
    assert.deepStrictEqual(storage.toBuffer(), audio);
    assert.ok(storage.reads.length > 0);
    assert.ok(storage.reads.every(length => length <= 16));
});

void test('zero bytes at the start of the audio data are taken as part of the tag region', () => {
    const tag = encodeTag(tagWithTitle('Song'), options);
    const storage = new BufferStorage(Buffer.concat([tag, Buffer.from([0, 0, 0, 0, 1, 2, 3])]));
    assert.strictEqual(expectDefined(locateTag(storage)).end, tag.length + 4);
    assert.ok(removeTag(storage));
    assert.deepStrictEqual([...storage.toBuffer()], [1, 2, 3]);
});

void test('a tag of the same size overwrites the old one exactly', () => {
    const original = Buffer.concat([encodeTag(tagWithTitle('Equal'), options), audio]);
    const storage = new BufferStorage(original);
    writeTag(storage, tagWithTitle('Other'), options);
    const result = storage.toBuffer();
    assert.strictEqual(result.length, original.length);
    assert.deepStrictEqual(result.subarray(original.length - audio.length), audio);
    assert.strictEqual(readTag(storage).title(), 'Other');
});

void test('a larger tag moves the audio data by the growth', () => {
    const original = Buffer.concat([encodeTag(tagWithTitle('Short'), options), audio]);
    const oldTagEnd = original.length - audio.length;
    const larger = tagWithTitle('A considerably longer title than before');
    const storage = new BufferStorage(original);
    writeTag(storage, larger, { ...options, chunkSize: 7 });

    const result = storage.toBuffer();
    const encoded = encodeTag(larger, options);
    assert.strictEqual(result.length, original.length + encoded.length - oldTagEnd);
    assert.deepStrictEqual(result.subarray(0, encoded.length), encoded);
    assert.deepStrictEqual(result.subarray(encoded.length), audio);
});

void test('audio data moves correctly when the growth is smaller than a block', () => {
    const original = Buffer.concat([encodeTag(tagWithTitle('Short'), options), audio]);
    const storage = new BufferStorage(original);
    const larger = tagWithTitle('Shorter');
    writeTag(storage, larger, { ...options, chunkSize: 64 });
    const encoded = encodeTag(larger, options);
    assert.strictEqual(encoded.length, original.length - audio.length + 2);
    assert.deepStrictEqual(storage.toBuffer().subarray(encoded.length), audio);
});

void test('the header is the last thing written when the tag grows', () => {
    const storage = new RecordingStorage(Buffer.concat([encodeTag(tagWithTitle('Short'), options), audio]));
    storage.writes = [];
    writeTag(storage, tagWithTitle('A considerably longer title'), { ...options, chunkSize: 100 });
    assert.deepStrictEqual(storage.writes[storage.writes.length - 1], [0, 10]);
    assert.strictEqual(storage.writes[storage.writes.length - 2][0], 10);
});

void test('a tag is prepended to data without one', () => {
    const storage = new BufferStorage(audio);
    const tag = tagWithTitle('New');
    writeTag(storage, tag, options);
    assert.deepStrictEqual(storage.toBuffer(), Buffer.concat([encodeTag(tag, options), audio]));

    const empty = new BufferStorage();
    writeTag(empty, tag, options);
    assert.deepStrictEqual(empty.toBuffer(), encodeTag(tag, options));
});

void test('removeTag cuts out the region including a footer', () => {
    const storage = new BufferStorage(Buffer.concat([encodeTag(tagWithTitle('Gone'), { ...options, footer: true }), audio]));
    assert.ok(removeTag(storage, { chunkSize: 5 }));
    assert.deepStrictEqual(storage.toBuffer(), audio);
    assert.ok(!removeTag(storage));
    assert.deepStrictEqual(storage.toBuffer(), audio);
});

void test('reading data without a tag reports NoTag', () => {
    const storage = new BufferStorage(audio);
    assert.ok(!hasTag(storage));
    assert.strictEqual(locateTag(storage), undefined);
    assert.throws(() => readTag(storage), kind('NoTag'));
    assert.throws(() => readTag(new BufferStorage(Buffer.from('ID3', 'latin1'))), kind('NoTag'));
});

void test('a tag of an unknown major version is never overwritten', () => {
    const data = Buffer.concat([Buffer.from('ID3', 'latin1'), Buffer.from([0x05, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00]), audio]);
    const storage = new BufferStorage(data);
    assert.ok(hasTag(storage));
    assert.throws(() => readTag(storage), kind('UnsupportedVersion'));
    assert.throws(() => writeTag(storage, tagWithTitle('x'), options), kind('UnsupportedVersion'));
    assert.throws(() => removeTag(storage), kind('UnsupportedVersion'));
    assert.deepStrictEqual(storage.toBuffer(), data);
});

void test('a tag region running past the end of the data is a parse error', () => {
    const data = Buffer.concat([Buffer.from('ID3', 'latin1'), Buffer.from([0x04, 0x00, 0x00, 0x00, 0x00, 0x01, 0x00]), Buffer.alloc(20)]);
    const location = expectDefined(locateTag(new BufferStorage(data)));
    assert.strictEqual(location.declaredEnd, 138);
    assert.strictEqual(location.end, 138);
    assert.throws(() => readTag(new BufferStorage(data)), kind('Parsing'));
});

void test('writeTag rejects an invalid block size', () => {
    assert.throws(() => writeTag(new BufferStorage(audio), tagWithTitle('x'), { ...options, chunkSize: 0 }), kind('InvalidInput'));
});

void test('files are spliced in place', () => {
    withTempFile(Buffer.concat([encodeTag(tagWithTitle('Short'), options), audio]), filePath => {
        const larger = tagWithTitle('A considerably longer title than before');
        withFileStorage(filePath, true, storage => writeTag(storage, larger, { ...options, chunkSize: 16 }));
        const encoded = encodeTag(larger, options);
        const contents = fs.readFileSync(filePath);
        assert.deepStrictEqual(contents, Buffer.concat([encoded, audio]));
        assert.strictEqual(withFileStorage(filePath, false, storage => readTag(storage)).title(), larger.title());

        withFileStorage(filePath, true, storage => removeTag(storage, { chunkSize: 16 }));
        assert.deepStrictEqual(fs.readFileSync(filePath), audio);
    });
});

void test('opening a missing file reports an Io error', () => {
    assert.throws(() => withFileStorage('/nonexistent/id3-tagkit/audio.mp3', false, storage => storage.size()), kind('Io'));
});
