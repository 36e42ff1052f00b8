import { TagVersion } from './frame-classes';

/*
**  Inserts a zero byte after each 0xFF that could start a false MPEG sync.
**  ID3v2.2/2.3 also protect a trailing 0xFF, because the tag is unsynchronised
**  as one block; ID3v2.4 applies the scheme per frame and leaves it alone.
*/
export function applyUnsynchronisation(data: Buffer, version: TagVersion): Buffer {
    const out: number[] = [];
    for (let i = 0; i < data.length; i++) {
        out.push(data[i]);
        if (data[i] !== 0xFF) {
            continue;
        }
        if (i + 1 === data.length) {
            if (version !== TagVersion.v24) {
                out.push(0x00);
            }
        } else if (data[i + 1] >= 0xE0 || data[i + 1] === 0x00) {
            out.push(0x00);
        }
    }
    return Buffer.from(out);
}

/*
**  Replaces every 0xFF 0x00 pair with 0xFF
*/
export function removeUnsynchronisation(data: Buffer): Buffer {
    const out = Buffer.alloc(data.length);
    let length = 0;
    for (let i = 0; i < data.length; i++) {
        out[length++] = data[i];
        if (data[i] === 0xFF && data[i + 1] === 0x00) {
            i++;
        }
    }
    return out.subarray(0, length);
}
