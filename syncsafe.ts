import { Id3Error } from './errors';

export const SYNCSAFE_MAX = 0x0FFFFFFF;

/*
**  This function ensures that the msb of each byte is 0
**  totalSize => int (28 significant bits)
*/
export function encodeSize(totalSize: number): Buffer {
    if (!Number.isInteger(totalSize) || totalSize < 0 || totalSize > SYNCSAFE_MAX) {
        throw new Id3Error('InvalidInput', `Size ${totalSize} does not fit a syncsafe integer`);
    }
    const byte3 = totalSize & 0x7F;
    const byte2 = (totalSize >> 7) & 0x7F;
    const byte1 = (totalSize >> 14) & 0x7F;
    const byte0 = (totalSize >> 21) & 0x7F;
    return Buffer.from([byte0, byte1, byte2, byte3]);
}

/*
**  This function decodes the 7-bit size structure
*/
export function decodeSize(buffer: Buffer, offset = 0): number {
    if (offset + 4 > buffer.length) {
        throw new Id3Error('Parsing', 'Truncated syncsafe integer');
    }
    const hSize = buffer.subarray(offset, offset + 4);
    if ((hSize[0] | hSize[1] | hSize[2] | hSize[3]) & 0x80) {
        throw new Id3Error('Parsing', 'Invalid syncsafe integer (msb not 0)');
    }
    return (hSize[0] << 21) + (hSize[1] << 14) + (hSize[2] << 7) + hSize[3];
}

export function writeSize(size: number, target: Buffer, offset: number): void {
    encodeSize(size).copy(target, offset);
}
