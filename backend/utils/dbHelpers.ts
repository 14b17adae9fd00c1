import type { BoundingBox, BoxUnit } from '../core/types';

export const placeholders = (count: number) => new Array(count).fill('?').join(',');

export const encodeVector = (vector: number[]): Buffer => Buffer.from(new Float32Array(vector).buffer);

// Copies first: a Buffer slice is not guaranteed to sit on a 4-byte boundary.
export const decodeVector = (blob: Buffer): number[] =>
    Array.from(new Float32Array(blob.buffer.slice(blob.byteOffset, blob.byteOffset + blob.byteLength)));

export interface BoxColumns {
    box_x: number;
    box_y: number;
    box_width: number;
    box_height: number;
    box_unit: string;
}

export const toBoxColumns = (box: BoundingBox): BoxColumns => ({
    box_x: box.x,
    box_y: box.y,
    box_width: box.width,
    box_height: box.height,
    box_unit: box.unit
});

export const fromBoxColumns = (row: BoxColumns): BoundingBox => ({
    x: row.box_x,
    y: row.box_y,
    width: row.box_width,
    height: row.box_height,
    unit: toBoxUnit(row.box_unit)
});

function toBoxUnit(value: string): BoxUnit {
    return value === 'normalized' ? 'normalized' : 'pixel';
}

export const nowIso = () => new Date().toISOString();
