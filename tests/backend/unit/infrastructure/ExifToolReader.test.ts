/**
 * ExifToolReader Unit Tests
 *
 * Only the tag flattening is exercised; no exiftool process is started.
 */

import { describe, it, expect } from 'vitest';
import { ExifDateTime, type Tags } from 'exiftool-vendored';
import { toExifInput } from '../../../../backend/infrastructure/ExifToolReader';
import { normalizeExif } from '../../../../backend/core/services/ExifNormalizer';

describe('toExifInput', () => {
    it('should keep plain values as they are', () => {
        const tags: Tags = { Make: 'Canon', Model: 'EOS R5', ISO: 400, FNumber: 2.8, ExposureTime: '1/200' };

        expect(toExifInput(tags)).toEqual({ Make: 'Canon', Model: 'EOS R5', ISO: 400, FNumber: 2.8, ExposureTime: '1/200' });
    });

    it('should turn date objects into text the normalizer understands', () => {
        const taken = ExifDateTime.fromEXIF('2023:06:15 14:30:00');
        const tags: Tags = { Make: 'Canon', DateTimeOriginal: taken };

        const input = toExifInput(tags);

        expect(typeof input.DateTimeOriginal).toBe('string');
        expect(normalizeExif(input)?.captured_at).toBe('2023-06-15T14:30:00');
    });
});
