import type { ExifAttributes, ExifInput } from '../types';
import logger from '../../logger';

const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toText(value: unknown): string | null {
    if (typeof value === 'string') {
        const trimmed = value.replace(/\0/g, '').trim();
        return trimmed.length > 0 ? trimmed : null;
    }
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return null;
}

/**
 * Accepts numbers, "a/b" fractions, numeric strings with trailing units
 * ("50.0 mm") and { numerator, denominator } objects.
 */
export function toRational(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;

    if (typeof value === 'string') {
        const text = value.trim();
        if (text.includes('/')) {
            const [num, denom] = text.split('/').map(part => parseFloat(part));
            if (!Number.isFinite(num) || !Number.isFinite(denom) || denom === 0) return null;
            return num / denom;
        }
        const parsed = parseFloat(text);
        return Number.isFinite(parsed) ? parsed : null;
    }

    if (isRecord(value)) {
        const { numerator, denominator } = value;
        if (typeof numerator === 'number' && typeof denominator === 'number' && denominator !== 0) {
            return numerator / denominator;
        }
    }
    return null;
}

export function toIso(value: unknown): number | null {
    const first = Array.isArray(value) ? value[0] : value;
    const parsed = toRational(first);
    return parsed === null ? null : Math.round(parsed);
}

/** Degrees/minutes/seconds array or signed decimal, negated for S and W refs. */
export function toGpsCoordinate(value: unknown, ref: unknown, limit: number): number | null {
    let decimal: number | null;

    if (Array.isArray(value)) {
        const parts = value.map(toRational);
        if (parts.length === 0 || parts.some(p => p === null)) return null;
        const [degrees = 0, minutes = 0, seconds = 0] = parts.map(p => p ?? 0);
        decimal = degrees + minutes / 60 + seconds / 3600;
    } else {
        decimal = toRational(value);
    }
    if (decimal === null) return null;

    const hemisphere = toText(ref)?.toUpperCase();
    if ((hemisphere === 'S' || hemisphere === 'W' || hemisphere === 'SOUTH' || hemisphere === 'WEST') && decimal > 0) {
        decimal = -decimal;
    }

    return Math.abs(decimal) <= limit ? decimal : null;
}

export function toAltitude(value: unknown, ref: unknown): number | null {
    const altitude = toRational(value);
    if (altitude === null) return null;
    const belowSeaLevel = ref === 1 || ref === '1' || (typeof ref === 'string' && ref.toLowerCase().startsWith('below'));
    return belowSeaLevel && altitude > 0 ? -altitude : altitude;
}

const DATE_PATTERN = /^(\d{4})[:-](\d{2})[:-](\d{2})[ T](\d{2}):(\d{2}):(\d{2})/;

/**
 * "YYYY:MM:DD HH:MM:SS" (or the ISO form) to "YYYY-MM-DDTHH:MM:SS".
 * Zeroed, unparsable and out-of-range values yield null.
 */
export function toCaptureTimestamp(value: unknown): string | null {
    const text = toText(value);
    if (!text) return null;

    const match = DATE_PATTERN.exec(text);
    if (!match) {
        logger.debug(`[ExifNormalizer] Unparsable capture date: '${text}'`);
        return null;
    }

    const [, y, mo, d, h, mi, s] = match;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    if (year < MIN_YEAR || year > MAX_YEAR) return null;
    if (month < 1 || month > 12 || day < 1 || day > 31) return null;
    if (Number(h) > 23 || Number(mi) > 59 || Number(s) > 59) return null;

    // Rejects 31 February and the like
    const probe = new Date(Date.UTC(year, month - 1, day));
    if (probe.getUTCMonth() !== month - 1) return null;

    return `${y}-${mo}-${d}T${h}:${mi}:${s}`;
}

export function normalizeExif(input: ExifInput | null | undefined): ExifAttributes | null {
    if (!input) return null;

    const attributes: ExifAttributes = {
        camera_make: toText(input.Make),
        camera_model: toText(input.Model),
        software: toText(input.Software),
        exposure_time: toRational(input.ExposureTime),
        f_number: toRational(input.FNumber),
        iso: toIso(input.ISO ?? input.ISOSpeedRatings),
        focal_length: toRational(input.FocalLength),
        gps_latitude: toGpsCoordinate(input.GPSLatitude, input.GPSLatitudeRef, 90),
        gps_longitude: toGpsCoordinate(input.GPSLongitude, input.GPSLongitudeRef, 180),
        gps_altitude: toAltitude(input.GPSAltitude, input.GPSAltitudeRef),
        captured_at: toCaptureTimestamp(input.DateTimeOriginal)
    };

    const hasAny = Object.values(attributes).some(v => v !== null);
    return hasAny ? attributes : null;
}
