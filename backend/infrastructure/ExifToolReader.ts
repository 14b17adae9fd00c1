import { ExifDateTime, ExifTool, type Tags } from 'exiftool-vendored';
import type { ExifInput } from '../core/types';
import logger from '../logger';

/** Flattens exiftool tags into plain values; date objects keep their raw text. */
export function toExifInput(tags: Tags): ExifInput {
    const entries: [string, unknown][] = Object.entries(tags);
    const input: ExifInput = {};
    for (const [key, value] of entries) {
        if (value instanceof ExifDateTime) {
            input[key] = value.rawValue ?? value.toString();
        } else {
            input[key] = value;
        }
    }
    return input;
}

export class ExifToolReader {
    private tool: ExifTool | null = null;

    private getTool(): ExifTool {
        if (!this.tool) {
            logger.info('[ExifToolReader] Starting ExifTool...');
            this.tool = new ExifTool({ taskTimeoutMillis: 5000, maxProcs: 1 });
        }
        return this.tool;
    }

    /** Null when the file carries no readable metadata. */
    async read(filePath: string): Promise<ExifInput | null> {
        try {
            const tags = await this.getTool().read(filePath);
            return toExifInput(tags);
        } catch (e) {
            logger.warn(`[ExifToolReader] Failed to read EXIF from ${filePath}:`, e);
            return null;
        }
    }

    async end() {
        if (!this.tool) return;
        await this.tool.end();
        this.tool = null;
    }
}
