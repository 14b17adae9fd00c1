import { promises as fs } from 'node:fs';
import path from 'node:path';
import sharp from 'sharp';
import type { FileMetadata } from '../core/types';
import logger from '../logger';

/** Size from the filesystem, format and dimensions from the image header. */
export async function probeFile(filePath: string): Promise<FileMetadata> {
    const stats = await fs.stat(filePath);
    const fallbackFormat = path.extname(filePath).slice(1).toLowerCase() || 'unknown';

    try {
        const meta = await sharp(filePath).metadata();
        return {
            size: stats.size,
            format: meta.format ?? fallbackFormat,
            width: meta.width ?? null,
            height: meta.height ?? null
        };
    } catch (e) {
        logger.warn(`[FileProbe] Could not read image header of ${filePath}:`, e);
        return { size: stats.size, format: fallbackFormat, width: null, height: null };
    }
}
