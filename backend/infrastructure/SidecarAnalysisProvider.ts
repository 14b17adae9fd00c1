import { promises as fs } from 'node:fs';
import { z } from 'zod';
import type { IAnalysisProvider, ImageAnalysis } from '../core/interfaces/IAnalysisProvider';
import { ObjectDetectionSchema, faceDetectionSchema, validate } from '../core/services/validation';
import logger from '../logger';

const DetectionsFileSchema = z.object({
    objects: z.array(ObjectDetectionSchema).default([]),
    faces: z.array(faceDetectionSchema(null)).default([])
});

const EncodingFileSchema = z.object({
    encoding: z.array(z.number().finite()).min(1)
});

export const detectionsSidecarPath = (imagePath: string) => `${imagePath}.detections.json`;
export const encodingSidecarPath = (imagePath: string) => `${imagePath}.encoding.json`;

async function readJson(filePath: string): Promise<unknown> {
    let raw: string;
    try {
        raw = await fs.readFile(filePath, 'utf8');
    } catch (e) {
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return undefined;
        throw e;
    }
    return JSON.parse(raw);
}

/**
 * Reads detector output written next to each image by an external analysis
 * step. An image without a sidecar has no detections.
 */
export class SidecarAnalysisProvider implements IAnalysisProvider {
    /** `detectionsFile` replaces the per-image lookup, for single-image runs. */
    constructor(private readonly detectionsFile?: string) { }

    async analyzeImage(filePath: string): Promise<ImageAnalysis> {
        const source = this.detectionsFile ?? detectionsSidecarPath(filePath);
        const content = await readJson(source);
        if (content === undefined) {
            if (this.detectionsFile) throw new Error(`Detections file not found: ${source}`);
            logger.debug(`[SidecarAnalysisProvider] No detections for ${filePath}`);
            return { objects: [], faces: [] };
        }
        return validate(DetectionsFileSchema, content, `read ${source}`);
    }

    async encodeKnownFace(filePath: string): Promise<number[] | null> {
        const source = encodingSidecarPath(filePath);
        const content = await readJson(source);
        if (content === undefined) return null;
        return validate(EncodingFileSchema, content, `read ${source}`).encoding;
    }
}
