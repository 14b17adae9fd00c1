import * as fs from 'node:fs/promises';
import path from 'node:path';
import type { IAnalysisProvider } from './core/interfaces/IAnalysisProvider';
import type { ExifInput, FileMetadata, PhotoId } from './core/types';
import type { PhotoMetadataStore } from './MetadataStore';
import logger from './logger';

export interface ExifSource {
    read(filePath: string): Promise<ExifInput | null>;
}

export interface ScanContext {
    store: PhotoMetadataStore;
    analysis: IAnalysisProvider;
    exif: ExifSource;
    probe: (filePath: string) => Promise<FileMetadata>;
    extensions: string[];
}

export interface IngestResult {
    photoId: PhotoId;
    objects: number;
    faces: number;
}

export interface ScanSummary {
    total: number;
    processed: number;
    skipped: number;
    failed: number;
    objectsDetected: number;
}

export interface EnrollSummary {
    enrolled: number;
    skipped: number;
    failed: number;
}

const isSupported = (fileName: string, extensions: string[]) =>
    extensions.includes(path.extname(fileName).toLowerCase());

/** Supported image files below `dirPath`, hidden directories excluded, sorted by path. */
export async function listImageFiles(dirPath: string, extensions: string[]): Promise<string[]> {
    const files: string[] = [];

    async function scan(currentPath: string) {
        const entries = await fs.readdir(currentPath, { withFileTypes: true });
        for (const entry of entries) {
            const fullPath = path.join(currentPath, entry.name);
            if (entry.isDirectory()) {
                if (!entry.name.startsWith('.')) await scan(fullPath);
            } else if (entry.isFile() && isSupported(entry.name, extensions)) {
                files.push(fullPath);
            }
        }
    }

    await scan(dirPath);
    return files.sort();
}

export async function ingestFile(ctx: ScanContext, filePath: string): Promise<IngestResult> {
    const fullPath = path.resolve(filePath);
    const [fileMeta, exif, analysis] = await Promise.all([
        ctx.probe(fullPath),
        ctx.exif.read(fullPath),
        ctx.analysis.analyzeImage(fullPath)
    ]);

    // The photo records which detector produced its objects
    const modelId = fileMeta.modelId ?? analysis.objects[0]?.modelId ?? null;
    const photoId = ctx.store.ingestPhoto(fullPath, { ...fileMeta, modelId }, exif, analysis.objects, analysis.faces);
    return { photoId, objects: analysis.objects.length, faces: analysis.faces.length };
}

/**
 * Ingests every supported image below `dirPath`. Photos already stored are
 * skipped unless `force` is set; a failing file is logged and counted.
 */
export async function scanDirectory(ctx: ScanContext, dirPath: string, options: { force?: boolean } = {}): Promise<ScanSummary> {
    const files = await listImageFiles(path.resolve(dirPath), ctx.extensions);
    const summary: ScanSummary = { total: files.length, processed: 0, skipped: 0, failed: 0, objectsDetected: 0 };
    logger.info(`[Scanner] Found ${files.length} images in ${dirPath}`);

    for (const file of files) {
        if (!options.force && ctx.store.findPhotoByPath(file)?.processed_at) {
            summary.skipped++;
            continue;
        }
        try {
            const result = await ingestFile(ctx, file);
            summary.processed++;
            summary.objectsDetected += result.objects;
        } catch (e) {
            summary.failed++;
            logger.error(`[Scanner] Failed to process ${file}:`, e);
        }
    }

    logger.info(`[Scanner] Processed: ${summary.processed}, Skipped: ${summary.skipped}, Failed: ${summary.failed}`);
    return summary;
}

/**
 * Enrolls one known face per image, taking the person's name from the image's
 * folder. An image that cannot be encoded or enrolled is logged and counted.
 */
export async function loadKnownFaces(ctx: ScanContext, folderPath: string): Promise<EnrollSummary> {
    const summary: EnrollSummary = { enrolled: 0, skipped: 0, failed: 0 };
    const root = path.resolve(folderPath);
    const people = (await fs.readdir(root, { withFileTypes: true }))
        .filter(entry => entry.isDirectory() && !entry.name.startsWith('.'))
        .map(entry => entry.name)
        .sort();

    for (const name of people) {
        const personDir = path.join(root, name);
        const images = (await fs.readdir(personDir, { withFileTypes: true }))
            .filter(entry => entry.isFile() && isSupported(entry.name, ctx.extensions))
            .map(entry => path.join(personDir, entry.name))
            .sort();

        for (const image of images) {
            try {
                const encoding = await ctx.analysis.encodeKnownFace(image);
                if (!encoding) {
                    logger.warn(`[Scanner] No face encoding for ${image}, skipping.`);
                    summary.skipped++;
                    continue;
                }
                ctx.store.enrollKnownFace(name, encoding, image);
                summary.enrolled++;
            } catch (e) {
                summary.failed++;
                logger.error(`[Scanner] Failed to enroll ${image}:`, e);
            }
        }
    }

    logger.info(`[Scanner] Enrolled ${summary.enrolled} known faces from ${people.length} people (${summary.failed} failed)`);
    return summary;
}
