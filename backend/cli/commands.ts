import type { PhotoId, PhotoRecord } from '../core/types';
import type { ScanContext } from '../scanner';
import { ingestFile, loadKnownFaces, scanDirectory } from '../scanner';
import { SidecarAnalysisProvider } from '../infrastructure/SidecarAnalysisProvider';
import { type ParsedArgs, UsageError, getInteger, getList, getString, hasFlag, requirePositional } from './args';

export interface CommandContext extends ScanContext {
    out: (line: string) => void;
}

export type CommandHandler = (ctx: CommandContext, args: ParsedArgs) => Promise<void>;

interface CommandDefinition {
    usage: string;
    run: CommandHandler;
}

const fixed = (value: number, digits = 2) => value.toFixed(digits);

function printPhotoList(ctx: CommandContext, photos: PhotoRecord[]) {
    for (const photo of photos) {
        ctx.out(`  [${photo.id}] ${photo.file_name}  ${photo.file_path}`);
    }
}

function printSearchResult(ctx: CommandContext, ids: PhotoId[], description: string) {
    if (ids.length === 0) {
        ctx.out(`No photos found ${description}`);
        return;
    }
    ctx.out(`Found ${ids.length} photos ${description}:`);
    printPhotoList(ctx, ctx.store.getPhotosByIds(ids));
}

export const COMMANDS: Record<string, CommandDefinition> = {
    'process-image': {
        usage: 'process-image <path> [--detections file]',
        run: async (ctx, args) => {
            const imagePath = requirePositional(args, 'path');
            const detections = getString(args, 'detections');
            const scanCtx = detections ? { ...ctx, analysis: new SidecarAnalysisProvider(detections) } : ctx;
            const result = await ingestFile(scanCtx, imagePath);
            ctx.out(`Processed ${imagePath}`);
            ctx.out(`  Photo ID: ${result.photoId}`);
            ctx.out(`  Objects detected: ${result.objects}`);
            ctx.out(`  Faces detected: ${result.faces}`);
        }
    },

    'process-dir': {
        usage: 'process-dir <dir> [--force]',
        run: async (ctx, args) => {
            const dir = requirePositional(args, 'dir');
            const summary = await scanDirectory(ctx, dir, { force: hasFlag(args, 'force') });
            ctx.out('Processing summary:');
            ctx.out(`  Total images: ${summary.total}`);
            ctx.out(`  Processed: ${summary.processed}`);
            ctx.out(`  Skipped: ${summary.skipped}`);
            ctx.out(`  Failed: ${summary.failed}`);
            ctx.out(`  Objects detected: ${summary.objectsDetected}`);
        }
    },

    search: {
        usage: 'search --objects <class...> [--min-count n]',
        run: async (ctx, args) => {
            const classes = getList(args, 'objects');
            const minCount = getInteger(args, 'min-count') ?? 1;
            const ids = ctx.store.searchByObjects(classes, minCount);
            printSearchResult(ctx, ids, `containing ${classes.join(', ')} (min count: ${minCount})`);
        }
    },

    'search-faces': {
        usage: 'search-faces --names <name...>',
        run: async (ctx, args) => {
            const names = getList(args, 'names');
            const ids = ctx.store.searchByFaces(names);
            printSearchResult(ctx, ids, `with ${names.join(' or ')}`);
        }
    },

    'search-camera': {
        usage: 'search-camera [--make m] [--model m]',
        run: async (ctx, args) => {
            const make = getString(args, 'make');
            const model = getString(args, 'model');
            const ids = ctx.store.searchByCamera({ make, model });
            printSearchResult(ctx, ids, `taken with ${[make, model].filter(Boolean).join(' ')}`);
        }
    },

    stats: {
        usage: 'stats',
        run: async (ctx) => {
            const stats = ctx.store.getStatistics();
            ctx.out('Database statistics:');
            ctx.out(`  Total photos: ${stats.totalPhotos}`);
            ctx.out(`  Processed photos: ${stats.processedPhotos}`);
            ctx.out(`  Photos with GPS: ${stats.photosWithGps}`);
            ctx.out(`  Total objects detected: ${stats.totalObjectDetections}`);
            ctx.out(`  Known faces: ${stats.totalKnownFaces}`);
            ctx.out(`  Faces detected: ${stats.totalFaceDetections} (${stats.recognizedFaces} recognized, ${stats.unrecognizedFaces} unrecognized)`);
            if (stats.topClasses.length > 0) {
                ctx.out('Top objects:');
                stats.topClasses.forEach((c, i) => ctx.out(`  ${i + 1}. ${c.class_label}: ${c.total}`));
            }
            if (stats.topCameras.length > 0) {
                ctx.out('Top cameras:');
                stats.topCameras.forEach((c, i) =>
                    ctx.out(`  ${i + 1}. ${[c.camera_make, c.camera_model].filter(Boolean).join(' ')}: ${c.photos}`));
            }
        }
    },

    info: {
        usage: 'info --photo-id n',
        run: async (ctx, args) => {
            const photoId = getInteger(args, 'photo-id');
            if (photoId === undefined) throw new UsageError('Missing --photo-id');
            const { photo, exif, objectSummaries, faces, faceSummary } = ctx.store.getPhotoInfo(photoId);

            ctx.out(`Photo ${photo.id}: ${photo.file_name}`);
            ctx.out(`  Path: ${photo.file_path}`);
            ctx.out(`  Size: ${photo.width ?? '?'}x${photo.height ?? '?'} (${photo.format ?? 'unknown'}), ${photo.file_size ?? 0} bytes`);
            ctx.out(`  Model: ${photo.model_id ?? '-'}`);
            ctx.out(`  Processed: ${photo.processed_at ?? '-'}`);

            if (exif) {
                ctx.out('EXIF:');
                const camera = [exif.camera_make, exif.camera_model].filter(Boolean).join(' ');
                if (camera) ctx.out(`  Camera: ${camera}`);
                if (exif.captured_at) ctx.out(`  Captured: ${exif.captured_at}`);
                if (exif.exposure_time !== null) ctx.out(`  Exposure: ${exif.exposure_time}s`);
                if (exif.f_number !== null) ctx.out(`  F-number: f/${exif.f_number}`);
                if (exif.iso !== null) ctx.out(`  ISO: ${exif.iso}`);
                if (exif.gps_latitude !== null && exif.gps_longitude !== null) {
                    ctx.out(`  GPS: ${fixed(exif.gps_latitude, 6)}, ${fixed(exif.gps_longitude, 6)}`);
                }
            }

            if (objectSummaries.length > 0) {
                ctx.out(`Objects (${objectSummaries.length} classes):`);
                for (const s of objectSummaries) {
                    ctx.out(`  ${s.class_label}: ${s.total_count} (avg: ${fixed(s.avg_confidence)}, max: ${fixed(s.max_confidence)})`);
                }
            } else {
                ctx.out('No objects detected');
            }

            if (faceSummary && faceSummary.total_faces > 0) {
                ctx.out(`Faces (${faceSummary.recognized_faces} of ${faceSummary.total_faces} recognized):`);
                for (const face of faces) ctx.out(`  ${face.known_face_name ?? 'unknown'}`);
            }
        }
    },

    list: {
        usage: 'list [--limit n] [--offset n]',
        run: async (ctx, args) => {
            const { photos, total } = ctx.store.listPhotos({
                limit: getInteger(args, 'limit'),
                offset: getInteger(args, 'offset')
            });
            if (photos.length === 0) {
                ctx.out('No photos found in database');
                return;
            }
            ctx.out(`Photos (showing ${photos.length} of ${total}):`);
            for (const photo of photos) {
                ctx.out(`  [${photo.id}] ${photo.file_name}  ${photo.width ?? '?'}x${photo.height ?? '?'}  ${photo.object_classes} classes`);
            }
        }
    },

    'load-faces': {
        usage: 'load-faces <folder>',
        run: async (ctx, args) => {
            const folder = requirePositional(args, 'folder');
            const summary = await loadKnownFaces(ctx, folder);
            ctx.out(`Enrolled ${summary.enrolled} known faces (${summary.skipped} skipped, ${summary.failed} failed)`);
        }
    },

    'list-faces': {
        usage: 'list-faces',
        run: async (ctx) => {
            const faces = ctx.store.listKnownFaces();
            if (faces.length === 0) {
                ctx.out('No known faces enrolled');
                return;
            }
            ctx.out(`Known faces (${faces.length}):`);
            for (const face of faces) ctx.out(`  [${face.id}] ${face.name}  ${face.source_image_path}`);
        }
    },

    'delete-face': {
        usage: 'delete-face --id n',
        run: async (ctx, args) => {
            const id = getInteger(args, 'id');
            if (id === undefined) throw new UsageError('Missing --id');
            ctx.store.deleteKnownFace(id);
            ctx.out(`Deleted known face ${id}`);
        }
    }
};

export function usage(): string {
    const lines = Object.values(COMMANDS).map(c => `  ${c.usage}`);
    return ['Usage: photo-store <command> [options] [--db path] [--config file]', '', 'Commands:', ...lines].join('\n');
}
