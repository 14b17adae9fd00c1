import type Database from 'better-sqlite3';
import type { ExifInput, FaceDetectionInput, FileMetadata, KnownFaceId, ObjectDetectionInput, PhotoId } from '../types';
import type { StoreConfig } from './ConfigService';
import { ExifRepository } from '../../data/repositories/ExifRepository';
import { DetectionRepository } from '../../data/repositories/DetectionRepository';
import { FaceRepository, type FaceToStore } from '../../data/repositories/FaceRepository';
import { KnownFaceRepository } from '../../data/repositories/KnownFaceRepository';
import { PhotoRepository } from '../../data/repositories/PhotoRepository';
import { NotFoundError, toStorageError } from '../../errors';
import logger from '../../logger';
import { nowIso } from '../../utils/dbHelpers';
import { normalizeExif } from './ExifNormalizer';
import { IdSchema, enrollmentSchema, photoIngestSchema, validate } from './validation';

/**
 * Write path of the store. Every operation runs in one BEGIN IMMEDIATE
 * transaction, so concurrent writers on other connections queue on the
 * SQLite write lock instead of interleaving.
 */
export class IngestionService {
    private readonly photos: PhotoRepository;
    private readonly exif: ExifRepository;
    private readonly objects: DetectionRepository;
    private readonly faces: FaceRepository;
    private readonly knownFaces: KnownFaceRepository;

    constructor(private readonly db: Database.Database, private readonly config: StoreConfig) {
        this.photos = new PhotoRepository(db);
        this.exif = new ExifRepository(db);
        this.objects = new DetectionRepository(db);
        this.faces = new FaceRepository(db);
        this.knownFaces = new KnownFaceRepository(db);
    }

    /**
     * Replaces everything stored for `path` with the given analysis results
     * and returns the photo id. Re-ingesting the same inputs is a no-op apart
     * from `updated_at`.
     */
    ingestPhoto(
        path: string,
        fileMeta: FileMetadata,
        exif: ExifInput | null | undefined,
        objectDetections: ObjectDetectionInput[],
        faceDetections: FaceDetectionInput[]
    ): PhotoId {
        const input = validate(photoIngestSchema(this.config.faces.encodingLength), {
            path,
            fileMeta,
            exif,
            objects: objectDetections,
            faces: faceDetections
        }, 'ingestPhoto');

        const threshold = this.config.ingestion.minConfidence;
        const objects = input.objects.filter(o => o.confidence >= threshold);
        if (objects.length < input.objects.length) {
            logger.debug(`[IngestionService] Dropped ${input.objects.length - objects.length} detections below ${threshold} for ${path}`);
        }
        const attributes = normalizeExif(input.exif);

        const write = this.db.transaction((): PhotoId => {
            const photoId = this.photos.upsertPhoto(input.path, input.fileMeta, nowIso());

            this.exif.deleteForPhoto(photoId);
            this.objects.deleteForPhoto(photoId);
            this.faces.deleteForPhoto(photoId);

            if (attributes) this.exif.insert(photoId, attributes);
            this.objects.insertDetections(photoId, objects);
            this.faces.insertFaces(photoId, input.faces.map(face => this.bindKnownFace(face, input.path)));

            this.objects.rebuildSummaries(photoId);
            this.faces.rebuildSummary(photoId);
            return photoId;
        });

        try {
            const photoId = write.immediate();
            logger.info(`[IngestionService] Stored ${input.path} as photo ${photoId} (${objects.length} objects, ${input.faces.length} faces)`);
            return photoId;
        } catch (e) {
            logger.error(`[IngestionService] Ingestion of ${input.path} rolled back:`, e);
            throw toStorageError(e, 'ingestPhoto', input.path);
        }
    }

    private bindKnownFace(face: FaceDetectionInput, photoPath: string): FaceToStore {
        if (!face.matchedName) return { detection: face, knownFaceId: null };

        const knownFaceId = this.knownFaces.findIdByName(face.matchedName);
        if (knownFaceId === null) {
            logger.warn(`[IngestionService] No known face named '${face.matchedName}' (${photoPath}); storing as unrecognized.`);
        }
        return { detection: face, knownFaceId };
    }

    enrollKnownFace(name: string, encoding: number[], sourceImagePath: string): KnownFaceId {
        const input = validate(
            enrollmentSchema(this.config.faces.encodingLength),
            { name, encoding, sourceImagePath },
            'enrollKnownFace'
        );

        const write = this.db.transaction(() =>
            this.knownFaces.upsertKnownFace(input.name, input.encoding, input.sourceImagePath, nowIso())
        );

        try {
            const id = write.immediate();
            logger.info(`[IngestionService] Enrolled '${input.name}' from ${input.sourceImagePath} (known face ${id})`);
            return id;
        } catch (e) {
            throw toStorageError(e, 'enrollKnownFace', input.sourceImagePath);
        }
    }

    /** Removes an enrollment; detections bound to it fall back to unrecognized. */
    deleteKnownFace(id: KnownFaceId) {
        const knownFaceId = validate(IdSchema, id, 'deleteKnownFace');

        const write = this.db.transaction(() => {
            const affected = this.faces.getPhotoIdsForKnownFace(knownFaceId);
            if (!this.knownFaces.deleteKnownFace(knownFaceId)) {
                throw new NotFoundError('Known face', knownFaceId, 'deleteKnownFace');
            }
            for (const photoId of affected) this.faces.rebuildSummary(photoId);
            return affected.length;
        });

        try {
            const photoCount = write.immediate();
            logger.info(`[IngestionService] Deleted known face ${knownFaceId}; ${photoCount} photo summaries recomputed.`);
        } catch (e) {
            throw toStorageError(e, 'deleteKnownFace');
        }
    }

    deletePhoto(id: PhotoId) {
        const photoId = validate(IdSchema, id, 'deletePhoto');

        const write = this.db.transaction(() => {
            if (!this.photos.deletePhoto(photoId)) {
                throw new NotFoundError('Photo', photoId, 'deletePhoto');
            }
        });

        try {
            write.immediate();
            logger.info(`[IngestionService] Deleted photo ${photoId}`);
        } catch (e) {
            throw toStorageError(e, 'deletePhoto');
        }
    }
}
