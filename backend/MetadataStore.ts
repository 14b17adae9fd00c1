import type Database from 'better-sqlite3';
import type {
    CameraFilter, ExifInput, FaceDetectionInput, FileMetadata, KnownFace, KnownFaceId,
    ObjectDetectionInput, Pagination, PhotoDetail, PhotoId, PhotoPage, PhotoRecord, Stats
} from './core/types';
import type { StoreConfig } from './core/services/ConfigService';
import { IngestionService } from './core/services/IngestionService';
import { QueryService } from './core/services/QueryService';
import { SchemaManager } from './data/schema';
import { applyPragmas, openDatabase } from './db';
import logger from './logger';

/**
 * Single entry point for callers. Construction prepares the connection and
 * the schema, so a store that exists is a store that can be used.
 */
export class PhotoMetadataStore {
    private readonly ingestion: IngestionService;
    private readonly query: QueryService;
    private ownsConnection = false;

    constructor(private readonly db: Database.Database, config: StoreConfig) {
        applyPragmas(db, config.database);
        new SchemaManager(db).ensureSchema();
        this.ingestion = new IngestionService(db, config);
        this.query = new QueryService(db, config);
    }

    static open(config: StoreConfig): PhotoMetadataStore {
        const db = openDatabase(config.database);
        try {
            const store = new PhotoMetadataStore(db, config);
            store.ownsConnection = true;
            return store;
        } catch (e) {
            db.close();
            throw e;
        }
    }

    /** Closes the connection when `open` created it; a borrowed handle stays open. */
    close() {
        if (!this.ownsConnection || !this.db.open) return;
        this.db.close();
        logger.debug('[PhotoMetadataStore] Connection closed.');
    }

    // ==========================================
    // Writes
    // ==========================================

    ingestPhoto(
        path: string,
        fileMeta: FileMetadata,
        exif: ExifInput | null | undefined,
        objectDetections: ObjectDetectionInput[],
        faceDetections: FaceDetectionInput[]
    ): PhotoId {
        return this.ingestion.ingestPhoto(path, fileMeta, exif, objectDetections, faceDetections);
    }

    enrollKnownFace(name: string, encoding: number[], sourceImagePath: string): KnownFaceId {
        return this.ingestion.enrollKnownFace(name, encoding, sourceImagePath);
    }

    deleteKnownFace(id: KnownFaceId) {
        this.ingestion.deleteKnownFace(id);
    }

    deletePhoto(id: PhotoId) {
        this.ingestion.deletePhoto(id);
    }

    // ==========================================
    // Reads
    // ==========================================

    searchByObjects(classNames: string[], minCount = 1): PhotoId[] {
        return this.query.searchByObjects(classNames, minCount);
    }

    searchByFaces(names: string[]): PhotoId[] {
        return this.query.searchByFaces(names);
    }

    searchByCamera(filter: CameraFilter): PhotoId[] {
        return this.query.searchByCamera(filter);
    }

    getPhotoInfo(photoId: PhotoId): PhotoDetail {
        return this.query.getPhotoInfo(photoId);
    }

    getStatistics(): Stats {
        return this.query.getStatistics();
    }

    listPhotos(page?: Pagination): PhotoPage {
        return this.query.listPhotos(page);
    }

    listKnownFaces(): KnownFace[] {
        return this.query.listKnownFaces();
    }

    getPhotosByIds(ids: PhotoId[]): PhotoRecord[] {
        return this.query.getPhotosByIds(ids);
    }

    findPhotoByPath(filePath: string): PhotoRecord | null {
        return this.query.findPhotoByPath(filePath);
    }
}
