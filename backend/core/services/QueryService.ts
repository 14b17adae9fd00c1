import type Database from 'better-sqlite3';
import type { CameraFilter, KnownFace, Pagination, PhotoDetail, PhotoId, PhotoPage, PhotoRecord, Stats } from '../types';
import type { StoreConfig } from './ConfigService';
import { ExifRepository } from '../../data/repositories/ExifRepository';
import { DetectionRepository } from '../../data/repositories/DetectionRepository';
import { FaceRepository } from '../../data/repositories/FaceRepository';
import { KnownFaceRepository } from '../../data/repositories/KnownFaceRepository';
import { PhotoRepository } from '../../data/repositories/PhotoRepository';
import { NotFoundError, toStorageError } from '../../errors';
import { CameraFilterSchema, ClassSearchSchema, IdSchema, NameSearchSchema, PaginationSchema, validate } from './validation';

const TOP_CAMERAS_LIMIT = 10;

export class QueryService {
    private readonly photos: PhotoRepository;
    private readonly exif: ExifRepository;
    private readonly objects: DetectionRepository;
    private readonly faces: FaceRepository;
    private readonly knownFaces: KnownFaceRepository;

    constructor(db: Database.Database, private readonly config: StoreConfig) {
        this.photos = new PhotoRepository(db);
        this.exif = new ExifRepository(db);
        this.objects = new DetectionRepository(db);
        this.faces = new FaceRepository(db);
        this.knownFaces = new KnownFaceRepository(db);
    }

    private run<T>(operation: string, read: () => T): T {
        try {
            return read();
        } catch (e) {
            throw toStorageError(e, operation);
        }
    }

    /** Photos containing all of `classNames`, each at least `minCount` times. */
    searchByObjects(classNames: string[], minCount = 1): PhotoId[] {
        const input = validate(ClassSearchSchema, { classNames, minCount }, 'searchByObjects');
        return this.run('searchByObjects', () => this.objects.searchByClasses(input.classNames, input.minCount));
    }

    /** Photos with a recognized face matching any of `names`. */
    searchByFaces(names: string[]): PhotoId[] {
        const input = validate(NameSearchSchema, names, 'searchByFaces');
        return this.run('searchByFaces', () => this.faces.searchByNames(input));
    }

    searchByCamera(filter: CameraFilter): PhotoId[] {
        const input = validate(CameraFilterSchema, filter, 'searchByCamera');
        return this.run('searchByCamera', () => this.photos.searchByCamera(input));
    }

    getPhotoInfo(photoId: PhotoId): PhotoDetail {
        const id = validate(IdSchema, photoId, 'getPhotoInfo');
        return this.run('getPhotoInfo', () => {
            const photo = this.photos.getPhotoById(id);
            if (!photo) throw new NotFoundError('Photo', id, 'getPhotoInfo');
            return {
                photo,
                exif: this.exif.getForPhoto(id),
                objects: this.objects.getDetections(id),
                objectSummaries: this.objects.getSummaries(id),
                faces: this.faces.getFaces(id),
                faceSummary: this.faces.getSummary(id)
            };
        });
    }

    getStatistics(): Stats {
        return this.run('getStatistics', () => {
            const library = this.photos.getLibraryStats(TOP_CAMERAS_LIMIT);
            const faceStats = this.faces.getFaceStats();
            return {
                totalPhotos: library.totalPhotos,
                processedPhotos: library.processedPhotos,
                totalObjectDetections: this.objects.countDetections(),
                topClasses: this.objects.getTopClasses(this.config.query.topClassesLimit),
                photosWithGps: library.photosWithGps,
                totalKnownFaces: this.knownFaces.count(),
                totalFaceDetections: faceStats.totalFaceDetections,
                recognizedFaces: faceStats.recognizedFaces,
                unrecognizedFaces: faceStats.unrecognizedFaces,
                topCameras: library.topCameras
            };
        });
    }

    listPhotos(page: Pagination = {}): PhotoPage {
        const input = validate(PaginationSchema, page, 'listPhotos');
        const limit = input.limit ?? this.config.query.defaultPageSize;
        const offset = input.offset ?? 0;
        return this.run('listPhotos', () => this.photos.getPhotos(limit, offset));
    }

    listKnownFaces(): KnownFace[] {
        return this.run('listKnownFaces', () => this.knownFaces.getAll());
    }

    getPhotosByIds(ids: PhotoId[]): PhotoRecord[] {
        return this.run('getPhotosByIds', () => this.photos.getPhotosByIds(ids));
    }

    findPhotoByPath(filePath: string): PhotoRecord | null {
        return this.run('findPhotoByPath', () => this.photos.getPhotoByPath(filePath) ?? null);
    }
}
