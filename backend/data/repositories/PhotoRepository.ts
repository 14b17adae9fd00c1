import path from 'node:path';
import type Database from 'better-sqlite3';
import type { CameraFilter, CameraTotal, FileMetadata, PhotoId, PhotoListItem, PhotoRecord } from '../../core/types';
import { placeholders } from '../../utils/dbHelpers';

interface PhotoUpsertParams {
    file_path: string;
    file_name: string;
    file_size: number;
    format: string;
    width: number | null;
    height: number | null;
    model_id: string | null;
    now: string;
}

export interface LibraryStats {
    totalPhotos: number;
    processedPhotos: number;
    photosWithGps: number;
    topCameras: CameraTotal[];
}

export class PhotoRepository {
    constructor(private readonly db: Database.Database) { }

    /**
     * Inserts the photo or refreshes the row already stored for `filePath`.
     * `created_at` is only written on first insert.
     */
    upsertPhoto(filePath: string, meta: FileMetadata, now: string): PhotoId {
        const row = this.db.prepare<[PhotoUpsertParams], { id: number }>(`
            INSERT INTO photos (file_path, file_name, file_size, format, width, height, model_id, created_at, updated_at, processed_at)
            VALUES (@file_path, @file_name, @file_size, @format, @width, @height, @model_id, @now, @now, @now)
            ON CONFLICT(file_path) DO UPDATE SET
                file_name = excluded.file_name,
                file_size = excluded.file_size,
                format = excluded.format,
                width = excluded.width,
                height = excluded.height,
                model_id = excluded.model_id,
                updated_at = excluded.updated_at,
                processed_at = excluded.processed_at
            RETURNING id
        `).get({
            file_path: filePath,
            file_name: path.basename(filePath),
            file_size: meta.size,
            format: meta.format,
            width: meta.width ?? null,
            height: meta.height ?? null,
            model_id: meta.modelId ?? null,
            now
        });

        if (!row) throw new Error(`PhotoRepository.upsertPhoto returned no id for ${filePath}`);
        return row.id;
    }

    getPhotoById(id: PhotoId): PhotoRecord | undefined {
        return this.db.prepare<[number], PhotoRecord>('SELECT * FROM photos WHERE id = ?').get(id);
    }

    getPhotoByPath(filePath: string): PhotoRecord | undefined {
        return this.db.prepare<[string], PhotoRecord>('SELECT * FROM photos WHERE file_path = ?').get(filePath);
    }

    getPhotosByIds(ids: PhotoId[]): PhotoRecord[] {
        if (ids.length === 0) return [];
        return this.db.prepare<number[], PhotoRecord>(
            `SELECT * FROM photos WHERE id IN (${placeholders(ids.length)}) ORDER BY id ASC`
        ).all(...ids);
    }

    getPhotos(limit: number, offset: number): { photos: PhotoListItem[]; total: number } {
        const photos = this.db.prepare<[number, number], PhotoListItem>(`
            SELECT p.*, (SELECT COUNT(*) FROM object_summaries os WHERE os.photo_id = p.id) AS object_classes
            FROM photos p
            ORDER BY p.id ASC
            LIMIT ? OFFSET ?
        `).all(limit, offset);
        const total = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM photos').get()?.count ?? 0;
        return { photos, total };
    }

    deletePhoto(id: PhotoId): boolean {
        return this.db.prepare<[number]>('DELETE FROM photos WHERE id = ?').run(id).changes > 0;
    }

    searchByCamera(filter: CameraFilter): PhotoId[] {
        const conditions: string[] = [];
        const params: string[] = [];

        if (filter.make !== undefined) {
            conditions.push('e.camera_make = ? COLLATE NOCASE');
            params.push(filter.make);
        }
        if (filter.model !== undefined) {
            conditions.push('e.camera_model = ? COLLATE NOCASE');
            params.push(filter.model);
        }

        const rows = this.db.prepare<string[], { photo_id: number }>(`
            SELECT e.photo_id FROM exif_attributes e
            WHERE ${conditions.join(' AND ')}
            ORDER BY e.photo_id ASC
        `).all(...params);
        return rows.map(r => r.photo_id);
    }

    getLibraryStats(cameraLimit: number): LibraryStats {
        const totals = this.db.prepare<[], { total: number; processed: number | null }>(`
            SELECT COUNT(*) AS total, SUM(CASE WHEN processed_at IS NOT NULL THEN 1 ELSE 0 END) AS processed
            FROM photos
        `).get();

        const withGps = this.db.prepare<[], { count: number }>(`
            SELECT COUNT(*) AS count FROM exif_attributes
            WHERE gps_latitude IS NOT NULL AND gps_longitude IS NOT NULL
        `).get();

        const topCameras = this.db.prepare<[number], CameraTotal>(`
            SELECT camera_make, camera_model, COUNT(*) AS photos
            FROM exif_attributes
            WHERE camera_make IS NOT NULL OR camera_model IS NOT NULL
            GROUP BY camera_make, camera_model
            ORDER BY photos DESC, camera_make ASC, camera_model ASC
            LIMIT ?
        `).all(cameraLimit);

        return {
            totalPhotos: totals?.total ?? 0,
            processedPhotos: totals?.processed ?? 0,
            photosWithGps: withGps?.count ?? 0,
            topCameras
        };
    }
}
