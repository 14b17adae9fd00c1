import type Database from 'better-sqlite3';
import type { ExifAttributes, ExifRecord, PhotoId } from '../../core/types';

export class ExifRepository {
    constructor(private readonly db: Database.Database) { }

    deleteForPhoto(photoId: PhotoId) {
        this.db.prepare<[number]>('DELETE FROM exif_attributes WHERE photo_id = ?').run(photoId);
    }

    insert(photoId: PhotoId, attributes: ExifAttributes) {
        this.db.prepare<[ExifAttributes & { photo_id: PhotoId }]>(`
            INSERT INTO exif_attributes (
                photo_id, camera_make, camera_model, software, exposure_time, f_number, iso,
                focal_length, gps_latitude, gps_longitude, gps_altitude, captured_at
            ) VALUES (
                @photo_id, @camera_make, @camera_model, @software, @exposure_time, @f_number, @iso,
                @focal_length, @gps_latitude, @gps_longitude, @gps_altitude, @captured_at
            )
        `).run({ photo_id: photoId, ...attributes });
    }

    getForPhoto(photoId: PhotoId): ExifRecord | null {
        return this.db.prepare<[number], ExifRecord>('SELECT * FROM exif_attributes WHERE photo_id = ?').get(photoId) ?? null;
    }
}
