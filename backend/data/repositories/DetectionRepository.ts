import type Database from 'better-sqlite3';
import type { ClassTotal, ObjectDetectionInput, ObjectDetectionRecord, ObjectSummaryRecord, PhotoId } from '../../core/types';
import { type BoxColumns, fromBoxColumns, placeholders, toBoxColumns } from '../../utils/dbHelpers';

interface ObjectDetectionRow extends BoxColumns {
    id: number;
    photo_id: number;
    class_label: string;
    class_id: number | null;
    confidence: number;
    model_id: string;
}

type ObjectInsertParams = Omit<ObjectDetectionRow, 'id'>;

/** Raw object detections and their per-class summaries. */
export class DetectionRepository {
    constructor(private readonly db: Database.Database) { }

    deleteForPhoto(photoId: PhotoId) {
        this.db.prepare<[number]>('DELETE FROM object_summaries WHERE photo_id = ?').run(photoId);
        this.db.prepare<[number]>('DELETE FROM object_detections WHERE photo_id = ?').run(photoId);
    }

    insertDetections(photoId: PhotoId, detections: ObjectDetectionInput[]) {
        const insert = this.db.prepare<[ObjectInsertParams]>(`
            INSERT INTO object_detections (photo_id, class_label, class_id, confidence, box_x, box_y, box_width, box_height, box_unit, model_id)
            VALUES (@photo_id, @class_label, @class_id, @confidence, @box_x, @box_y, @box_width, @box_height, @box_unit, @model_id)
        `);
        for (const d of detections) {
            insert.run({
                photo_id: photoId,
                class_label: d.classLabel,
                class_id: d.classId ?? null,
                confidence: d.confidence,
                ...toBoxColumns(d.boundingBox),
                model_id: d.modelId
            });
        }
    }

    /** Derives the summary rows from the stored detections, never from caller input. */
    rebuildSummaries(photoId: PhotoId) {
        this.db.prepare<[number]>('DELETE FROM object_summaries WHERE photo_id = ?').run(photoId);
        this.db.prepare<[number]>(`
            INSERT INTO object_summaries (photo_id, class_label, total_count, avg_confidence, max_confidence)
            SELECT photo_id, class_label, COUNT(*), AVG(confidence), MAX(confidence)
            FROM object_detections
            WHERE photo_id = ?
            GROUP BY photo_id, class_label
        `).run(photoId);
    }

    getDetections(photoId: PhotoId): ObjectDetectionRecord[] {
        const rows = this.db.prepare<[number], ObjectDetectionRow>(
            'SELECT * FROM object_detections WHERE photo_id = ? ORDER BY id ASC'
        ).all(photoId);
        return rows.map(row => ({
            id: row.id,
            photo_id: row.photo_id,
            class_label: row.class_label,
            class_id: row.class_id,
            confidence: row.confidence,
            box: fromBoxColumns(row),
            model_id: row.model_id
        }));
    }

    getSummaries(photoId: PhotoId): ObjectSummaryRecord[] {
        return this.db.prepare<[number], ObjectSummaryRecord>(`
            SELECT photo_id, class_label, total_count, avg_confidence, max_confidence
            FROM object_summaries
            WHERE photo_id = ?
            ORDER BY total_count DESC, class_label ASC
        `).all(photoId);
    }

    /**
     * Photos holding every one of `classNames`, each with at least `minCount`
     * detections. Duplicate names count once.
     */
    searchByClasses(classNames: string[], minCount: number): PhotoId[] {
        const unique = [...new Set(classNames)];
        const rows = this.db.prepare<(string | number)[], { photo_id: number }>(`
            SELECT photo_id FROM object_summaries
            WHERE class_label IN (${placeholders(unique.length)}) AND total_count >= ?
            GROUP BY photo_id
            HAVING COUNT(DISTINCT class_label) = ?
            ORDER BY photo_id ASC
        `).all(...unique, minCount, unique.length);
        return rows.map(r => r.photo_id);
    }

    countDetections(): number {
        return this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM object_detections').get()?.count ?? 0;
    }

    getTopClasses(limit: number): ClassTotal[] {
        return this.db.prepare<[number], ClassTotal>(`
            SELECT class_label, SUM(total_count) AS total
            FROM object_summaries
            GROUP BY class_label
            ORDER BY total DESC, class_label ASC
            LIMIT ?
        `).all(limit);
    }
}
