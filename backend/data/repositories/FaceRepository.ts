import type Database from 'better-sqlite3';
import type { FaceDetectionInput, FaceDetectionRecord, FaceSummaryRecord, KnownFaceId, PhotoId } from '../../core/types';
import { type BoxColumns, decodeVector, encodeVector, fromBoxColumns, placeholders, toBoxColumns } from '../../utils/dbHelpers';

interface FaceRow extends BoxColumns {
    id: number;
    photo_id: number;
    known_face_id: number | null;
    known_face_name: string | null;
    encoding: Buffer | null;
    match_confidence: number | null;
    model_id: string;
}

interface FaceInsertParams extends BoxColumns {
    photo_id: number;
    known_face_id: number | null;
    encoding: Buffer | null;
    match_confidence: number | null;
    model_id: string;
}

export interface FaceToStore {
    detection: FaceDetectionInput;
    knownFaceId: KnownFaceId | null;
}

export interface FaceStats {
    totalFaceDetections: number;
    recognizedFaces: number;
    unrecognizedFaces: number;
}

/** Detected faces and the per-photo face summary. */
export class FaceRepository {
    constructor(private readonly db: Database.Database) { }

    private static parseFace(row: FaceRow): FaceDetectionRecord {
        return {
            id: row.id,
            photo_id: row.photo_id,
            known_face_id: row.known_face_id,
            known_face_name: row.known_face_name,
            box: fromBoxColumns(row),
            encoding: row.encoding ? decodeVector(row.encoding) : null,
            match_confidence: row.match_confidence,
            model_id: row.model_id
        };
    }

    deleteForPhoto(photoId: PhotoId) {
        this.db.prepare<[number]>('DELETE FROM face_summaries WHERE photo_id = ?').run(photoId);
        this.db.prepare<[number]>('DELETE FROM face_detections WHERE photo_id = ?').run(photoId);
    }

    insertFaces(photoId: PhotoId, faces: FaceToStore[]) {
        const insert = this.db.prepare<[FaceInsertParams]>(`
            INSERT INTO face_detections (photo_id, known_face_id, box_x, box_y, box_width, box_height, box_unit, encoding, match_confidence, model_id)
            VALUES (@photo_id, @known_face_id, @box_x, @box_y, @box_width, @box_height, @box_unit, @encoding, @match_confidence, @model_id)
        `);
        for (const { detection, knownFaceId } of faces) {
            insert.run({
                photo_id: photoId,
                known_face_id: knownFaceId,
                ...toBoxColumns(detection.boundingBox),
                encoding: detection.encoding ? encodeVector(detection.encoding) : null,
                match_confidence: detection.matchConfidence ?? null,
                model_id: detection.modelId
            });
        }
    }

    /** Counts the stored face rows; a photo with no faces still gets a zeroed row. */
    rebuildSummary(photoId: PhotoId) {
        this.db.prepare<[number, number]>(`
            INSERT INTO face_summaries (photo_id, total_faces, recognized_faces, unrecognized_faces)
            SELECT ?, COUNT(*), COUNT(known_face_id), COUNT(*) - COUNT(known_face_id)
            FROM face_detections
            WHERE photo_id = ?
            ON CONFLICT(photo_id) DO UPDATE SET
                total_faces = excluded.total_faces,
                recognized_faces = excluded.recognized_faces,
                unrecognized_faces = excluded.unrecognized_faces
        `).run(photoId, photoId);
    }

    getFaces(photoId: PhotoId): FaceDetectionRecord[] {
        const rows = this.db.prepare<[number], FaceRow>(`
            SELECT fd.*, kf.name AS known_face_name
            FROM face_detections fd
            LEFT JOIN known_faces kf ON fd.known_face_id = kf.id
            WHERE fd.photo_id = ?
            ORDER BY fd.id ASC
        `).all(photoId);
        return rows.map(row => FaceRepository.parseFace(row));
    }

    getSummary(photoId: PhotoId): FaceSummaryRecord | null {
        return this.db.prepare<[number], FaceSummaryRecord>(`
            SELECT photo_id, total_faces, recognized_faces, unrecognized_faces
            FROM face_summaries WHERE photo_id = ?
        `).get(photoId) ?? null;
    }

    searchByNames(names: string[]): PhotoId[] {
        const unique = [...new Set(names)];
        const rows = this.db.prepare<string[], { photo_id: number }>(`
            SELECT DISTINCT fd.photo_id
            FROM face_detections fd
            JOIN known_faces kf ON fd.known_face_id = kf.id
            WHERE kf.name IN (${placeholders(unique.length)})
            ORDER BY fd.photo_id ASC
        `).all(...unique);
        return rows.map(r => r.photo_id);
    }

    getPhotoIdsForKnownFace(knownFaceId: KnownFaceId): PhotoId[] {
        return this.db.prepare<[number], { photo_id: number }>(
            'SELECT DISTINCT photo_id FROM face_detections WHERE known_face_id = ? ORDER BY photo_id ASC'
        ).all(knownFaceId).map(r => r.photo_id);
    }

    getFaceStats(): FaceStats {
        const row = this.db.prepare<[], { total: number; recognized: number }>(`
            SELECT COUNT(*) AS total, COUNT(known_face_id) AS recognized FROM face_detections
        `).get();
        const total = row?.total ?? 0;
        const recognized = row?.recognized ?? 0;
        return {
            totalFaceDetections: total,
            recognizedFaces: recognized,
            unrecognizedFaces: total - recognized
        };
    }
}
