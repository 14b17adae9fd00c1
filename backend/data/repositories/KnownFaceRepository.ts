import type Database from 'better-sqlite3';
import type { KnownFace, KnownFaceId } from '../../core/types';
import { decodeVector, encodeVector } from '../../utils/dbHelpers';

interface KnownFaceRow {
    id: number;
    name: string;
    encoding: Buffer;
    source_image_path: string;
    created_at: string;
}

interface KnownFaceUpsertParams {
    name: string;
    encoding: Buffer;
    encoding_length: number;
    source_image_path: string;
    created_at: string;
}

export class KnownFaceRepository {
    constructor(private readonly db: Database.Database) { }

    /** One row per source image; enrolling the same image again replaces name and encoding. */
    upsertKnownFace(name: string, encoding: number[], sourceImagePath: string, now: string): KnownFaceId {
        const row = this.db.prepare<[KnownFaceUpsertParams], { id: number }>(`
            INSERT INTO known_faces (name, encoding, encoding_length, source_image_path, created_at)
            VALUES (@name, @encoding, @encoding_length, @source_image_path, @created_at)
            ON CONFLICT(source_image_path) DO UPDATE SET
                name = excluded.name,
                encoding = excluded.encoding,
                encoding_length = excluded.encoding_length
            RETURNING id
        `).get({
            name,
            encoding: encodeVector(encoding),
            encoding_length: encoding.length,
            source_image_path: sourceImagePath,
            created_at: now
        });

        if (!row) throw new Error(`KnownFaceRepository.upsertKnownFace returned no id for ${sourceImagePath}`);
        return row.id;
    }

    /** Oldest enrollment carrying `name`, which is the one detections bind to. */
    findIdByName(name: string): KnownFaceId | null {
        const row = this.db.prepare<[string], { id: number }>(
            'SELECT id FROM known_faces WHERE name = ? ORDER BY id ASC LIMIT 1'
        ).get(name);
        return row ? row.id : null;
    }

    getAll(): KnownFace[] {
        return this.db.prepare<[], KnownFaceRow>(
            'SELECT id, name, encoding, source_image_path, created_at FROM known_faces ORDER BY id ASC'
        ).all().map(row => ({ ...row, encoding: decodeVector(row.encoding) }));
    }

    deleteKnownFace(id: KnownFaceId): boolean {
        return this.db.prepare<[number]>('DELETE FROM known_faces WHERE id = ?').run(id).changes > 0;
    }

    count(): number {
        return this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM known_faces').get()?.count ?? 0;
    }
}
