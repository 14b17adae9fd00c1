import type Database from 'better-sqlite3';
import { SchemaError } from '../errors';
import logger from '../logger';

interface TableDefinition {
    name: string;
    ddl: string;
    columns: string[];
}

const BOX_COLUMNS = ['box_x', 'box_y', 'box_width', 'box_height', 'box_unit'];

export const TABLES: TableDefinition[] = [
    {
        name: 'photos',
        ddl: `
            CREATE TABLE IF NOT EXISTS photos (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                file_path TEXT UNIQUE NOT NULL,
                file_name TEXT NOT NULL,
                file_size INTEGER,
                format TEXT,
                width INTEGER,
                height INTEGER,
                model_id TEXT,
                created_at TEXT NOT NULL,
                updated_at TEXT NOT NULL,
                processed_at TEXT
            )`,
        columns: ['id', 'file_path', 'file_name', 'file_size', 'format', 'width', 'height', 'model_id', 'created_at', 'updated_at', 'processed_at']
    },
    {
        name: 'exif_attributes',
        ddl: `
            CREATE TABLE IF NOT EXISTS exif_attributes (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                photo_id INTEGER UNIQUE NOT NULL,
                camera_make TEXT,
                camera_model TEXT,
                software TEXT,
                exposure_time REAL,
                f_number REAL,
                iso INTEGER,
                focal_length REAL,
                gps_latitude REAL,
                gps_longitude REAL,
                gps_altitude REAL,
                captured_at TEXT,
                FOREIGN KEY (photo_id) REFERENCES photos(id) ON DELETE CASCADE
            )`,
        columns: ['id', 'photo_id', 'camera_make', 'camera_model', 'software', 'exposure_time', 'f_number', 'iso', 'focal_length', 'gps_latitude', 'gps_longitude', 'gps_altitude', 'captured_at']
    },
    {
        name: 'object_detections',
        ddl: `
            CREATE TABLE IF NOT EXISTS object_detections (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                photo_id INTEGER NOT NULL,
                class_label TEXT NOT NULL,
                class_id INTEGER,
                confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
                box_x REAL NOT NULL,
                box_y REAL NOT NULL,
                box_width REAL NOT NULL,
                box_height REAL NOT NULL,
                box_unit TEXT NOT NULL CHECK (box_unit IN ('pixel', 'normalized')),
                model_id TEXT NOT NULL,
                FOREIGN KEY (photo_id) REFERENCES photos(id) ON DELETE CASCADE
            )`,
        columns: ['id', 'photo_id', 'class_label', 'class_id', 'confidence', ...BOX_COLUMNS, 'model_id']
    },
    {
        name: 'object_summaries',
        ddl: `
            CREATE TABLE IF NOT EXISTS object_summaries (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                photo_id INTEGER NOT NULL,
                class_label TEXT NOT NULL,
                total_count INTEGER NOT NULL,
                avg_confidence REAL NOT NULL,
                max_confidence REAL NOT NULL,
                FOREIGN KEY (photo_id) REFERENCES photos(id) ON DELETE CASCADE
            )`,
        columns: ['id', 'photo_id', 'class_label', 'total_count', 'avg_confidence', 'max_confidence']
    },
    {
        name: 'known_faces',
        ddl: `
            CREATE TABLE IF NOT EXISTS known_faces (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                name TEXT NOT NULL,
                encoding BLOB NOT NULL,
                encoding_length INTEGER NOT NULL,
                source_image_path TEXT UNIQUE NOT NULL,
                created_at TEXT NOT NULL
            )`,
        columns: ['id', 'name', 'encoding', 'encoding_length', 'source_image_path', 'created_at']
    },
    {
        name: 'face_detections',
        ddl: `
            CREATE TABLE IF NOT EXISTS face_detections (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                photo_id INTEGER NOT NULL,
                known_face_id INTEGER,
                box_x REAL NOT NULL,
                box_y REAL NOT NULL,
                box_width REAL NOT NULL,
                box_height REAL NOT NULL,
                box_unit TEXT NOT NULL CHECK (box_unit IN ('pixel', 'normalized')),
                encoding BLOB,
                match_confidence REAL CHECK (match_confidence IS NULL OR (match_confidence >= 0 AND match_confidence <= 1)),
                model_id TEXT NOT NULL,
                FOREIGN KEY (photo_id) REFERENCES photos(id) ON DELETE CASCADE,
                FOREIGN KEY (known_face_id) REFERENCES known_faces(id) ON DELETE SET NULL
            )`,
        columns: ['id', 'photo_id', 'known_face_id', ...BOX_COLUMNS, 'encoding', 'match_confidence', 'model_id']
    },
    {
        name: 'face_summaries',
        ddl: `
            CREATE TABLE IF NOT EXISTS face_summaries (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                photo_id INTEGER UNIQUE NOT NULL,
                total_faces INTEGER NOT NULL,
                recognized_faces INTEGER NOT NULL,
                unrecognized_faces INTEGER NOT NULL,
                FOREIGN KEY (photo_id) REFERENCES photos(id) ON DELETE CASCADE
            )`,
        columns: ['id', 'photo_id', 'total_faces', 'recognized_faces', 'unrecognized_faces']
    }
];

export const INDEXES = [
    'CREATE UNIQUE INDEX IF NOT EXISTS idx_photos_file_path ON photos(file_path)',
    'CREATE INDEX IF NOT EXISTS idx_object_detections_photo_id ON object_detections(photo_id)',
    'CREATE INDEX IF NOT EXISTS idx_object_detections_class_label ON object_detections(class_label)',
    'CREATE UNIQUE INDEX IF NOT EXISTS idx_object_summaries_photo_class ON object_summaries(photo_id, class_label)',
    'CREATE INDEX IF NOT EXISTS idx_face_detections_photo_id ON face_detections(photo_id)',
    'CREATE INDEX IF NOT EXISTS idx_face_detections_known_face_id ON face_detections(known_face_id)',
    'CREATE INDEX IF NOT EXISTS idx_known_faces_name ON known_faces(name)',
    'CREATE INDEX IF NOT EXISTS idx_exif_attributes_camera ON exif_attributes(camera_make, camera_model)'
];

export class SchemaManager {
    constructor(private readonly db: Database.Database) { }

    /**
     * Creates missing tables and indexes, then checks every table carries the
     * expected columns. Throws SchemaError on any DDL failure or mismatch.
     */
    ensureSchema() {
        try {
            const create = this.db.transaction(() => {
                for (const table of TABLES) this.db.exec(table.ddl);
                for (const index of INDEXES) this.db.exec(index);
            });
            create();
        } catch (e) {
            logger.error('[SchemaManager] Schema creation failed:', e);
            throw new SchemaError(`Could not create schema: ${String(e)}`, e);
        }

        const problems = this.findMissingColumns();
        if (problems.length > 0) {
            const detail = problems.map(p => `${p.table} (missing ${p.missing.join(', ')})`).join('; ');
            logger.error(`[SchemaManager] Incompatible tables: ${detail}`);
            throw new SchemaError(`Incompatible existing schema: ${detail}`);
        }

        logger.debug('[SchemaManager] Database schema ensured.');
    }

    findMissingColumns(): { table: string; missing: string[] }[] {
        const columnsOf = this.db.prepare<[string], { name: string }>('SELECT name FROM pragma_table_info(?)');
        const problems: { table: string; missing: string[] }[] = [];

        for (const table of TABLES) {
            const present = new Set(columnsOf.all(table.name).map(c => c.name));
            const missing = table.columns.filter(c => !present.has(c));
            if (missing.length > 0) problems.push({ table: table.name, missing });
        }
        return problems;
    }
}
