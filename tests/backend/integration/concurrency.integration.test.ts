/**
 * Concurrency Integration Tests
 *
 * Two connections on one temp-file database stand in for two worker processes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import path from 'node:path';
import { PhotoMetadataStore } from '../../../backend/MetadataStore';
import { StorageError } from '../../../backend/errors';
import {
    cleanupTempDir,
    countRows,
    createTempDir,
    fileMeta,
    objectDetection,
    testConfig
} from '../mocks/mockDatabase';

describe('Concurrent writers', () => {
    let dir: string;
    let dbPath: string;
    let connA: Database.Database;
    let connB: Database.Database;
    let storeA: PhotoMetadataStore;
    let storeB: PhotoMetadataStore;

    beforeEach(() => {
        dir = createTempDir();
        dbPath = path.join(dir, 'shared.db');
        connA = new Database(dbPath);
        connA.pragma('journal_mode = WAL');
        connB = new Database(dbPath);
        storeA = new PhotoMetadataStore(connA, testConfig({ database: { path: dbPath } }));
        // No waiting, so a held lock surfaces immediately
        storeB = new PhotoMetadataStore(connB, testConfig({ database: { path: dbPath, busyTimeoutMs: 0 } }));
        vi.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        connA.close();
        connB.close();
        cleanupTempDir(dir);
    });

    it('should fail a blocked writer with SQLITE_BUSY and leave no partial state', () => {
        // Arrange: connection A holds the write lock
        connA.exec('BEGIN IMMEDIATE');

        // Act
        let caught: unknown;
        try {
            storeB.ingestPhoto('/photos/b.jpg', fileMeta(), null, [objectDetection('person', 0.9)], []);
        } catch (e) {
            caught = e;
        }
        connA.exec('COMMIT');

        // Assert
        expect(caught).toBeInstanceOf(StorageError);
        if (caught instanceof StorageError) {
            expect(caught.code).toBe('SQLITE_BUSY');
            expect(caught.filePath).toBe('/photos/b.jpg');
        }
        expect(countRows(connA, 'photos')).toBe(0);
    });

    it('should let the caller retry once the lock is released', () => {
        connA.exec('BEGIN IMMEDIATE');
        expect(() => storeB.ingestPhoto('/photos/b.jpg', fileMeta(), null, [], [])).toThrow(StorageError);
        connA.exec('COMMIT');

        const id = storeB.ingestPhoto('/photos/b.jpg', fileMeta(), null, [objectDetection('person', 0.9)], []);

        expect(storeA.getPhotoInfo(id).objectSummaries).toHaveLength(1);
    });

    it('should commit distinct photos from both connections', () => {
        const a = storeA.ingestPhoto('/photos/a.jpg', fileMeta(), null, [objectDetection('car', 0.8)], []);
        const b = storeB.ingestPhoto('/photos/b.jpg', fileMeta(), null, [objectDetection('person', 0.9)], []);

        expect(storeA.listPhotos().total).toBe(2);
        expect(storeB.searchByObjects(['car'])).toEqual([a]);
        expect(storeA.searchByObjects(['person'])).toEqual([b]);
    });

    it('should end in one consistent state when both connections ingest the same path', () => {
        storeA.ingestPhoto('/photos/same.jpg', fileMeta(), null, [objectDetection('car', 0.8), objectDetection('car', 0.6)], []);
        const id = storeB.ingestPhoto('/photos/same.jpg', fileMeta(), null, [objectDetection('person', 0.9)], []);

        expect(countRows(connA, 'photos')).toBe(1);
        const info = storeA.getPhotoInfo(id);
        expect(info.objects.map(o => o.class_label)).toEqual(['person']);
        expect(info.objectSummaries).toEqual([
            { photo_id: id, class_label: 'person', total_count: 1, avg_confidence: 0.9, max_confidence: 0.9 }
        ]);
    });

    it('should not block readers while a write transaction is open', () => {
        storeA.ingestPhoto('/photos/a.jpg', fileMeta(), null, [], []);
        connA.exec('BEGIN IMMEDIATE');

        try {
            expect(storeB.listPhotos().total).toBe(1);
        } finally {
            connA.exec('COMMIT');
        }
    });
});
