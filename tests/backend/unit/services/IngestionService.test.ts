/**
 * IngestionService Unit Tests
 *
 * Runs the write path against an in-memory SQLite database through the store.
 * Following testing-master.md guidelines: Test Behavior, Not Implementation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { PhotoMetadataStore } from '../../../../backend/MetadataStore';
import { IngestionError, NotFoundError, StorageError, ValidationError } from '../../../../backend/errors';
import logger from '../../../../backend/logger';
import {
    countRows,
    createTestStore,
    encoding,
    faceDetection,
    fileMeta,
    objectDetection
} from '../../mocks/mockDatabase';

describe('IngestionService', () => {
    let db: Database.Database;
    let store: PhotoMetadataStore;

    beforeEach(() => {
        ({ db, store } = createTestStore());
    });

    afterEach(() => {
        db.close();
    });

    // ==========================================
    // ingestPhoto
    // ==========================================
    describe('ingestPhoto', () => {
        it('should store the photo row with file metadata', () => {
            // Act
            const id = store.ingestPhoto('/photos/beach/a.jpg', fileMeta({ size: 4096 }), null, [], []);

            // Assert
            const { photo } = store.getPhotoInfo(id);
            expect(photo.file_path).toBe('/photos/beach/a.jpg');
            expect(photo.file_name).toBe('a.jpg');
            expect(photo.file_size).toBe(4096);
            expect(photo.format).toBe('jpeg');
            expect(photo.width).toBe(640);
            expect(photo.height).toBe(480);
            expect(photo.model_id).toBe('yolov8n.pt');
            expect(photo.processed_at).not.toBeNull();
        });

        it('should compute object summaries from the stored detections', () => {
            // Act
            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [
                objectDetection('person', 0.9),
                objectDetection('person', 0.7),
                objectDetection('car', 0.8)
            ], []);

            // Assert
            const { objects, objectSummaries } = store.getPhotoInfo(id);
            expect(objects).toHaveLength(3);
            expect(objectSummaries.map(s => [s.class_label, s.total_count])).toEqual([['person', 2], ['car', 1]]);
            expect(objectSummaries[0].avg_confidence).toBeCloseTo(0.8, 10);
            expect(objectSummaries[0].max_confidence).toBe(0.9);
            expect(objectSummaries[1].avg_confidence).toBeCloseTo(0.8, 10);
        });

        it('should keep bounding boxes and class ids', () => {
            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [
                objectDetection('dog', 0.6, { classId: 16, boundingBox: { x: 0.1, y: 0.2, width: 0.3, height: 0.4, unit: 'normalized' } })
            ], []);

            const [detection] = store.getPhotoInfo(id).objects;
            expect(detection.class_id).toBe(16);
            expect(detection.box).toEqual({ x: 0.1, y: 0.2, width: 0.3, height: 0.4, unit: 'normalized' });
            expect(detection.model_id).toBe('yolov8n.pt');
        });

        it('should drop detections below the configured minimum confidence', () => {
            // Arrange
            db.close();
            ({ db, store } = createTestStore({ ingestion: { minConfidence: 0.5 } }));

            // Act
            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [
                objectDetection('person', 0.9),
                objectDetection('cat', 0.3),
                objectDetection('dog', 0.5)
            ], []);

            // Assert
            expect(store.getPhotoInfo(id).objects.map(o => o.class_label)).toEqual(['person', 'dog']);
        });

        it('should store normalized EXIF attributes', () => {
            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), {
                Make: 'Canon',
                Model: 'EOS R5',
                ISO: 400,
                DateTimeOriginal: '2023:06:15 14:30:00'
            }, [], []);

            const { exif } = store.getPhotoInfo(id);
            expect(exif?.camera_make).toBe('Canon');
            expect(exif?.camera_model).toBe('EOS R5');
            expect(exif?.iso).toBe(400);
            expect(exif?.captured_at).toBe('2023-06-15T14:30:00');
            expect(exif?.photo_id).toBe(id);
        });

        it('should not write an EXIF row when no attribute survives', () => {
            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), { Make: '   ' }, [], []);

            expect(store.getPhotoInfo(id).exif).toBeNull();
            expect(countRows(db, 'exif_attributes')).toBe(0);
        });

        it('should replace all prior rows when a photo is ingested again', () => {
            // Arrange
            const first = store.ingestPhoto('/photos/a.jpg', fileMeta(), { Make: 'Canon' }, [
                objectDetection('person', 0.9),
                objectDetection('person', 0.8)
            ], [faceDetection()]);

            // Act
            const second = store.ingestPhoto('/photos/a.jpg', fileMeta({ size: 9999 }), null, [
                objectDetection('car', 0.7)
            ], []);

            // Assert
            expect(second).toBe(first);
            const info = store.getPhotoInfo(first);
            expect(info.photo.file_size).toBe(9999);
            expect(info.exif).toBeNull();
            expect(info.objects.map(o => o.class_label)).toEqual(['car']);
            expect(info.objectSummaries.map(s => s.class_label)).toEqual(['car']);
            expect(info.faces).toEqual([]);
            expect(info.faceSummary).toEqual({ photo_id: first, total_faces: 0, recognized_faces: 0, unrecognized_faces: 0 });
            expect(countRows(db, 'photos')).toBe(1);
        });

        it('should be idempotent for the same inputs', () => {
            const objects = [objectDetection('person', 0.9), objectDetection('car', 0.5)];
            const faces = [faceDetection({ encoding: encoding(4) })];

            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), { Make: 'Canon' }, objects, faces);
            const before = store.getPhotoInfo(id);
            store.ingestPhoto('/photos/a.jpg', fileMeta(), { Make: 'Canon' }, objects, faces);
            const after = store.getPhotoInfo(id);

            expect(after.objectSummaries).toEqual(before.objectSummaries);
            expect(after.faceSummary).toEqual(before.faceSummary);
            expect(countRows(db, 'object_detections')).toBe(2);
            expect(countRows(db, 'face_detections')).toBe(1);
            expect(countRows(db, 'exif_attributes')).toBe(1);
        });

        it('should keep the created timestamp on re-ingestion', () => {
            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [], []);
            const createdAt = store.getPhotoInfo(id).photo.created_at;

            store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [], []);

            expect(store.getPhotoInfo(id).photo.created_at).toBe(createdAt);
        });

        it('should bind matched faces to enrolled known faces', () => {
            // Arrange
            const johnId = store.enrollKnownFace('John_Doe', encoding(4), '/known/John_Doe/1.jpg');
            const warnSpy = vi.spyOn(logger, 'warn');

            // Act
            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [], [
                faceDetection({ matchedName: 'John_Doe', matchConfidence: 0.75 }),
                faceDetection({ matchedName: 'Nobody_Known' }),
                faceDetection()
            ]);

            // Assert
            const { faces, faceSummary } = store.getPhotoInfo(id);
            expect(faces.map(f => f.known_face_id)).toEqual([johnId, null, null]);
            expect(faces[0].known_face_name).toBe('John_Doe');
            expect(faces[0].match_confidence).toBe(0.75);
            expect(faceSummary).toEqual({ photo_id: id, total_faces: 3, recognized_faces: 1, unrecognized_faces: 2 });
            expect(warnSpy).toHaveBeenCalledTimes(1);
        });

        it('should bind a shared name to its oldest enrollment', () => {
            const firstAnn = store.enrollKnownFace('Ann', encoding(4), '/known/Ann/1.jpg');
            store.enrollKnownFace('Ann', encoding(4, 1), '/known/Ann/2.jpg');

            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [], [faceDetection({ matchedName: 'Ann' })]);

            expect(store.getPhotoInfo(id).faces[0].known_face_id).toBe(firstAnn);
        });

        it('should round-trip face encodings', () => {
            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [], [
                faceDetection({ encoding: [0.5, -0.25, 1.75] })
            ]);

            expect(store.getPhotoInfo(id).faces[0].encoding).toEqual([0.5, -0.25, 1.75]);
        });

        it('should write a zeroed face summary for a photo without faces', () => {
            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [objectDetection('tree', 0.9)], []);

            expect(store.getPhotoInfo(id).faceSummary).toEqual({
                photo_id: id, total_faces: 0, recognized_faces: 0, unrecognized_faces: 0
            });
        });

        it('should reject invalid input before writing anything', () => {
            // Act
            let caught: unknown;
            try {
                store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [objectDetection('person', 1.2)], []);
            } catch (e) {
                caught = e;
            }

            // Assert
            expect(caught).toBeInstanceOf(ValidationError);
            expect(caught).toBeInstanceOf(IngestionError);
            expect(countRows(db, 'photos')).toBe(0);
        });

        it('should reject an empty path', () => {
            expect(() => store.ingestPhoto('', fileMeta(), null, [], [])).toThrow(ValidationError);
        });

        it('should reject face encodings of the wrong length', () => {
            db.close();
            ({ db, store } = createTestStore({ faces: { encodingLength: 4 } }));

            expect(() => store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [], [
                faceDetection({ encoding: encoding(3) })
            ])).toThrow(ValidationError);
            expect(countRows(db, 'photos')).toBe(0);

            store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [], [faceDetection({ encoding: encoding(4) })]);
            expect(countRows(db, 'face_detections')).toBe(1);
        });

        it('should roll back and raise StorageError when a statement fails', () => {
            // Arrange
            vi.spyOn(console, 'error').mockImplementation(() => { });
            db.exec('DROP TABLE face_summaries');

            // Act
            let caught: unknown;
            try {
                store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [objectDetection('person', 0.9)], []);
            } catch (e) {
                caught = e;
            }

            // Assert
            expect(caught).toBeInstanceOf(StorageError);
            if (caught instanceof StorageError) {
                expect(caught.operation).toBe('ingestPhoto');
                expect(caught.filePath).toBe('/photos/a.jpg');
                expect(caught.code).toBe('SQLITE_ERROR');
            }
            expect(countRows(db, 'photos')).toBe(0);
            expect(countRows(db, 'object_detections')).toBe(0);
        });
    });

    // ==========================================
    // enrollKnownFace
    // ==========================================
    describe('enrollKnownFace', () => {
        it('should store the name and decoded encoding', () => {
            const id = store.enrollKnownFace('Jane_Smith', [0.5, 0.75], '/known/Jane_Smith/1.jpg');

            expect(store.listKnownFaces()).toEqual([expect.objectContaining({
                id,
                name: 'Jane_Smith',
                encoding: [0.5, 0.75],
                source_image_path: '/known/Jane_Smith/1.jpg'
            })]);
        });

        it('should update the row enrolled from the same source image', () => {
            const first = store.enrollKnownFace('Jane', [0.5], '/known/1.jpg');
            const second = store.enrollKnownFace('Jane_Smith', [0.25], '/known/1.jpg');

            expect(second).toBe(first);
            const faces = store.listKnownFaces();
            expect(faces).toHaveLength(1);
            expect(faces[0].name).toBe('Jane_Smith');
            expect(faces[0].encoding).toEqual([0.25]);
        });

        it('should enforce the configured encoding length', () => {
            db.close();
            ({ db, store } = createTestStore({ faces: { encodingLength: 128 } }));

            expect(() => store.enrollKnownFace('Jane', encoding(4), '/known/1.jpg')).toThrow(ValidationError);
            expect(store.enrollKnownFace('Jane', encoding(128), '/known/1.jpg')).toBe(1);
        });

        it('should not touch per-photo tables', () => {
            store.enrollKnownFace('Jane', [0.5], '/known/1.jpg');

            expect(countRows(db, 'photos')).toBe(0);
            expect(countRows(db, 'face_detections')).toBe(0);
        });
    });

    // ==========================================
    // deleteKnownFace
    // ==========================================
    describe('deleteKnownFace', () => {
        it('should unbind detections and recompute affected summaries', () => {
            // Arrange
            const john = store.enrollKnownFace('John_Doe', [0.5], '/known/john.jpg');
            store.enrollKnownFace('Jane_Smith', [0.75], '/known/jane.jpg');
            const photoA = store.ingestPhoto('/photos/a.jpg', fileMeta(), null, [], [
                faceDetection({ matchedName: 'John_Doe' }),
                faceDetection()
            ]);
            const photoB = store.ingestPhoto('/photos/b.jpg', fileMeta(), null, [], [
                faceDetection({ matchedName: 'Jane_Smith' })
            ]);

            // Act
            store.deleteKnownFace(john);

            // Assert
            const a = store.getPhotoInfo(photoA);
            expect(a.faces.map(f => f.known_face_id)).toEqual([null, null]);
            expect(a.faceSummary).toEqual({ photo_id: photoA, total_faces: 2, recognized_faces: 0, unrecognized_faces: 2 });
            expect(store.getPhotoInfo(photoB).faceSummary?.recognized_faces).toBe(1);
            expect(store.listKnownFaces().map(f => f.name)).toEqual(['Jane_Smith']);
            expect(store.searchByFaces(['John_Doe'])).toEqual([]);
        });

        it('should raise NotFoundError for an unknown id', () => {
            expect(() => store.deleteKnownFace(99)).toThrow(NotFoundError);
        });

        it('should reject a non-positive id', () => {
            expect(() => store.deleteKnownFace(0)).toThrow(ValidationError);
        });
    });

    // ==========================================
    // deletePhoto
    // ==========================================
    describe('deletePhoto', () => {
        it('should remove the photo and every dependent row', () => {
            const id = store.ingestPhoto('/photos/a.jpg', fileMeta(), { Make: 'Canon' }, [objectDetection('person', 0.9)], [faceDetection()]);

            store.deletePhoto(id);

            for (const table of ['photos', 'exif_attributes', 'object_detections', 'object_summaries', 'face_detections', 'face_summaries']) {
                expect(countRows(db, table)).toBe(0);
            }
        });

        it('should raise NotFoundError for an unknown id', () => {
            expect(() => store.deletePhoto(42)).toThrow('Photo 42 not found');
        });
    });
});
