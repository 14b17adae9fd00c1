export type PhotoId = number;
export type KnownFaceId = number;

export type BoxUnit = 'pixel' | 'normalized';

export interface BoundingBox {
    x: number;
    y: number;
    width: number;
    height: number;
    unit: BoxUnit;
}

// --- Collaborator outputs (ingestion inputs) ---

export interface FileMetadata {
    size: number;
    format: string;
    width?: number | null;
    height?: number | null;
    /** Processing model recorded on the photo row, e.g. "yolov8n.pt". */
    modelId?: string | null;
}

export interface ObjectDetectionInput {
    classLabel: string;
    classId?: number | null;
    confidence: number;
    boundingBox: BoundingBox;
    modelId: string;
}

export interface FaceDetectionInput {
    boundingBox: BoundingBox;
    encoding?: number[] | null;
    matchedName?: string | null;
    matchConfidence?: number | null;
    modelId: string;
}

/** Flat map as produced by an EXIF reader; any subset of keys may be absent. */
export type ExifInput = Record<string, unknown>;

// --- Persisted records ---

export interface PhotoRecord {
    id: PhotoId;
    file_path: string;
    file_name: string;
    file_size: number | null;
    format: string | null;
    width: number | null;
    height: number | null;
    model_id: string | null;
    created_at: string;
    updated_at: string;
    processed_at: string | null;
}

export interface ExifAttributes {
    camera_make: string | null;
    camera_model: string | null;
    software: string | null;
    exposure_time: number | null;
    f_number: number | null;
    iso: number | null;
    focal_length: number | null;
    gps_latitude: number | null;
    gps_longitude: number | null;
    gps_altitude: number | null;
    captured_at: string | null;
}

export interface ExifRecord extends ExifAttributes {
    id: number;
    photo_id: PhotoId;
}

export interface ObjectDetectionRecord {
    id: number;
    photo_id: PhotoId;
    class_label: string;
    class_id: number | null;
    confidence: number;
    box: BoundingBox;
    model_id: string;
}

export interface ObjectSummaryRecord {
    photo_id: PhotoId;
    class_label: string;
    total_count: number;
    avg_confidence: number;
    max_confidence: number;
}

export interface FaceDetectionRecord {
    id: number;
    photo_id: PhotoId;
    known_face_id: KnownFaceId | null;
    known_face_name: string | null;
    box: BoundingBox;
    encoding: number[] | null;
    match_confidence: number | null;
    model_id: string;
}

export interface FaceSummaryRecord {
    photo_id: PhotoId;
    total_faces: number;
    recognized_faces: number;
    unrecognized_faces: number;
}

export interface KnownFace {
    id: KnownFaceId;
    name: string;
    encoding: number[];
    source_image_path: string;
    created_at: string;
}

// --- Query results ---

export interface PhotoDetail {
    photo: PhotoRecord;
    exif: ExifRecord | null;
    objects: ObjectDetectionRecord[];
    objectSummaries: ObjectSummaryRecord[];
    faces: FaceDetectionRecord[];
    faceSummary: FaceSummaryRecord | null;
}

export interface ClassTotal {
    class_label: string;
    total: number;
}

export interface CameraTotal {
    camera_make: string | null;
    camera_model: string | null;
    photos: number;
}

export interface Stats {
    totalPhotos: number;
    processedPhotos: number;
    totalObjectDetections: number;
    topClasses: ClassTotal[];
    photosWithGps: number;
    totalKnownFaces: number;
    totalFaceDetections: number;
    recognizedFaces: number;
    unrecognizedFaces: number;
    topCameras: CameraTotal[];
}

export interface Pagination {
    limit?: number;
    offset?: number;
}

export interface PhotoListItem extends PhotoRecord {
    object_classes: number;
}

export interface PhotoPage {
    photos: PhotoListItem[];
    total: number;
}

export interface CameraFilter {
    make?: string;
    model?: string;
}
