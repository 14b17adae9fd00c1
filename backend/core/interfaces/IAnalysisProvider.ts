import type { FaceDetectionInput, ObjectDetectionInput } from '../types';

export interface ImageAnalysis {
    objects: ObjectDetectionInput[];
    faces: FaceDetectionInput[];
}

/** Source of detector and face-engine output for one image. */
export interface IAnalysisProvider {
    analyzeImage(filePath: string): Promise<ImageAnalysis>;
    /** Reference encoding for an enrollment image, or null when none is available. */
    encodeKnownFace(filePath: string): Promise<number[] | null>;
}
