import { z } from 'zod';
import { ValidationError } from '../../errors';

const finiteNonNegative = z.number().finite().nonnegative();
const unitInterval = z.number().finite().min(0).max(1);
// File paths keep their exact value; only blank ones are rejected
const nonBlankPath = (label: string) => z.string().refine(s => s.trim().length > 0, `${label} must not be empty`);

export const BoundingBoxSchema = z.object({
    x: finiteNonNegative,
    y: finiteNonNegative,
    width: finiteNonNegative,
    height: finiteNonNegative,
    unit: z.enum(['pixel', 'normalized']).default('pixel')
}).refine(
    box => box.unit === 'pixel' || [box.x, box.y, box.width, box.height].every(v => v <= 1),
    { message: 'normalized box coordinates must lie in [0, 1]' }
);

export const FileMetadataSchema = z.object({
    size: z.number().int().nonnegative(),
    format: z.string().trim().min(1),
    width: z.number().int().positive().nullish(),
    height: z.number().int().positive().nullish(),
    modelId: z.string().trim().min(1).nullish()
});

export const ObjectDetectionSchema = z.object({
    classLabel: z.string().trim().min(1),
    classId: z.number().int().nonnegative().nullish(),
    confidence: unitInterval,
    boundingBox: BoundingBoxSchema,
    modelId: z.string().trim().min(1)
});

const EncodingSchema = z.array(z.number().finite()).min(1);

/** `null` accepts encodings of any non-zero length. */
function encodingSchema(encodingLength: number | null) {
    return encodingLength === null
        ? EncodingSchema
        : EncodingSchema.length(encodingLength, `encoding must have ${encodingLength} values`);
}

export function faceDetectionSchema(encodingLength: number | null) {
    return z.object({
        boundingBox: BoundingBoxSchema,
        encoding: encodingSchema(encodingLength).nullish(),
        matchedName: z.string().trim().min(1).nullish(),
        matchConfidence: unitInterval.nullish(),
        modelId: z.string().trim().min(1)
    });
}

export function photoIngestSchema(encodingLength: number | null) {
    return z.object({
        path: nonBlankPath('path'),
        fileMeta: FileMetadataSchema,
        exif: z.record(z.unknown()).nullish(),
        objects: z.array(ObjectDetectionSchema),
        faces: z.array(faceDetectionSchema(encodingLength))
    });
}

export function enrollmentSchema(encodingLength: number | null) {
    return z.object({
        name: z.string().trim().min(1, 'name must not be empty'),
        encoding: encodingSchema(encodingLength),
        sourceImagePath: nonBlankPath('sourceImagePath')
    });
}

export const ClassSearchSchema = z.object({
    classNames: z.array(z.string().trim().min(1)).min(1, 'at least one class name is required'),
    minCount: z.number().int().min(1)
});

export const NameSearchSchema = z.array(z.string().trim().min(1)).min(1, 'at least one name is required');

export const CameraFilterSchema = z.object({
    make: z.string().trim().min(1).optional(),
    model: z.string().trim().min(1).optional()
}).refine(f => f.make !== undefined || f.model !== undefined, { message: 'make or model is required' });

export const PaginationSchema = z.object({
    limit: z.number().int().positive().optional(),
    offset: z.number().int().nonnegative().optional()
});

export const IdSchema = z.number().int().positive();

/** Parses `input` or throws ValidationError with one line per zod issue. */
export function validate<T extends z.ZodTypeAny>(schema: T, input: unknown, operation: string): z.infer<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        );
        throw new ValidationError(operation, issues);
    }
    return result.data;
}
