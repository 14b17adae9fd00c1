import Database from 'better-sqlite3';

export interface ErrorContext {
    operation: string;
    cause?: unknown;
}

export class PhotoStoreError extends Error {
    readonly operation: string;

    constructor(message: string, context: ErrorContext) {
        super(message, context.cause === undefined ? undefined : { cause: context.cause });
        this.name = 'PhotoStoreError';
        this.operation = context.operation;
    }
}

export class IngestionError extends PhotoStoreError {
    constructor(message: string, context: ErrorContext) {
        super(message, context);
        this.name = 'IngestionError';
    }
}

/**
 * Malformed input, raised before any statement runs.
 * `issues` holds one human-readable line per failed field.
 */
export class ValidationError extends IngestionError {
    readonly issues: string[];

    constructor(operation: string, issues: string[]) {
        super(`Invalid input for ${operation}: ${issues.join('; ')}`, { operation });
        this.name = 'ValidationError';
        this.issues = issues;
    }
}

export class StorageError extends PhotoStoreError {
    readonly filePath: string | null;
    readonly code: string | null;

    constructor(message: string, context: ErrorContext & { filePath?: string | null }) {
        super(message, context);
        this.name = 'StorageError';
        this.filePath = context.filePath ?? null;
        this.code = context.cause instanceof Database.SqliteError ? context.cause.code : null;
    }
}

export class SchemaError extends PhotoStoreError {
    constructor(message: string, cause?: unknown) {
        super(message, { operation: 'ensureSchema', cause });
        this.name = 'SchemaError';
    }
}

export class NotFoundError extends PhotoStoreError {
    readonly entity: string;
    readonly entityId: number;

    constructor(entity: string, entityId: number, operation: string) {
        super(`${entity} ${entityId} not found`, { operation });
        this.name = 'NotFoundError';
        this.entity = entity;
        this.entityId = entityId;
    }
}

/**
 * Wraps a storage failure. Store errors pass through unchanged so that a
 * ValidationError or NotFoundError thrown inside a transaction keeps its type.
 */
export function toStorageError(error: unknown, operation: string, filePath?: string | null): PhotoStoreError {
    if (error instanceof PhotoStoreError) return error;
    const target = filePath ? ` (${filePath})` : '';
    return new StorageError(`${operation} failed${target}: ${String(error)}`, { operation, filePath, cause: error });
}
