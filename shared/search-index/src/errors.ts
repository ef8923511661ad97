export type ErrorCode =
    | 'DOCUMENT_NOT_FOUND'
    | 'MALFORMED_DOCUMENT'
    | 'CONFIG_INVALID'
    | 'SOURCE_NOT_FOUND'
    | 'JOB_NOT_FOUND'
    | 'JOB_CONFLICT';

export class IndexSyncError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class DocumentNotFoundError extends IndexSyncError {
    constructor(index: string, id: string, options?: ErrorOptions) {
        super('DOCUMENT_NOT_FOUND', `Couldn't find document in ${index} by id ${id}`, options);
    }
}

/**
 * A source document from which no id can be derived. Fatal to the sync pass.
 */
export class MalformedDocumentError extends IndexSyncError {
    constructor(message: string) {
        super('MALFORMED_DOCUMENT', message);
    }
}

export class ConfigValidationError extends IndexSyncError {
    readonly details: string[];

    constructor(message: string, details: string[] = []) {
        super('CONFIG_INVALID', details.length > 0 ? `${message}: ${details.join('; ')}` : message);
        this.details = details;
    }
}

export class SourceNotFoundError extends IndexSyncError {
    constructor(sourceId: string) {
        super('SOURCE_NOT_FOUND', `Source not found: ${sourceId}`);
    }
}

export class JobNotFoundError extends IndexSyncError {
    constructor(jobId: string) {
        super('JOB_NOT_FOUND', `Job not found: ${jobId}`);
    }
}

export class JobConflictError extends IndexSyncError {
    constructor(sourceId: string, runningJobId: string) {
        super('JOB_CONFLICT', `Source ${sourceId} already has a running job (${runningJobId})`);
    }
}
