import path from 'path';
import { AttachmentFields } from '../../sync/types';

const CONTENT_TYPES: Readonly<Record<string, string>> = {
    '.txt': 'text/plain',
    '.md': 'text/markdown',
    '.csv': 'text/csv',
    '.html': 'text/html',
    '.htm': 'text/html',
    '.json': 'application/json',
    '.js': 'application/javascript',
    '.xml': 'application/xml',
    '.pdf': 'application/pdf',
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg'
};

const TEXTUAL_APPLICATION_TYPES = new Set(['application/json', 'application/javascript', 'application/xml']);

export const contentTypeFor = (filePath: string): string =>
    CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';

export const isTextual = (contentType: string): boolean => {
    const [mediaType] = contentType.split(';');
    const normalized = mediaType.trim().toLowerCase();
    return normalized.startsWith('text/') || TEXTUAL_APPLICATION_TYPES.has(normalized);
};

/**
 * Fields merged into the indexed document once an attachment is downloaded.
 * Text content goes to `text`; anything else is base64-encoded into
 * `_attachment` for an ingest attachment pipeline.
 * Empty content yields nothing.
 */
export const extractAttachment = (
    id: string,
    content: Buffer,
    contentType: string,
    timestamp?: string
): AttachmentFields | undefined => {
    if (content.length === 0) return undefined;

    const fields: AttachmentFields = { id, content_type: contentType, size: content.length };
    if (timestamp !== undefined) {
        fields.timestamp = timestamp;
    }

    if (isTextual(contentType)) {
        fields.text = content.toString('utf-8');
    } else {
        fields._attachment = content.toString('base64');
    }

    return fields;
};
