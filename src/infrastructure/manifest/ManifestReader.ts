import * as fs from 'fs';
import * as readline from 'readline';
import { Attachment, AttachmentKind } from '../../domain/entities/Attachment';
import { ValidationError } from '../../shared/errors/AppError';
import { Logger } from '../../shared/logging/Logger';

/**
 * Parse one JSON-lines manifest entry:
 * {"messageId": 42, "kind": "photo", "url": "https://...", "fileName": "a.jpg"}
 */
export function parseManifestLine(line: string, lineNumber: number): Attachment {
    let parsed: unknown;
    try {
        parsed = JSON.parse(line);
    } catch (error) {
        throw new ValidationError(`Manifest line ${lineNumber} is not valid JSON`, {
            line: lineNumber,
            reason: error instanceof Error ? error.message : String(error)
        });
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ValidationError(`Manifest line ${lineNumber} must be a JSON object`, { line: lineNumber });
    }

    const entry = new Map<string, unknown>(Object.entries(parsed));
    const messageId = entry.get('messageId');
    const kindValue = entry.get('kind');
    const url = entry.get('url');
    const fileName = entry.get('fileName');

    if (typeof messageId !== 'number' || !Number.isInteger(messageId) || messageId <= 0) {
        throw new ValidationError(`Manifest line ${lineNumber}: messageId must be a positive integer`, {
            line: lineNumber
        });
    }

    const kind = Object.values(AttachmentKind).find(value => value === kindValue);
    if (kind === undefined) {
        throw new ValidationError(
            `Manifest line ${lineNumber}: kind must be one of ${Object.values(AttachmentKind).join(', ')}`,
            { line: lineNumber }
        );
    }

    if (typeof url !== 'string' || url.trim() === '') {
        throw new ValidationError(`Manifest line ${lineNumber}: url is required`, { line: lineNumber });
    }

    if (fileName !== undefined && typeof fileName !== 'string') {
        throw new ValidationError(`Manifest line ${lineNumber}: fileName must be a string`, {
            line: lineNumber
        });
    }

    return new Attachment(messageId, kind, url, fileName);
}

/**
 * Reads a manifest lazily, one attachment per non-blank line. Lines
 * starting with # are comments.
 */
export class ManifestReader {
    constructor(private logger: Logger) {}

    async *read(filePath: string): AsyncGenerator<Attachment> {
        if (!fs.existsSync(filePath)) {
            throw new ValidationError(`Manifest not found: ${filePath}`);
        }

        const lines = readline.createInterface({
            input: fs.createReadStream(filePath, { encoding: 'utf-8' }),
            crlfDelay: Infinity
        });

        let lineNumber = 0;
        let count = 0;
        try {
            for await (const raw of lines) {
                lineNumber += 1;
                const line = raw.trim();
                if (line === '' || line.startsWith('#')) {
                    continue;
                }
                count += 1;
                yield parseManifestLine(line, lineNumber);
            }
        } finally {
            lines.close();
        }

        this.logger.debug(`Read ${count} attachments from ${filePath}`);
    }
}
