/**
 * JSON input loading
 * Reads the asset document from a file or an inline string
 */
import { readFile } from 'fs/promises';
import type { JsonValue } from '../assets/types.js';
import { logger } from '../observability/logger.js';

export interface JsonInput {
    file?: string;
    json?: string;
}

/**
 * Load the asset document. The file wins when both sources are given.
 * Failures are logged and yield null.
 */
export async function loadJsonInput(input: JsonInput): Promise<JsonValue | null> {
    if (input.file) {
        try {
            const text = await readFile(input.file, 'utf-8');
            return parseJson(text);
        } catch (error) {
            logger.error('Failed to load JSON from file', error, { file: input.file });
            return null;
        }
    }

    if (input.json) {
        try {
            return parseJson(input.json);
        } catch (error) {
            logger.error('Failed to parse JSON string', error);
            return null;
        }
    }

    logger.error('No JSON input provided');
    return null;
}

function parseJson(text: string): JsonValue {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
}
