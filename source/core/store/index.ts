/**
 * IndexStore - JSON persistence of a whole CodeIndex.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {IndexPersistenceError} from '../errors.js';
import type {CodeIndex} from '../indexer/types.js';
import {documentToIndex, indexDocumentSchema, indexToDocument} from './schema.js';

export {indexDocumentSchema, type IndexDocument} from './schema.js';

/**
 * Write the index to `filePath`, creating parent directories.
 * The document goes to `<filePath>.tmp` first and is renamed into place, so
 * an interrupted save leaves any previous file intact.
 */
export async function saveIndex(index: CodeIndex, filePath: string): Promise<void> {
	try {
		await fs.mkdir(path.dirname(filePath), {recursive: true});
		const json = JSON.stringify(indexToDocument(index), null, 2);
		await writeThenRename(filePath, json + '\n');
	} catch (error) {
		throw new IndexPersistenceError('save', filePath, error);
	}
}

/**
 * A failed write or rename removes the temp file before the error propagates.
 */
async function writeThenRename(filePath: string, content: string): Promise<void> {
	const tmpPath = `${filePath}.tmp`;
	try {
		await fs.writeFile(tmpPath, content);
		await fs.rename(tmpPath, filePath);
	} catch (error) {
		await fs.rm(tmpPath, {force: true});
		throw error;
	}
}

/**
 * Read and validate an index written by saveIndex.
 */
export async function loadIndex(filePath: string): Promise<CodeIndex> {
	try {
		const content = await fs.readFile(filePath, 'utf-8');
		const doc = indexDocumentSchema.parse(JSON.parse(content));
		return documentToIndex(doc);
	} catch (error) {
		throw new IndexPersistenceError('load', filePath, error);
	}
}
