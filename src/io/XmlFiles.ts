/**
 * Reading request payloads and writing responses.
 */

import fs from 'fs/promises';
import path from 'path';
import { errorCode, errorMessage } from '../model/DispatchErrors.js';
import { checkWellFormed } from '../soap/EnvelopeCodec.js';

/**
 * Payload or response file could not be read, written, or is not XML
 */
export class XmlFileError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'XmlFileError';
    this.filePath = filePath;
  }
}

/**
 * Read a UTF-8 XML file. The content must be well-formed.
 */
export async function readXmlFile(filePath: string): Promise<string> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const reason = errorCode(error) === 'ENOENT' ? 'file does not exist' : errorMessage(error);
    throw new XmlFileError(`Input file could not be read: ${filePath} (${reason})`, filePath, { cause: error });
  }

  const problem = checkWellFormed(content);
  if (problem !== null) {
    throw new XmlFileError(`Input file is not well-formed XML: ${filePath} (${problem})`, filePath);
  }
  return content;
}

/**
 * Write `content` as UTF-8, creating parent directories as needed.
 */
export async function writeXmlFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.writeFile(filePath, content, 'utf8');
  } catch (error) {
    throw new XmlFileError(`Output file could not be written: ${filePath} (${errorMessage(error)})`, filePath, {
      cause: error,
    });
  }
}

/**
 * True when `xml` parses as a well-formed document
 */
export function isWellFormedXml(xml: string): boolean {
  return checkWellFormed(xml) === null;
}
