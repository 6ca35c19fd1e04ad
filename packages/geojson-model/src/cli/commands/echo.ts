/**
 * echo command: decode a document and print its canonical encoding
 *
 * @module cli/commands/echo
 */

import { readFile } from 'node:fs/promises';
import { parseGeoJson } from '../../codec/decode.js';
import { stringify } from '../../codec/encode.js';

export function echoText(text: string, pretty: boolean): string {
  return stringify(parseGeoJson(text), { pretty });
}

export async function echoFile(path: string, pretty: boolean): Promise<string> {
  return echoText(await readFile(path, 'utf-8'), pretty);
}
