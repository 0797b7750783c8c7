import { constants, createReadStream, promises as fs } from 'node:fs';
import { createInterface } from 'node:readline';

export type LineSource = (filePath: string) => AsyncIterable<string>;

/**
 * Streams a text file line by line without loading it whole. Missing or
 * unreadable files fail before the first line is yielded.
 */
export async function* readFileLines(filePath: string): AsyncGenerator<string> {
  await fs.access(filePath, constants.R_OK);
  const input = createReadStream(filePath, { encoding: 'utf8' });
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      yield line;
    }
  } finally {
    lines.close();
    input.destroy();
  }
}
