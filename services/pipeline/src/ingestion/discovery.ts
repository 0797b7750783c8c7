import { promises as fs } from 'node:fs';
import path from 'node:path';
import { JobConfigError, errorCode } from '../errors';

export type StationFile = {
  stationId: string;
  fileName: string;
  filePath: string;
};

/** `*` matches any run of characters and `?` exactly one; everything else is literal. */
export function buildGlobRegex(pattern: string): RegExp {
  if (!pattern || pattern === '*') {
    return /^.*$/;
  }
  const escaped = pattern
    .replace(/[-/\\^$+.()|[\]{}]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`);
}

/** `USC00110072.txt` -> `USC00110072`; only the final extension is dropped. */
export function stationIdFromFileName(fileName: string): string {
  const extension = path.extname(fileName);
  return extension ? fileName.slice(0, -extension.length) : fileName;
}

async function readDataDirectory(directory: string) {
  try {
    const stats = await fs.stat(directory);
    if (!stats.isDirectory()) {
      throw new JobConfigError(`Data directory ${directory} is not a directory`);
    }
    return await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new JobConfigError(`Data directory ${directory} does not exist`);
    }
    throw error;
  }
}

export async function listStationFiles(directory: string, pattern: string): Promise<StationFile[]> {
  const entries = await readDataDirectory(directory);
  const matcher = buildGlobRegex(pattern);
  const files = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => matcher.test(name))
    .sort((a, b) => a.localeCompare(b))
    .map((fileName) => ({
      stationId: stationIdFromFileName(fileName),
      fileName,
      filePath: path.join(directory, fileName)
    }));

  if (files.length === 0) {
    throw new JobConfigError(`No files matching '${pattern}' found in ${directory}`);
  }
  return files;
}
