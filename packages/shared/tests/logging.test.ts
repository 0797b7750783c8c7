import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { createLogger } from '../src/logging';

type LogEntry = {
  level: number;
  time: string;
  msg: string;
  [key: string]: unknown;
};

function captureStream() {
  const entries: LogEntry[] = [];
  return {
    entries,
    stream: {
      write(line: string) {
        entries.push(JSON.parse(line));
      }
    }
  };
}

test('writes JSON lines with ISO timestamps and bindings', () => {
  const { entries, stream } = captureStream();
  const logger = createLogger({ level: 'info', bindings: { job: 'ingest' }, stream });

  logger.info({ file: 'USC00110072.txt' }, 'file ingested');

  assert.equal(entries.length, 1);
  const [entry] = entries;
  assert.equal(entry.level, 30);
  assert.equal(entry.msg, 'file ingested');
  assert.equal(entry.job, 'ingest');
  assert.equal(entry.file, 'USC00110072.txt');
  assert.match(entry.time, /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  assert.equal('pid' in entry, false);
});

test('filters entries below the configured level', () => {
  const { entries, stream } = captureStream();
  const logger = createLogger({ level: 'warn', stream });

  logger.info('ignored');
  logger.warn('kept');

  assert.deepEqual(
    entries.map((entry) => entry.msg),
    ['kept']
  );
});

test('silent level writes nothing', () => {
  const { entries, stream } = captureStream();
  const logger = createLogger({ level: 'silent', stream });

  logger.error('nothing to see');

  assert.equal(entries.length, 0);
});

test('mirrors entries into a log file, creating its directory', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'wxdata-logging-'));
  const file = path.join(dir, 'logs', 'run.log');
  const { entries, stream } = captureStream();
  const logger = createLogger({ level: 'info', file, stream });

  logger.info('both sinks');

  assert.equal(entries.length, 1);
  const written = (await readFile(file, 'utf8')).trim().split('\n');
  assert.equal(written.length, 1);
  assert.equal(JSON.parse(written[0]).msg, 'both sinks');
});
