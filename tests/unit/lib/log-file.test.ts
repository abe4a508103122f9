/**
 * Unit Tests: Daily log file
 * Day naming, numbered rotation and pruning
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DailyLogFile } from '../../../src/lib/log-file';

describe('DailyLogFile', () => {
  let dir: string;
  let now: Date;
  const clock = (): Date => now;

  beforeEach(() => {
    dir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'monitor-log-file-')), 'logs');
    now = new Date('2026-03-04T10:00:00Z');
  });

  afterEach(() => {
    fs.rmSync(path.dirname(dir), { recursive: true, force: true });
  });

  it('should create the directory and append to the file of the day', () => {
    const logFile = new DailyLogFile(dir, { maxFileSize: 100 }, clock);

    logFile.append('one');
    logFile.append('two');

    expect(fs.readdirSync(dir)).toEqual(['monitor-2026-03-04.log']);
    expect(fs.readFileSync(path.join(dir, 'monitor-2026-03-04.log'), 'utf8')).toBe('one\ntwo\n');
  });

  it('should move to a new file when the day changes', () => {
    const logFile = new DailyLogFile(dir, {}, clock);

    logFile.append('before midnight');
    now = new Date('2026-03-05T00:00:01Z');
    logFile.append('after midnight');

    expect(fs.readdirSync(dir).sort()).toEqual(['monitor-2026-03-04.log', 'monitor-2026-03-05.log']);
  });

  it('should rotate an oversized file to the next generation and prune the oldest', () => {
    const logFile = new DailyLogFile(dir, { maxFileSize: 10, maxFiles: 2 }, clock);

    logFile.append('first entry');
    logFile.append('second entry');
    logFile.append('third entry');

    expect(fs.readdirSync(dir).sort()).toEqual(['monitor-2026-03-04.2.log', 'monitor-2026-03-04.3.log']);
    expect(fs.readFileSync(path.join(dir, 'monitor-2026-03-04.3.log'), 'utf8')).toBe('third entry\n');
  });

  it('should prune earlier days before later ones', () => {
    const logFile = new DailyLogFile(dir, { maxFileSize: 10, maxFiles: 2 }, clock);

    logFile.append('first entry');
    now = new Date('2026-03-05T09:00:00Z');
    logFile.append('second entry');
    logFile.append('small');
    logFile.append('third entry');

    expect(fs.readdirSync(dir).sort()).toEqual(['monitor-2026-03-05.1.log', 'monitor-2026-03-05.2.log']);
  });

  it('should leave unrelated files alone', () => {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'keep');
    const logFile = new DailyLogFile(dir, { maxFileSize: 10, maxFiles: 1 }, clock);

    logFile.append('first entry');

    expect(fs.readdirSync(dir).sort()).toEqual(['monitor-2026-03-04.1.log', 'notes.txt']);
  });
});
