/**
 * Daily log file with numbered size rotation.
 *
 * Lines go to `monitor-YYYY-MM-DD.log` for the UTC day of the write. When the
 * live file grows past `maxFileSize` it is renamed to the next free generation
 * (`monitor-YYYY-MM-DD.1.log`, `.2.log`, ...) and the oldest files beyond
 * `maxFiles` are deleted.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface LogFileLimits {
  maxFileSize?: number; // in bytes
  maxFiles?: number;
}

interface LogFileName {
  file: string;
  day: string;
  generation: number;
}

const LOG_FILE_PATTERN = /^monitor-(\d{4}-\d{2}-\d{2})(?:\.(\d+))?\.log$/;

function parseLogFileName(file: string): LogFileName | undefined {
  const match = LOG_FILE_PATTERN.exec(file);
  if (!match) {
    return undefined;
  }
  // the live file of a day sorts after its rotated generations
  const generation = match[2] === undefined ? Number.POSITIVE_INFINITY : Number(match[2]);
  return { file, day: match[1], generation };
}

function oldestFirst(a: LogFileName, b: LogFileName): number {
  if (a.day !== b.day) {
    return a.day < b.day ? -1 : 1;
  }
  return a.generation - b.generation;
}

export class DailyLogFile {
  private directoryReady = false;

  constructor(
    private readonly directory: string,
    private readonly limits: LogFileLimits = {},
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Live file for the given moment
   */
  fileFor(moment: Date): string {
    return path.join(this.directory, `monitor-${moment.toISOString().slice(0, 10)}.log`);
  }

  append(line: string): void {
    if (!this.directoryReady) {
      fs.mkdirSync(this.directory, { recursive: true });
      this.directoryReady = true;
    }

    const moment = this.now();
    const file = this.fileFor(moment);
    fs.appendFileSync(file, `${line}\n`);

    if (this.limits.maxFileSize !== undefined && fs.statSync(file).size > this.limits.maxFileSize) {
      this.rotate(file, moment.toISOString().slice(0, 10));
      this.prune();
    }
  }

  private logFiles(): LogFileName[] {
    return fs.readdirSync(this.directory)
      .map(parseLogFileName)
      .filter((name): name is LogFileName => name !== undefined)
      .sort(oldestFirst);
  }

  private rotate(file: string, day: string): void {
    const generations = this.logFiles()
      .filter(name => name.day === day && Number.isFinite(name.generation))
      .map(name => name.generation);
    const next = generations.length === 0 ? 1 : Math.max(...generations) + 1;
    fs.renameSync(file, path.join(this.directory, `monitor-${day}.${next}.log`));
  }

  private prune(): void {
    if (this.limits.maxFiles === undefined) {
      return;
    }

    const files = this.logFiles();
    const excess = files.length - this.limits.maxFiles;
    for (const name of files.slice(0, Math.max(excess, 0))) {
      fs.unlinkSync(path.join(this.directory, name.file));
    }
  }
}
