import type { Stats } from 'fs';
import { readdir, rm, stat } from 'fs/promises';
import path from 'path';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'RetentionService' });

const DAY_MS = 24 * 60 * 60 * 1000;
const RECORDING_PREFIX = 'recording_';

export interface RetentionOptions {
  outputDir: string;
  retentionDays: number;
  sweepIntervalMs: number;
}

/** Answers whether an in-flight session still needs the file */
export interface ArtifactOwnership {
  isArtifactInUse(artifactPath: string): boolean;
}

export interface CleanupReport {
  deleted: string[];
  skippedInUse: string[];
}

/**
 * Deletes recording artifacts older than the retention window
 */
export class RetentionService {
  private readonly options: RetentionOptions;
  private readonly ownership: ArtifactOwnership;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: RetentionOptions, ownership: ArtifactOwnership) {
    this.options = options;
    this.ownership = ownership;
  }

  async cleanupOldRecordings(now: Date = new Date()): Promise<CleanupReport> {
    const report: CleanupReport = { deleted: [], skippedInUse: [] };
    const cutoff = now.getTime() - this.options.retentionDays * DAY_MS;

    let entries: string[];
    try {
      entries = await readdir(this.options.outputDir);
    } catch (error) {
      if (isMissingFile(error)) {
        return report;
      }
      throw error;
    }

    for (const entry of entries) {
      if (!entry.startsWith(RECORDING_PREFIX)) {
        continue;
      }

      const filePath = path.join(this.options.outputDir, entry);
      let info: Stats;
      try {
        info = await stat(filePath);
      } catch (error) {
        // Compressor intermediates can vanish between readdir and stat
        if (isMissingFile(error)) {
          continue;
        }
        throw error;
      }
      if (!info.isFile() || info.mtimeMs >= cutoff) {
        continue;
      }

      if (this.ownership.isArtifactInUse(filePath)) {
        report.skippedInUse.push(filePath);
        continue;
      }

      await rm(filePath, { force: true });
      report.deleted.push(filePath);
      logger.info({ filePath }, 'Deleted expired recording');
    }

    return report;
  }

  /** Sweep now, then on every interval */
  start(): void {
    if (this.timer) {
      return;
    }

    this.sweep();
    this.timer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.timer.unref();
    logger.info({
      outputDir: this.options.outputDir,
      retentionDays: this.options.retentionDays,
      intervalMs: this.options.sweepIntervalMs
    }, 'Retention sweep scheduled');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private sweep(): void {
    this.cleanupOldRecordings().then(
      (report) => {
        if (report.deleted.length > 0 || report.skippedInUse.length > 0) {
          logger.info({ deleted: report.deleted.length, skipped: report.skippedInUse.length }, 'Retention sweep complete');
        }
      },
      (error: unknown) => {
        logger.error({ error }, 'Retention sweep failed');
      }
    );
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
