import { mkdir } from 'node:fs/promises';
import AdmZip from 'adm-zip';
import type { JobListener, Logger } from '@pipebatch/core';
import { createLogger } from '@pipebatch/core';

export interface DecompressZipListenerOptions {
  /** Default: `createLogger()`. */
  readonly logger?: Logger;
}

/**
 * Extracts an archive into a directory before the job starts, so the job's
 * reader can consume the extracted files.
 *
 * The target directory is created when missing and existing files are
 * overwritten. A failure is logged and the job still starts: its reader then
 * reports the missing input.
 */
export class DecompressZipListener implements JobListener {
  private readonly logger: Logger;

  constructor(
    private readonly archive: string,
    private readonly directory: string,
    options?: DecompressZipListenerOptions,
  ) {
    this.logger = (options?.logger ?? createLogger()).child({ listener: 'DecompressZipListener' });
  }

  async beforeJobStart(): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
      const zip = new AdmZip(this.archive);
      zip.extractAllTo(this.directory, true);
      this.logger.info(
        { event: 'zip_extracted', archive: this.archive, directory: this.directory, entries: zip.getEntries().length },
        `Extracted '${this.archive}' into '${this.directory}'`,
      );
    } catch (error) {
      this.logger.error(
        { event: 'zip_extract_failed', archive: this.archive, directory: this.directory, err: error },
        `Unable to extract '${this.archive}'`,
      );
    }
  }
}
