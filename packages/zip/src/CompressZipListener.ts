import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import AdmZip from 'adm-zip';
import type { JobListener, Logger } from '@pipebatch/core';
import { createLogger } from '@pipebatch/core';

export interface CompressZipListenerOptions {
  /** Default: `createLogger()`. */
  readonly logger?: Logger;
}

/**
 * Packs files and directories into an archive once the job has ended,
 * whatever its status. Directories are stored under their own name.
 *
 * Archiving happens after the report is final, so a failure is logged and
 * does not change the outcome of the job.
 */
export class CompressZipListener implements JobListener {
  private readonly logger: Logger;

  constructor(
    private readonly archive: string,
    private readonly inputs: readonly string[],
    options?: CompressZipListenerOptions,
  ) {
    if (inputs.length === 0) {
      throw new Error('CompressZipListener: at least one input is required');
    }
    this.logger = (options?.logger ?? createLogger()).child({ listener: 'CompressZipListener' });
  }

  async afterJobEnd(): Promise<void> {
    try {
      const zip = new AdmZip();
      for (const input of this.inputs) {
        const stats = await stat(input);
        if (stats.isDirectory()) {
          zip.addLocalFolder(input, basename(input));
        } else {
          zip.addLocalFile(input);
        }
      }
      zip.writeZip(this.archive);
      this.logger.info(
        { event: 'zip_written', archive: this.archive, inputs: this.inputs },
        `Compressed ${String(this.inputs.length)} input(s) into '${this.archive}'`,
      );
    } catch (error) {
      this.logger.error({ event: 'zip_write_failed', archive: this.archive, err: error }, `Unable to write '${this.archive}'`);
    }
  }
}
