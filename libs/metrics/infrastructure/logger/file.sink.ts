import { Logger, OnModuleDestroy } from '@nestjs/common';
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { describeError } from '@metrics/domain';
import { MetricsSinkPort } from '@metrics/out-ports';
import { Severity } from '@metrics/value-objects';

/**
 * FileSink - appends context records as JSON lines to a local file.
 * Diagnostics (DEBUG/WARNING) go to the wrapped sink unchanged.
 *
 * Appends are chained so lines land in emission order; emit() itself
 * never waits on the disk.
 */
export class FileSink extends MetricsSinkPort implements OnModuleDestroy {
  private readonly logger = new Logger(FileSink.name);
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly diagnostics: MetricsSinkPort,
  ) {
    super();
  }

  emit(severity: Severity, message: string): void {
    if (severity !== Severity.INFO) {
      this.diagnostics.emit(severity, message);
      return;
    }
    this.pending = this.pending.then(() => this.append(message));
  }

  /**
   * Resolves once every record emitted so far has been written.
   */
  flush(): Promise<void> {
    return this.pending;
  }

  async onModuleDestroy(): Promise<void> {
    await this.flush();
  }

  private async append(line: string): Promise<void> {
    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, `${line}\n`, 'utf8');
    } catch (error) {
      this.logger.error(
        `Failed to append metrics record to ${this.filePath}: ${describeError(error)}`,
      );
    }
  }
}
