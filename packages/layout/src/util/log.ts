import type { Logger, ProjectionReport } from '../types/layout';

/**
 * Holds the logger for a layout. Being a class instance, immer leaves it
 * undrafted and unfrozen when the state around it is produced.
 */
export class LayoutLog {
  constructor(private readonly logger: Logger = console) {}

  info(message: string) {
    this.logger.info(message);
  }

  warn(message: string) {
    this.logger.warn(message);
  }

  /** One aggregated warning per track, never one per row */
  unresolved(trackId: string, report: ProjectionReport) {
    if (report.unresolved === 0) return;
    this.logger.warn(
      `Dropped ${report.unresolved} row(s) of track "${trackId}" with unknown sequences: ${report.examples.join(', ')}`
    );
  }
}
