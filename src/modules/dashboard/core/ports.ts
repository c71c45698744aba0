import type { ReportRenderError } from './errors.js';
import type { DashboardView, ReportDocument } from './types.js';
import type { Transaction } from '../../finance-data/core/types.js';
import type { Selection } from '../../spending-analytics/core/types.js';
import type { Result } from 'neverthrow';

/**
 * Remembers each viewer's last selection between interactions.
 */
export interface SelectionStore {
  get(username: string): Promise<Selection | undefined>;
  set(username: string, selection: Selection): Promise<void>;
}

/**
 * Links the rendered page points at; the renderer never builds URLs itself.
 */
export interface DashboardLinks {
  readonly page: string;
  readonly csvExport: string;
  readonly reportExport: string;
}

/**
 * Turns documents into self-contained HTML: inline styles, inline SVG charts,
 * no scripts, no external resources.
 */
export interface ReportRenderer {
  renderReport(report: ReportDocument): Promise<Result<string, ReportRenderError>>;
  renderDashboard(
    view: DashboardView,
    links: DashboardLinks
  ): Promise<Result<string, ReportRenderError>>;
}

export interface CsvEncoder {
  /** Header row plus one line per transaction; header only for no rows. */
  encode(rows: readonly Transaction[]): string;
}
