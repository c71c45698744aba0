import { ok, err, type Result } from 'neverthrow';

import { prepareExport, type PrepareExportDeps } from './prepare-export.js';
import {
  DEFAULT_ANALYSIS_CATEGORY,
  resolveAnalysisCategory,
} from '../../../spending-analytics/core/deep-dive.js';
import { visibleDepartments } from '../../../spending-analytics/core/departments.js';
import { createNoMatchingDataError, type DashboardError } from '../errors.js';
import { reportFileName } from '../format.js';
import { buildReport } from '../report.js';
import { deriveFilterOptions } from '../selection.js';
import {
  EMPTY_FILTER_MESSAGE,
  NO_FINANCIAL_DATA_MESSAGE,
  type ExportFile,
  type SelectionRequest,
} from '../types.js';

import type { Clock } from '../../../../common/types/clock.js';
import type { ReportRenderer } from '../ports.js';

export interface ExportReportDeps extends PrepareExportDeps {
  renderer: ReportRenderer;
  clock: Clock;
}

export interface ExportReportInput {
  request: SelectionRequest;
  analysisCategory?: string | undefined;
}

/**
 * The dashboard report as a standalone HTML document. Departments are compared
 * only when the filtered rows span more than one.
 */
export async function exportReport(
  deps: ExportReportDeps,
  input: ExportReportInput
): Promise<Result<ExportFile, DashboardError>> {
  const prepared = await prepareExport(deps, input.request);
  if (prepared.isErr()) {
    return err(prepared.error);
  }

  const { currentUser, full, filtered, selection } = prepared.value;
  if (selection === null) {
    return err(createNoMatchingDataError(NO_FINANCIAL_DATA_MESSAGE));
  }
  if (filtered.length === 0) {
    return err(createNoMatchingDataError(EMPTY_FILTER_MESSAGE));
  }

  const choice = resolveAnalysisCategory(
    deriveFilterOptions(full).categories,
    selection.categories,
    input.analysisCategory
  );

  const report = buildReport({
    currentUser,
    filtered,
    departments: visibleDepartments(filtered),
    selection,
    analysisCategory: choice.category ?? DEFAULT_ANALYSIS_CATEGORY,
    clock: deps.clock,
  });

  const html = await deps.renderer.renderReport(report);
  if (html.isErr()) {
    return err(html.error);
  }

  return ok({
    fileName: reportFileName(currentUser, report.generatedAt),
    contentType: 'text/html; charset=utf-8',
    content: html.value,
  });
}
