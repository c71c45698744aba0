import { ok, err, type Result } from 'neverthrow';

import { prepareExport, type PrepareExportDeps } from './prepare-export.js';
import { csvFileName } from '../format.js';

import type { Clock } from '../../../../common/types/clock.js';
import type { DashboardError } from '../errors.js';
import type { CsvEncoder } from '../ports.js';
import type { ExportFile, SelectionRequest } from '../types.js';

export interface ExportCsvDeps extends PrepareExportDeps {
  csv: CsvEncoder;
  clock: Clock;
}

/**
 * The filtered transactions as CSV. No matching rows gives a header-only file.
 */
export async function exportCsv(
  deps: ExportCsvDeps,
  request: SelectionRequest
): Promise<Result<ExportFile, DashboardError>> {
  const prepared = await prepareExport(deps, request);
  if (prepared.isErr()) {
    return err(prepared.error);
  }

  const { currentUser, filtered } = prepared.value;
  return ok({
    fileName: csvFileName(currentUser, deps.clock.now()),
    contentType: 'text/csv; charset=utf-8',
    content: deps.csv.encode(filtered),
  });
}
