/**
 * Dashboard Module REST Routes
 *
 * - GET /: Dashboard page (HTML)
 * - GET /export/csv: Filtered transactions as CSV
 * - GET /export/report: Complete report as standalone HTML
 */

import {
  DashboardQuerySchema,
  ExportQuerySchema,
  ReportExportQuerySchema,
  type DashboardQuery,
  type ExportQuery,
  type ReportExportQuery,
} from './schemas.js';
import { getHttpStatusForError, type DashboardError } from '../../core/errors.js';
import { unavailableSections } from '../../core/report.js';
import { selectedCategories, selectedYears } from '../../core/selection.js';
import { exportCsv } from '../../core/usecases/export-csv.js';
import { exportReport } from '../../core/usecases/export-report.js';
import { loadDashboard } from '../../core/usecases/load-dashboard.js';

import type { Clock } from '../../../../common/types/clock.js';
import type { FinanceRepository, IdentitySource } from '../../../finance-data/core/ports.js';
import type { Selection } from '../../../spending-analytics/core/types.js';
import type {
  CsvEncoder,
  DashboardLinks,
  ReportRenderer,
  SelectionStore,
} from '../../core/ports.js';
import type { DashboardView, ExportFile, SelectionRequest } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeDashboardRoutesDeps {
  repo: FinanceRepository;
  identity: IdentitySource;
  selectionStore: SelectionStore;
  renderer: ReportRenderer;
  csv: CsvEncoder;
  clock: Clock;
}

export const DASHBOARD_PATHS = {
  page: '/',
  csvExport: '/export/csv',
  reportExport: '/export/report',
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toSelectionRequest = (query: ExportQuery): SelectionRequest => ({
  years: query.years,
  categories: query.categories,
  department: query.department,
  action: query.action,
  submitted: query.submitted,
});

/** Query string reproducing a selection exactly, independent of stored state. */
const selectionQuery = (selection: Selection): URLSearchParams => {
  const params = new URLSearchParams({ submitted: 'true' });
  for (const year of selectedYears(selection)) params.append('years', String(year));
  for (const category of selectedCategories(selection)) params.append('categories', category);
  params.append('department', selection.department);
  return params;
};

/**
 * Export links carry the selection shown on the page, so a download matches
 * what the viewer sees.
 */
export const buildDashboardLinks = (view: DashboardView): DashboardLinks => {
  if (view.kind === 'no-data') {
    return { ...DASHBOARD_PATHS };
  }

  const params = selectionQuery(view.selection);
  const reportParams = new URLSearchParams(params);
  if (view.kind === 'ready') {
    reportParams.append('analysisCategory', view.report.deepDive.category);
  }

  return {
    page: DASHBOARD_PATHS.page,
    csvExport: `${DASHBOARD_PATHS.csvExport}?${params.toString()}`,
    reportExport: `${DASHBOARD_PATHS.reportExport}?${reportParams.toString()}`,
  };
};

function sendError(reply: FastifyReply, error: DashboardError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

function sendFile(reply: FastifyReply, file: ExportFile) {
  return reply
    .status(200)
    .header('content-type', file.contentType)
    .header('content-disposition', `attachment; filename="${file.fileName}"`)
    .send(file.content);
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeDashboardRoutes = (deps: MakeDashboardRoutesDeps): FastifyPluginAsync => {
  const { repo, identity, selectionStore, renderer, csv, clock } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET / - Dashboard page
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: DashboardQuery }>(
      DASHBOARD_PATHS.page,
      { schema: { querystring: DashboardQuerySchema } },
      async (request, reply) => {
        const view = await loadDashboard(
          { repo, identity, selectionStore, clock },
          {
            request: toSelectionRequest(request.query),
            analysisCategory: request.query.analysisCategory,
            records: request.query.records,
            sort: request.query.sort,
          }
        );

        if (view.kind === 'ready') {
          const unavailable = unavailableSections(view.report);
          if (unavailable.length > 0) {
            request.log.warn({ sections: unavailable }, 'Report sections fell back to placeholders');
          }
        }

        const html = await renderer.renderDashboard(view, buildDashboardLinks(view));
        if (html.isErr()) {
          return sendError(reply, html.error);
        }

        return reply.status(200).type('text/html; charset=utf-8').send(html.value);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /export/csv - CSV download
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: ExportQuery }>(
      DASHBOARD_PATHS.csvExport,
      { schema: { querystring: ExportQuerySchema } },
      async (request, reply) => {
        const result = await exportCsv(
          { repo, identity, selectionStore, csv, clock },
          toSelectionRequest(request.query)
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return sendFile(reply, result.value);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /export/report - HTML report download
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: ReportExportQuery }>(
      DASHBOARD_PATHS.reportExport,
      { schema: { querystring: ReportExportQuerySchema } },
      async (request, reply) => {
        const result = await exportReport(
          { repo, identity, selectionStore, renderer, clock },
          {
            request: toSelectionRequest(request.query),
            analysisCategory: request.query.analysisCategory,
          }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return sendFile(reply, result.value);
      }
    );
  };
};
