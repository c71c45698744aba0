/**
 * Report Renderer
 *
 * React Email adapter rendering the dashboard page and the report export to HTML.
 */

import { render } from '@react-email/render';
import { ok, err, type Result } from 'neverthrow';
// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

import { DashboardPage } from './dashboard-page.js';
import { ReportTemplate } from './report-template.js';
import { createReportRenderError, type ReportRenderError } from '../../core/errors.js';

import type { DashboardLinks, ReportRenderer } from '../../core/ports.js';
import type { DashboardView, ReportDocument } from '../../core/types.js';
import type { Logger } from 'pino';

export interface ReportRendererConfig {
  logger: Logger;
}

export const makeReportRenderer = (config: ReportRendererConfig): ReportRenderer => {
  const log = config.logger.child({ component: 'ReportRenderer' });

  const renderElement = async (
    name: string,
    element: React.ReactElement
  ): Promise<Result<string, ReportRenderError>> => {
    try {
      const html = await render(element);
      log.debug({ template: name, htmlLength: html.length }, 'Rendered template');
      return ok(html);
    } catch (error) {
      log.error({ err: error, template: name }, 'Failed to render template');
      return err(
        createReportRenderError(
          error instanceof Error ? error.message : 'Unknown render error',
          error
        )
      );
    }
  };

  return {
    renderReport(report: ReportDocument) {
      return renderElement('report', React.createElement(ReportTemplate, { report }));
    },

    renderDashboard(view: DashboardView, links: DashboardLinks) {
      return renderElement('dashboard', React.createElement(DashboardPage, { view, links }));
    },
  };
};
