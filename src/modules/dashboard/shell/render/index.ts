export { makeReportRenderer, type ReportRendererConfig } from './renderer.js';
export { DASHBOARD_TITLE } from './dashboard-page.js';
export { REPORT_TITLE } from './report-template.js';
