/**
 * Dashboard Module REST API - TypeBox Schemas
 *
 * Query strings for the page and the exports. Repeated keys (`years=2023&years=2024`)
 * arrive as arrays; a single value is coerced into a one-element array.
 */

import { Type, type Static } from '@sinclair/typebox';

import { RECORD_LIMITS, SELECTION_ACTIONS, SORT_ORDERS } from '../../core/types.js';

const MAX_NAME_LENGTH = 200;

const NameSchema = Type.String({ minLength: 1, maxLength: MAX_NAME_LENGTH });

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

const selectionProperties = {
  years: Type.Optional(
    Type.Array(Type.Integer({ minimum: 1900, maximum: 9999 }), {
      description: 'Selected fiscal years',
    })
  ),
  categories: Type.Optional(
    Type.Array(NameSchema, { description: 'Selected expenditure categories' })
  ),
  department: Type.Optional(
    Type.String({ maxLength: MAX_NAME_LENGTH, description: 'Department name or "All"' })
  ),
  action: Type.Optional(Type.Union(SELECTION_ACTIONS.map((action) => Type.Literal(action)))),
  submitted: Type.Optional(
    Type.Boolean({ description: 'Set by the filter form; missing lists then mean none' })
  ),
};

export const ExportQuerySchema = Type.Object(selectionProperties);

export type ExportQuery = Static<typeof ExportQuerySchema>;

export const ReportExportQuerySchema = Type.Object({
  ...selectionProperties,
  analysisCategory: Type.Optional(NameSchema),
});

export type ReportExportQuery = Static<typeof ReportExportQuerySchema>;

export const DashboardQuerySchema = Type.Object({
  ...selectionProperties,
  analysisCategory: Type.Optional(NameSchema),
  records: Type.Optional(Type.Union(RECORD_LIMITS.map((limit) => Type.Literal(limit)))),
  sort: Type.Optional(Type.Union(SORT_ORDERS.map((order) => Type.Literal(order)))),
});

export type DashboardQuery = Static<typeof DashboardQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
