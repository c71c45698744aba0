/**
 * Finance Data REST API - TypeBox Schemas
 */

import { Type } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

/** Decimal amounts travel as strings to keep their precision. */
const DecimalString = Type.String({ pattern: '^-?\\d+(\\.\\d+)?$' });

export const SummaryRowSchema = Type.Object({
  department_name: Type.String(),
  department_code: Type.String(),
  fiscal_year: Type.Integer(),
  fiscal_month: Type.Integer({ minimum: 1, maximum: 12 }),
  expenditure_category: Type.String(),
  total_amount: DecimalString,
  transaction_count: Type.Integer({ minimum: 0 }),
  average_amount: DecimalString,
  director_name: Type.Union([Type.String(), Type.Null()]),
  director_start_date: Type.Union([Type.String(), Type.Null()]),
});

export const SummaryResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    fetchedAt: Type.String({ format: 'date-time' }),
    rows: Type.Array(SummaryRowSchema),
  }),
});

export const AccessResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    username: Type.String(),
    accessLevel: Type.Union([Type.String(), Type.Null()]),
    departments: Type.Array(Type.String()),
    scope: Type.Union([Type.Literal('multiple'), Type.Literal('single'), Type.Literal('none')]),
  }),
});

export const CacheRefreshResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    cleared: Type.Integer({ minimum: 0 }),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
