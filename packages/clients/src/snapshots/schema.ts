/** Zod schema for snapshot documents served by file and HTTP providers. */

import { type CompanyInfo, type RawFinancialSnapshot, SnapshotValidationError } from '@valuescope/shared';
import { z } from 'zod';

const NUMERIC_STRING = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Providers serialize large figures as strings; both forms read as numbers
const NumericSchema = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(NUMERIC_STRING, 'Expected a numeric string')
    .transform((value) => Number(value)),
]);

const NumericCellSchema = z.union([NumericSchema, z.null()]);

const OptionalNumberSchema = NumericCellSchema.optional().transform((value) => value ?? undefined);

const OptionalTextSchema = z
  .string()
  .nullable()
  .optional()
  .transform((value) => value ?? undefined);

const StatementTableSchema = z.record(z.string(), z.array(NumericCellSchema)).default({});

const CompanyInfoSchema = z
  .object({
    longName: OptionalTextSchema,
    sector: OptionalTextSchema,
    industry: OptionalTextSchema,
    country: OptionalTextSchema,
    currentPrice: OptionalNumberSchema,
    sharesOutstanding: OptionalNumberSchema,
    beta: OptionalNumberSchema,
    trailingPE: OptionalNumberSchema,
    priceToBook: OptionalNumberSchema,
    dividendRate: OptionalNumberSchema,
    payoutRatio: OptionalNumberSchema,
    returnOnAssets: OptionalNumberSchema,
    returnOnEquity: OptionalNumberSchema,
    currentRatio: OptionalNumberSchema,
    quickRatio: OptionalNumberSchema,
    cashRatio: OptionalNumberSchema,
    longTermDebtToEquity: OptionalNumberSchema,
    debtToEquity: OptionalNumberSchema,
    operatingMargins: OptionalNumberSchema,
    profitMargins: OptionalNumberSchema,
    marketCap: OptionalNumberSchema,
  })
  .default({});

/**
 * One snapshot document. Unknown keys are stripped.
 */
export const SnapshotDocumentSchema = z.object({
  ticker: z.string().optional(),
  info: CompanyInfoSchema,
  balanceSheet: StatementTableSchema,
  incomeStatement: StatementTableSchema,
  cashFlow: StatementTableSchema,
});

export type SnapshotDocument = z.infer<typeof SnapshotDocumentSchema>;

// Compile-time check: parsed info must stay assignable to the domain type
const _infoCheck: (info: SnapshotDocument['info']) => CompanyInfo = (info) => info;
void _infoCheck;

/**
 * Validate a raw document and key it by the requested ticker.
 * Throws SnapshotValidationError listing every issue as `path: message`.
 */
export function parseSnapshotDocument(data: unknown, ticker: string): RawFinancialSnapshot {
  const result = SnapshotDocumentSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new SnapshotValidationError(`Invalid snapshot for ${ticker}: ${issues.join('; ')}`, ticker, issues);
  }

  const { info, balanceSheet, incomeStatement, cashFlow } = result.data;
  return { ticker, info, balanceSheet, incomeStatement, cashFlow };
}
