import { eq } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll, fiscalYears } from '@shepherd/db';
import {
  NotFoundError,
  addMoney,
  assertUlid,
  parseInput,
  parseMoney,
  subtractMoney,
} from '@shepherd/shared';
import { summaryRangeSchema } from '../validation';
import type { SummaryRangeInput } from '../validation';

export type ReportLine = {
  name: string;
  total: number;
  count: number;
};

export type IncomeStatement = {
  fiscalYearId: string;
  income: ReportLine[];
  expenses: ReportLine[];
  totalIncome: number;
  totalExpenses: number;
  netIncome: number;
};

export type BudgetVsActualLine = {
  categoryId: string;
  categoryName: string;
  budgeted: number;
  actual: number;
  variance: number;
  expenseCount: number;
};

export type BalanceSheet = {
  fiscalYearId: string;
  assets: number;
  liabilities: number;
  equity: number;
};

type LineRow = { name: string; total: string | null; count: number };

function toLines(rows: Iterable<LineRow>): ReportLine[] {
  return Array.from(rows).map((r) => ({ name: r.name, total: parseMoney(r.total), count: r.count }));
}

function sum(lines: ReportLine[]): number {
  return addMoney(...lines.map((l) => l.total));
}

async function assertFiscalYear(fiscalYearId: string): Promise<void> {
  assertUlid(fiscalYearId, 'fiscalYearId');
  const fiscalYear = await db.query.fiscalYears.findFirst({ where: eq(fiscalYears.id, fiscalYearId) });
  if (!fiscalYear) {
    throw new NotFoundError('Fiscal year', fiscalYearId);
  }
}

/** Contributions by type against approved expenses by category. */
export async function getIncomeStatement(fiscalYearId: string): Promise<IncomeStatement> {
  await assertFiscalYear(fiscalYearId);

  const [incomeRows, expenseRows] = await Promise.all([
    db.execute<LineRow>(sql`
      SELECT ct.name, SUM(c.amount) AS total, count(c.id)::int AS count
      FROM contributions c
      JOIN contribution_types ct ON ct.id = c.contribution_type_id
      WHERE c.fiscal_year_id = ${fiscalYearId} AND c.deleted = false
      GROUP BY ct.id, ct.name
      ORDER BY ct.name
    `),
    db.execute<LineRow>(sql`
      SELECT ec.name, SUM(e.amount) AS total, count(e.id)::int AS count
      FROM expenses e
      JOIN expense_categories ec ON ec.id = e.category_id
      WHERE e.fiscal_year_id = ${fiscalYearId} AND e.status = 'Approved'
      GROUP BY ec.id, ec.name
      ORDER BY ec.name
    `),
  ]);

  const income = toLines(incomeRows);
  const expenses = toLines(expenseRows);
  const totalIncome = sum(income);
  const totalExpenses = sum(expenses);
  return {
    fiscalYearId,
    income,
    expenses,
    totalIncome,
    totalExpenses,
    netIncome: subtractMoney(totalIncome, totalExpenses),
  };
}

/**
 * Per category: what was budgeted (rejected budgets excluded) against
 * approved spending. Positive variance means under budget.
 */
export async function getBudgetVsActual(fiscalYearId: string): Promise<{ data: BudgetVsActualLine[] }> {
  await assertFiscalYear(fiscalYearId);

  const rows = await db.execute<{
    category_id: string;
    category_name: string;
    budgeted: string;
    actual: string | null;
    expense_count: number;
  }>(sql`
    SELECT b.category_id, ec.name AS category_name, b.budgeted,
           COALESCE(a.actual, 0) AS actual, COALESCE(a.expense_count, 0)::int AS expense_count
    FROM (
      SELECT category_id, SUM(amount) AS budgeted
      FROM budgets
      WHERE fiscal_year_id = ${fiscalYearId} AND status <> 'Rejected'
      GROUP BY category_id
    ) b
    JOIN expense_categories ec ON ec.id = b.category_id
    LEFT JOIN (
      SELECT category_id, SUM(amount) AS actual, count(id) AS expense_count
      FROM expenses
      WHERE fiscal_year_id = ${fiscalYearId} AND status = 'Approved'
      GROUP BY category_id
    ) a ON a.category_id = b.category_id
    ORDER BY ec.name
  `);

  return {
    data: Array.from(rows).map((r) => {
      const budgeted = parseMoney(r.budgeted);
      const actual = parseMoney(r.actual);
      return {
        categoryId: r.category_id,
        categoryName: r.category_name,
        budgeted,
        actual,
        variance: subtractMoney(budgeted, actual),
        expenseCount: r.expense_count,
      };
    }),
  };
}

function dateConditions(column: SQL, input: SummaryRangeInput): SQL[] {
  const range = parseInput(summaryRangeSchema, input);
  const conditions: SQL[] = [];
  if (range.dateFrom) conditions.push(sql`${column} >= ${range.dateFrom}`);
  if (range.dateTo) conditions.push(sql`${column} <= ${range.dateTo}`);
  return conditions;
}

export async function getContributionSummary(
  input: SummaryRangeInput = {},
): Promise<{ data: ReportLine[]; total: number }> {
  const conditions = [sql`c.deleted = false`, ...dateConditions(sql`c.contribution_date`, input)];

  const rows = await db.execute<LineRow>(sql`
    SELECT ct.name, SUM(c.amount) AS total, count(c.id)::int AS count
    FROM contributions c
    JOIN contribution_types ct ON ct.id = c.contribution_type_id
    WHERE ${whereAll(conditions)}
    GROUP BY ct.id, ct.name
    ORDER BY total DESC
  `);
  const data = toLines(rows);
  return { data, total: sum(data) };
}

/** Approved expenses only. */
export async function getExpenseSummary(
  input: SummaryRangeInput = {},
): Promise<{ data: ReportLine[]; total: number }> {
  const conditions = [sql`e.status = 'Approved'`, ...dateConditions(sql`e.expense_date`, input)];

  const rows = await db.execute<LineRow>(sql`
    SELECT ec.name, SUM(e.amount) AS total, count(e.id)::int AS count
    FROM expenses e
    JOIN expense_categories ec ON ec.id = e.category_id
    WHERE ${whereAll(conditions)}
    GROUP BY ec.id, ec.name
    ORDER BY total DESC
  `);
  const data = toLines(rows);
  return { data, total: sum(data) };
}

export async function getBalanceSheet(fiscalYearId: string): Promise<BalanceSheet> {
  await assertFiscalYear(fiscalYearId);

  const rows = await db.execute<{ income: string; pending: string; approved: string }>(sql`
    SELECT
      (SELECT COALESCE(SUM(amount), 0) FROM contributions
        WHERE fiscal_year_id = ${fiscalYearId} AND deleted = false) AS income,
      (SELECT COALESCE(SUM(amount), 0) FROM expenses
        WHERE fiscal_year_id = ${fiscalYearId} AND status = 'Pending Approval') AS pending,
      (SELECT COALESCE(SUM(amount), 0) FROM expenses
        WHERE fiscal_year_id = ${fiscalYearId} AND status = 'Approved') AS approved
  `);
  const row = Array.from(rows)[0];
  const assets = parseMoney(row?.income);
  const liabilities = parseMoney(row?.pending);
  const approved = parseMoney(row?.approved);

  return { fiscalYearId, assets, liabilities, equity: subtractMoney(assets, approved) };
}
