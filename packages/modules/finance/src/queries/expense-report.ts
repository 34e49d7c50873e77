import type { SQL } from 'drizzle-orm';
import type { z } from 'zod';
import { db, sql, whereAll } from '@shepherd/db';
import { parseInput, parseMoney } from '@shepherd/shared';
import { expenseReportSchema } from '../validation';
import type { ExpenseReportInput } from '../validation';

export type ExpenseReportLine = {
  label: string;
  total: number;
  count: number;
};

type ReportRow = { label: string; total: string | null; count: number };

function buildReportQuery(filters: z.output<typeof expenseReportSchema>): SQL {
  const conditions: SQL[] = [];
  switch (filters.type) {
    case 'by_category':
      if (filters.fiscalYearId) conditions.push(sql`e.fiscal_year_id = ${filters.fiscalYearId}`);
      return sql`
        SELECT ec.name AS label, SUM(e.amount) AS total, count(e.id)::int AS count
        FROM expenses e
        JOIN expense_categories ec ON ec.id = e.category_id
        WHERE ${whereAll(conditions)}
        GROUP BY ec.id, ec.name
        ORDER BY ec.name
      `;
    case 'by_fiscal_year':
      return sql`
        SELECT fy.start_date || ' to ' || fy.end_date AS label, SUM(e.amount) AS total, count(e.id)::int AS count
        FROM expenses e
        JOIN fiscal_years fy ON fy.id = e.fiscal_year_id
        GROUP BY fy.id, fy.start_date, fy.end_date
        ORDER BY fy.start_date
      `;
    case 'pending_vs_approved':
      if (filters.fiscalYearId) conditions.push(sql`e.fiscal_year_id = ${filters.fiscalYearId}`);
      return sql`
        SELECT e.status AS label, SUM(e.amount) AS total, count(e.id)::int AS count
        FROM expenses e
        WHERE ${whereAll(conditions)}
        GROUP BY e.status
        ORDER BY e.status
      `;
    case 'by_month':
      if (filters.year) conditions.push(sql`EXTRACT(YEAR FROM e.expense_date) = ${filters.year}`);
      return sql`
        SELECT to_char(e.expense_date, 'YYYY-MM') AS label, SUM(e.amount) AS total, count(e.id)::int AS count
        FROM expenses e
        WHERE ${whereAll(conditions)}
        GROUP BY 1
        ORDER BY 1
      `;
  }
}

/**
 * Grouped expense totals. `fiscalYearId` narrows the category and status
 * reports; `year` narrows the monthly one.
 */
export async function getExpenseReport(input: ExpenseReportInput): Promise<{ data: ExpenseReportLine[] }> {
  const filters = parseInput(expenseReportSchema, input);
  const rows = await db.execute<ReportRow>(buildReportQuery(filters));
  return {
    data: Array.from(rows).map((r) => ({ label: r.label, total: parseMoney(r.total), count: r.count })),
  };
}
