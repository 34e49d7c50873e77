import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll } from '@shepherd/db';
import {
  NotFoundError,
  assertUlid,
  paginate,
  parseInput,
  parseMoney,
  toPaginatedResult,
} from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { listBudgetsSchema } from '../validation';
import type { ListBudgetsInput } from '../validation';

export type BudgetItem = {
  id: string;
  title: string;
  description: string | null;
  amount: number;
  status: string;
  fiscalYearId: string;
  fiscalYearStart: string;
  fiscalYearEnd: string;
  categoryId: string;
  categoryName: string;
  branchId: string;
  branchName: string;
};

type BudgetRow = {
  id: string;
  title: string;
  description: string | null;
  amount: string;
  status: string;
  fiscal_year_id: string;
  fiscal_year_start: string;
  fiscal_year_end: string;
  category_id: string;
  category_name: string;
  branch_id: string;
  branch_name: string;
};

const SELECT_BUDGET = sql`
  SELECT bu.id, bu.title, bu.description, bu.amount, bu.status,
         bu.fiscal_year_id, fy.start_date AS fiscal_year_start, fy.end_date AS fiscal_year_end,
         bu.category_id, ec.name AS category_name,
         bu.branch_id, br.name AS branch_name
  FROM budgets bu
  JOIN fiscal_years fy ON fy.id = bu.fiscal_year_id
  JOIN expense_categories ec ON ec.id = bu.category_id
  JOIN branches br ON br.id = bu.branch_id
`;

function mapRow(r: BudgetRow): BudgetItem {
  return {
    id: r.id,
    title: r.title,
    description: r.description,
    amount: parseMoney(r.amount),
    status: r.status,
    fiscalYearId: r.fiscal_year_id,
    fiscalYearStart: r.fiscal_year_start,
    fiscalYearEnd: r.fiscal_year_end,
    categoryId: r.category_id,
    categoryName: r.category_name,
    branchId: r.branch_id,
    branchName: r.branch_name,
  };
}

export async function getBudget(budgetId: string): Promise<BudgetItem> {
  assertUlid(budgetId, 'budgetId');
  const rows = await db.execute<BudgetRow>(sql`${SELECT_BUDGET} WHERE bu.id = ${budgetId}`);
  const row = Array.from(rows)[0];
  if (!row) {
    throw new NotFoundError('Budget', budgetId);
  }
  return mapRow(row);
}

export async function listBudgets(input: ListBudgetsInput = {}): Promise<PaginatedResult<BudgetItem>> {
  const filters = parseInput(listBudgetsSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const conditions: SQL[] = [];
  if (filters.fiscalYearId) {
    conditions.push(sql`bu.fiscal_year_id = ${filters.fiscalYearId}`);
  }
  if (filters.branchId) {
    conditions.push(sql`bu.branch_id = ${filters.branchId}`);
  }
  if (filters.status) {
    conditions.push(sql`bu.status = ${filters.status}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM budgets bu WHERE ${where}`),
    db.execute<BudgetRow>(sql`
      ${SELECT_BUDGET}
      WHERE ${where}
      ORDER BY bu.created_at DESC
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  return toPaginatedResult(Array.from(rows).map(mapRow), page, limit, total);
}
