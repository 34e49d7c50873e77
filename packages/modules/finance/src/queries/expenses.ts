import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll } from '@shepherd/db';
import {
  NotFoundError,
  assertUlid,
  paginate,
  parseInput,
  parseMoney,
  toIsoTimestamp,
  toPaginatedResult,
} from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { listExpensesSchema } from '../validation';
import type { ListExpensesInput } from '../validation';

export type ExpenseItem = {
  id: string;
  title: string;
  purpose: string | null;
  amount: number;
  expenseDate: string;
  status: string;
  fiscalYearId: string;
  categoryId: string;
  categoryName: string;
  branchId: string | null;
  requestedBy: string | null;
  requestedByName: string | null;
};

type ExpenseRow = {
  id: string;
  title: string;
  purpose: string | null;
  amount: string;
  expense_date: string;
  status: string;
  fiscal_year_id: string;
  category_id: string;
  category_name: string;
  branch_id: string | null;
  requested_by: string | null;
  requested_by_name: string | null;
};

type ApprovalRow = {
  id: string;
  approver_id: string;
  approver_name: string;
  status: string;
  comments: string | null;
  created_at: Date | string;
};

const SELECT_EXPENSE = sql`
  SELECT e.id, e.title, e.purpose, e.amount, e.expense_date, e.status,
         e.fiscal_year_id, e.category_id, ec.name AS category_name, e.branch_id,
         e.requested_by, m.first_name || ' ' || m.family_name AS requested_by_name
  FROM expenses e
  JOIN expense_categories ec ON ec.id = e.category_id
  LEFT JOIN members m ON m.id = e.requested_by
`;

function mapRow(r: ExpenseRow): ExpenseItem {
  return {
    id: r.id,
    title: r.title,
    purpose: r.purpose,
    amount: parseMoney(r.amount),
    expenseDate: r.expense_date,
    status: r.status,
    fiscalYearId: r.fiscal_year_id,
    categoryId: r.category_id,
    categoryName: r.category_name,
    branchId: r.branch_id,
    requestedBy: r.requested_by,
    requestedByName: r.requested_by_name,
  };
}

/** Includes the approval trail, newest first. */
export async function getExpense(expenseId: string) {
  assertUlid(expenseId, 'expenseId');

  const [rows, approvalRows] = await Promise.all([
    db.execute<ExpenseRow>(sql`${SELECT_EXPENSE} WHERE e.id = ${expenseId}`),
    db.execute<ApprovalRow>(sql`
      SELECT ea.id, ea.approver_id, m.first_name || ' ' || m.family_name AS approver_name,
             ea.status, ea.comments, ea.created_at
      FROM expense_approvals ea
      JOIN members m ON m.id = ea.approver_id
      WHERE ea.expense_id = ${expenseId}
      ORDER BY ea.created_at DESC
    `),
  ]);
  const row = Array.from(rows)[0];
  if (!row) {
    throw new NotFoundError('Expense', expenseId);
  }

  return {
    ...mapRow(row),
    approvals: Array.from(approvalRows).map((a) => ({
      id: a.id,
      approverId: a.approver_id,
      approverName: a.approver_name,
      status: a.status,
      comments: a.comments,
      createdAt: toIsoTimestamp(a.created_at),
    })),
  };
}

export async function listExpenses(input: ListExpensesInput = {}): Promise<PaginatedResult<ExpenseItem>> {
  const filters = parseInput(listExpensesSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const conditions: SQL[] = [];
  if (filters.fiscalYearId) {
    conditions.push(sql`e.fiscal_year_id = ${filters.fiscalYearId}`);
  }
  if (filters.categoryId) {
    conditions.push(sql`e.category_id = ${filters.categoryId}`);
  }
  if (filters.status) {
    conditions.push(sql`e.status = ${filters.status}`);
  }
  if (filters.startDate) {
    conditions.push(sql`e.expense_date >= ${filters.startDate}`);
  }
  if (filters.endDate) {
    conditions.push(sql`e.expense_date <= ${filters.endDate}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM expenses e WHERE ${where}`),
    db.execute<ExpenseRow>(sql`
      ${SELECT_EXPENSE}
      WHERE ${where}
      ORDER BY e.expense_date DESC, e.id DESC
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  return toPaginatedResult(Array.from(rows).map(mapRow), page, limit, total);
}
