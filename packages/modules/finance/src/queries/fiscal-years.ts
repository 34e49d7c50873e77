import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll } from '@shepherd/db';
import {
  NotFoundError,
  assertUlid,
  paginate,
  parseInput,
  toIsoTimestamp,
  toPaginatedResult,
} from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { listFiscalYearsSchema } from '../validation';
import type { ListFiscalYearsInput } from '../validation';

export type FiscalYearItem = {
  id: string;
  branchId: string;
  branchName: string;
  startDate: string;
  endDate: string;
  status: string;
  createdAt: string;
};

type FiscalYearRow = {
  id: string;
  branch_id: string;
  branch_name: string;
  start_date: string;
  end_date: string;
  status: string;
  created_at: Date | string;
};

function mapRow(r: FiscalYearRow): FiscalYearItem {
  return {
    id: r.id,
    branchId: r.branch_id,
    branchName: r.branch_name,
    startDate: r.start_date,
    endDate: r.end_date,
    status: r.status,
    createdAt: toIsoTimestamp(r.created_at),
  };
}

const SELECT_FISCAL_YEAR = sql`
  SELECT fy.id, fy.branch_id, b.name AS branch_name, fy.start_date, fy.end_date, fy.status, fy.created_at
  FROM fiscal_years fy
  JOIN branches b ON b.id = fy.branch_id
`;

export async function getFiscalYear(fiscalYearId: string): Promise<FiscalYearItem> {
  assertUlid(fiscalYearId, 'fiscalYearId');
  const rows = await db.execute<FiscalYearRow>(sql`${SELECT_FISCAL_YEAR} WHERE fy.id = ${fiscalYearId}`);
  const row = Array.from(rows)[0];
  if (!row) {
    throw new NotFoundError('Fiscal year', fiscalYearId);
  }
  return mapRow(row);
}

export async function listFiscalYears(input: ListFiscalYearsInput = {}): Promise<PaginatedResult<FiscalYearItem>> {
  const filters = parseInput(listFiscalYearsSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const conditions: SQL[] = [];
  if (filters.branchId) {
    conditions.push(sql`fy.branch_id = ${filters.branchId}`);
  }
  if (filters.status) {
    conditions.push(sql`fy.status = ${filters.status}`);
  }
  if (filters.dateFrom) {
    conditions.push(sql`fy.end_date >= ${filters.dateFrom}`);
  }
  if (filters.dateTo) {
    conditions.push(sql`fy.start_date <= ${filters.dateTo}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM fiscal_years fy WHERE ${where}`),
    db.execute<FiscalYearRow>(sql`
      ${SELECT_FISCAL_YEAR}
      WHERE ${where}
      ORDER BY fy.start_date DESC
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  return toPaginatedResult(Array.from(rows).map(mapRow), page, limit, total);
}
