import type { SQL } from 'drizzle-orm';
import { asc } from 'drizzle-orm';
import { db, sql, whereAll, contributionTypes, paymentOptions } from '@shepherd/db';
import {
  NotFoundError,
  assertUlid,
  paginate,
  parseInput,
  parseMoney,
  toPaginatedResult,
} from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { contributionFiltersSchema, listContributionsSchema } from '../validation';
import type { ContributionFilters, ListContributionsInput } from '../validation';

export type ContributionItem = {
  id: string;
  memberId: string;
  memberName: string;
  contributionTypeId: string;
  contributionType: string;
  paymentOptionId: string;
  paymentOption: string;
  fiscalYearId: string;
  amount: number;
  contributionDate: string;
  description: string | null;
};

type ContributionRow = {
  id: string;
  member_id: string;
  member_name: string;
  contribution_type_id: string;
  contribution_type: string;
  payment_option_id: string;
  payment_option: string;
  fiscal_year_id: string;
  amount: string;
  contribution_date: string;
  description: string | null;
};

const SELECT_CONTRIBUTION = sql`
  SELECT c.id, c.member_id, m.first_name || ' ' || m.family_name AS member_name,
         c.contribution_type_id, ct.name AS contribution_type,
         c.payment_option_id, po.name AS payment_option,
         c.fiscal_year_id, c.amount, c.contribution_date, c.description
  FROM contributions c
  JOIN members m ON m.id = c.member_id
  JOIN contribution_types ct ON ct.id = c.contribution_type_id
  JOIN payment_options po ON po.id = c.payment_option_id
`;

function mapRow(r: ContributionRow): ContributionItem {
  return {
    id: r.id,
    memberId: r.member_id,
    memberName: r.member_name,
    contributionTypeId: r.contribution_type_id,
    contributionType: r.contribution_type,
    paymentOptionId: r.payment_option_id,
    paymentOption: r.payment_option,
    fiscalYearId: r.fiscal_year_id,
    amount: parseMoney(r.amount),
    contributionDate: r.contribution_date,
    description: r.description,
  };
}

function buildConditions(filters: ContributionFilters): SQL[] {
  const conditions: SQL[] = [sql`c.deleted = false`];
  if (filters.typeId) {
    conditions.push(sql`c.contribution_type_id = ${filters.typeId}`);
  }
  if (filters.memberId) {
    conditions.push(sql`c.member_id = ${filters.memberId}`);
  }
  if (filters.fiscalYearId) {
    conditions.push(sql`c.fiscal_year_id = ${filters.fiscalYearId}`);
  }
  if (filters.startDate) {
    conditions.push(sql`c.contribution_date >= ${filters.startDate}`);
  }
  if (filters.endDate) {
    conditions.push(sql`c.contribution_date <= ${filters.endDate}`);
  }
  return conditions;
}

export async function getContribution(contributionId: string): Promise<ContributionItem> {
  assertUlid(contributionId, 'contributionId');
  const rows = await db.execute<ContributionRow>(
    sql`${SELECT_CONTRIBUTION} WHERE c.id = ${contributionId} AND c.deleted = false`,
  );
  const row = Array.from(rows)[0];
  if (!row) {
    throw new NotFoundError('Contribution', contributionId);
  }
  return mapRow(row);
}

export async function listContributions(
  input: ListContributionsInput = {},
): Promise<PaginatedResult<ContributionItem>> {
  const filters = parseInput(listContributionsSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);
  const where = whereAll(buildConditions(filters));

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM contributions c WHERE ${where}`),
    db.execute<ContributionRow>(sql`
      ${SELECT_CONTRIBUTION}
      WHERE ${where}
      ORDER BY c.contribution_date DESC, c.id DESC
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  return toPaginatedResult(Array.from(rows).map(mapRow), page, limit, total);
}

export async function getContributionTotal(input: ContributionFilters = {}): Promise<{ total: number }> {
  const filters = parseInput(contributionFiltersSchema, input);
  const where = whereAll(buildConditions(filters));

  const rows = await db.execute<{ total: string | null }>(
    sql`SELECT COALESCE(SUM(c.amount), 0) AS total FROM contributions c WHERE ${where}`,
  );
  return { total: parseMoney(Array.from(rows)[0]?.total) };
}

export async function listContributionTypes() {
  return db.query.contributionTypes.findMany({ orderBy: asc(contributionTypes.name) });
}

export async function listPaymentOptions() {
  return db.query.paymentOptions.findMany({ orderBy: asc(paymentOptions.name) });
}
