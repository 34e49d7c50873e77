import { eq, and } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges } from '@shepherd/core/audit';
import { budgets, contributions, expenses, fiscalYears } from '@shepherd/db';
import type { Transaction } from '@shepherd/db';
import {
  ConflictError,
  ValidationError,
  assertUlid,
  parseInput,
  rangesOverlap,
} from '@shepherd/shared';
import { createFiscalYearSchema, updateFiscalYearSchema } from '../validation';
import type { CreateFiscalYearInput, UpdateFiscalYearInput } from '../validation';
import { assertBranch, loadFiscalYear } from './helpers';

async function assertNoActiveOverlap(
  tx: Transaction,
  branchId: string,
  startDate: string,
  endDate: string,
  excludeId?: string,
): Promise<void> {
  const active = await tx.query.fiscalYears.findMany({
    where: and(eq(fiscalYears.branchId, branchId), eq(fiscalYears.status, 'Active')),
  });
  const clash = active.some(
    (fy) => fy.id !== excludeId && rangesOverlap(fy.startDate, fy.endDate, startDate, endDate),
  );
  if (clash) {
    throw new ConflictError('Fiscal year overlaps with an existing active fiscal year');
  }
}

export async function createFiscalYear(ctx: RequestContext, input: CreateFiscalYearInput) {
  const data = parseInput(createFiscalYearSchema, input);

  const fiscalYear = await publishWithNotifications(ctx, async (tx) => {
    await assertBranch(tx, data.branchId);
    if (data.status === 'Active') {
      await assertNoActiveOverlap(tx, data.branchId, data.startDate, data.endDate);
    }

    const [created] = await tx.insert(fiscalYears).values(data).returning();
    return {
      result: created,
      notifications: [
        {
          title: 'New Fiscal Year Created',
          message: `Fiscal year ${data.startDate} to ${data.endDate} has been created.`,
        },
      ],
    };
  });

  await auditLog(ctx, 'fiscal_year.created', 'fiscal_year', fiscalYear.id);
  return fiscalYear;
}

export async function updateFiscalYear(ctx: RequestContext, fiscalYearId: string, input: UpdateFiscalYearInput) {
  assertUlid(fiscalYearId, 'fiscalYearId');
  const data = parseInput(updateFiscalYearSchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadFiscalYear(tx, fiscalYearId);
    const merged = { ...existing, ...data };

    if (merged.startDate >= merged.endDate) {
      throw new ValidationError('Start date must be before end date');
    }
    if (data.branchId) {
      await assertBranch(tx, data.branchId);
    }
    if (merged.status === 'Active') {
      await assertNoActiveOverlap(tx, merged.branchId, merged.startDate, merged.endDate, fiscalYearId);
    }

    const [row] = await tx
      .update(fiscalYears)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(fiscalYears.id, fiscalYearId))
      .returning();

    return {
      result: { updated: row, changes: computeChanges(existing, data) },
      notifications: [
        {
          title: 'Fiscal Year Updated',
          message: `Fiscal year ${merged.startDate} to ${merged.endDate} has been updated.`,
        },
      ],
    };
  });

  await auditLog(ctx, 'fiscal_year.updated', 'fiscal_year', fiscalYearId, changes);
  return updated;
}

export async function deleteFiscalYear(ctx: RequestContext, fiscalYearId: string) {
  assertUlid(fiscalYearId, 'fiscalYearId');

  await publishWithNotifications(ctx, async (tx) => {
    await loadFiscalYear(tx, fiscalYearId);

    const references =
      (await tx.$count(budgets, eq(budgets.fiscalYearId, fiscalYearId))) +
      (await tx.$count(contributions, eq(contributions.fiscalYearId, fiscalYearId))) +
      (await tx.$count(expenses, eq(expenses.fiscalYearId, fiscalYearId)));
    if (references > 0) {
      throw new ConflictError('Cannot delete fiscal year with associated budgets, contributions, or expenses');
    }

    await tx.delete(fiscalYears).where(eq(fiscalYears.id, fiscalYearId));
    return { result: null, notifications: [] };
  });

  await auditLog(ctx, 'fiscal_year.deleted', 'fiscal_year', fiscalYearId);
}

export async function closeFiscalYear(ctx: RequestContext, fiscalYearId: string) {
  assertUlid(fiscalYearId, 'fiscalYearId');

  const closed = await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadFiscalYear(tx, fiscalYearId);
    if (existing.status === 'Closed') {
      throw new ValidationError('Fiscal year is already closed');
    }

    const [row] = await tx
      .update(fiscalYears)
      .set({ status: 'Closed', updatedAt: new Date() })
      .where(eq(fiscalYears.id, fiscalYearId))
      .returning();

    return {
      result: row,
      notifications: [
        {
          title: 'Fiscal Year Closed',
          message: `Fiscal year ${existing.startDate} to ${existing.endDate} has been closed.`,
        },
      ],
    };
  });

  await auditLog(ctx, 'fiscal_year.closed', 'fiscal_year', fiscalYearId, {
    status: { old: 'Active', new: 'Closed' },
  });
  return closed;
}
