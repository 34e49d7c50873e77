import { eq, and } from 'drizzle-orm';
import { branches, expenseCategories, fiscalYears, members } from '@shepherd/db';
import type { Transaction } from '@shepherd/db';
import { NotFoundError, ValidationError } from '@shepherd/shared';

export async function loadFiscalYear(tx: Transaction, fiscalYearId: string) {
  const fiscalYear = await tx.query.fiscalYears.findFirst({ where: eq(fiscalYears.id, fiscalYearId) });
  if (!fiscalYear) {
    throw new NotFoundError('Fiscal year', fiscalYearId);
  }
  return fiscalYear;
}

export async function assertActiveFiscalYear(tx: Transaction, fiscalYearId: string) {
  const fiscalYear = await tx.query.fiscalYears.findFirst({
    where: and(eq(fiscalYears.id, fiscalYearId), eq(fiscalYears.status, 'Active')),
  });
  if (!fiscalYear) {
    throw new ValidationError('Selected fiscal year is not active');
  }
  return fiscalYear;
}

export async function assertBranch(tx: Transaction, branchId: string): Promise<void> {
  const branch = await tx.query.branches.findFirst({ where: eq(branches.id, branchId) });
  if (!branch) {
    throw new NotFoundError('Branch', branchId);
  }
}

export async function assertExpenseCategory(tx: Transaction, categoryId: string): Promise<void> {
  const category = await tx.query.expenseCategories.findFirst({ where: eq(expenseCategories.id, categoryId) });
  if (!category) {
    throw new ValidationError('Invalid expense category');
  }
}

export async function loadActiveMember(tx: Transaction, memberId: string) {
  const member = await tx.query.members.findFirst({
    where: and(eq(members.id, memberId), eq(members.deleted, false)),
  });
  if (!member || member.membershipStatus !== 'Active') {
    throw new ValidationError('Invalid or inactive member');
  }
  return member;
}
