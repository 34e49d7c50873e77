import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges, logFinancialAction } from '@shepherd/core/audit';
import { contributionTypes, contributions, paymentOptions } from '@shepherd/db';
import type { Transaction } from '@shepherd/db';
import {
  NotFoundError,
  ValidationError,
  assertUlid,
  isFutureDate,
  parseInput,
  toMoneyString,
} from '@shepherd/shared';
import { createContributionSchema, updateContributionSchema } from '../validation';
import type { CreateContributionInput, UpdateContributionInput } from '../validation';
import { assertActiveFiscalYear, loadActiveMember } from './helpers';

type ContributionRefs = {
  memberId?: string;
  contributionTypeId?: string;
  paymentOptionId?: string;
  fiscalYearId?: string;
  contributionDate?: string;
};

async function assertReferences(tx: Transaction, refs: ContributionRefs): Promise<void> {
  if (refs.contributionDate && isFutureDate(refs.contributionDate)) {
    throw new ValidationError('Contribution date cannot be in the future');
  }
  if (refs.memberId) {
    await loadActiveMember(tx, refs.memberId);
  }
  if (refs.contributionTypeId) {
    const type = await tx.query.contributionTypes.findFirst({
      where: eq(contributionTypes.id, refs.contributionTypeId),
    });
    if (!type) {
      throw new ValidationError('Invalid contribution type');
    }
  }
  if (refs.paymentOptionId) {
    const option = await tx.query.paymentOptions.findFirst({ where: eq(paymentOptions.id, refs.paymentOptionId) });
    if (!option) {
      throw new ValidationError('Invalid payment option');
    }
  }
  if (refs.fiscalYearId) {
    await assertActiveFiscalYear(tx, refs.fiscalYearId);
  }
}

async function loadContribution(tx: Transaction, contributionId: string) {
  const contribution = await tx.query.contributions.findFirst({ where: eq(contributions.id, contributionId) });
  if (!contribution) {
    throw new NotFoundError('Contribution', contributionId);
  }
  return contribution;
}

export async function createContribution(ctx: RequestContext, input: CreateContributionInput) {
  const data = parseInput(createContributionSchema, input);

  const contribution = await publishWithNotifications(ctx, async (tx) => {
    await assertReferences(tx, data);

    const [created] = await tx
      .insert(contributions)
      .values({
        memberId: data.memberId,
        contributionTypeId: data.contributionTypeId,
        paymentOptionId: data.paymentOptionId,
        fiscalYearId: data.fiscalYearId,
        amount: toMoneyString(data.amount),
        contributionDate: data.contributionDate,
        description: data.description ?? null,
        recordedBy: ctx.user.id,
      })
      .returning();
    return { result: created, notifications: [] };
  });

  await logFinancialAction(ctx, 'contribution.created', 'contribution', contribution.id, {
    amount: data.amount,
    memberId: data.memberId,
  });
  return contribution;
}

export async function updateContribution(
  ctx: RequestContext,
  contributionId: string,
  input: UpdateContributionInput,
) {
  assertUlid(contributionId, 'contributionId');
  const data = parseInput(updateContributionSchema, input);
  const values = {
    ...data,
    amount: data.amount === undefined ? undefined : toMoneyString(data.amount),
  };

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadContribution(tx, contributionId);
    if (existing.deleted) {
      throw new ValidationError('Cannot update a deleted contribution');
    }
    await assertReferences(tx, data);

    const [row] = await tx
      .update(contributions)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(contributions.id, contributionId))
      .returning();
    return { result: { updated: row, changes: computeChanges(existing, values) }, notifications: [] };
  });

  await auditLog(ctx, 'contribution.updated', 'contribution', contributionId, changes, { category: 'financial' });
  return updated;
}

async function setDeleted(ctx: RequestContext, contributionId: string, deleted: boolean) {
  assertUlid(contributionId, 'contributionId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadContribution(tx, contributionId);
    if (existing.deleted === deleted) {
      throw new ValidationError(deleted ? 'Contribution is already deleted' : 'Contribution is not deleted');
    }

    await tx
      .update(contributions)
      .set({ deleted, updatedAt: new Date() })
      .where(eq(contributions.id, contributionId));
    return { result: null, notifications: [] };
  });

  await logFinancialAction(
    ctx,
    deleted ? 'contribution.deleted' : 'contribution.restored',
    'contribution',
    contributionId,
  );
}

export async function deleteContribution(ctx: RequestContext, contributionId: string) {
  await setDeleted(ctx, contributionId, true);
}

export async function restoreContribution(ctx: RequestContext, contributionId: string) {
  await setDeleted(ctx, contributionId, false);
}
