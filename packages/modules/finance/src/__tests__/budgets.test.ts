import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@shepherd/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@shepherd/db')>();
  const { mockDb } = await import('@shepherd/core/testing');
  return { ...actual, db: mockDb };
});

import { ConflictError, ValidationError } from '@shepherd/shared';
import { setAuditLogger } from '@shepherd/core/audit';
import { mockDb, createTestContext, testId, TEST_USER_ID } from '@shepherd/core/testing';
import { createBudget, deleteBudget, reviewBudget, submitBudget, updateBudget } from '../commands/budgets';
import { getBudget, listBudgets } from '../queries/budgets';

const BUDGET = testId('BG1');
const FY = testId('FY1');
const CATEGORY = testId('C1');
const BRANCH = testId('B1');

const audit = { log: vi.fn().mockResolvedValue(undefined) };
const budget = { id: BUDGET, title: 'Youth camp', amount: '1500.00', status: 'Draft' };
const input = { fiscalYearId: FY, categoryId: CATEGORY, branchId: BRANCH, title: 'Youth camp', amount: 1500 };

beforeEach(() => {
  mockDb.reset();
  audit.log.mockClear();
  setAuditLogger(audit);
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
});

describe('createBudget', () => {
  it('stores a draft budget', async () => {
    mockDb.query.fiscalYears.findFirst.mockResolvedValueOnce({ id: FY, status: 'Active' });
    mockDb.query.expenseCategories.findFirst.mockResolvedValueOnce({ id: CATEGORY });
    mockDb.query.branches.findFirst.mockResolvedValueOnce({ id: BRANCH });

    await createBudget(createTestContext(), input);

    expect(mockDb.writesTo('budgets', 'insert')[0]?.values).toEqual({
      fiscalYearId: FY,
      categoryId: CATEGORY,
      branchId: BRANCH,
      title: 'Youth camp',
      description: null,
      amount: '1500.00',
      status: 'Draft',
      createdBy: TEST_USER_ID,
    });
    expect(audit.log).toHaveBeenCalledWith(
      expect.objectContaining({
        action: 'budget.created',
        entityId: 'budgets-1',
        metadata: { requestId: 'req-1', category: 'financial', amount: 1500 },
      }),
    );
  });

  it('requires a positive amount', async () => {
    await expect(createBudget(createTestContext(), { ...input, amount: 0 })).rejects.toMatchObject({
      details: [{ field: 'amount', message: 'Budget amount must be positive' }],
    });
  });

  it('requires an active fiscal year', async () => {
    await expect(createBudget(createTestContext(), input)).rejects.toThrow(
      new ValidationError('Selected fiscal year is not active'),
    );
  });

  it('rejects an unknown category', async () => {
    mockDb.query.fiscalYears.findFirst.mockResolvedValueOnce({ id: FY, status: 'Active' });

    await expect(createBudget(createTestContext(), input)).rejects.toThrow(
      new ValidationError('Invalid expense category'),
    );
  });
});

describe('budget workflow', () => {
  it('updates the amount of a draft', async () => {
    mockDb.query.budgets.findFirst.mockResolvedValueOnce(budget);

    await updateBudget(createTestContext(), BUDGET, { amount: 1750 });

    expect(mockDb.writesTo('budgets', 'update')[0]?.values).toMatchObject({ amount: '1750.00' });
    expect(audit.log).toHaveBeenCalledWith(
      expect.objectContaining({ changes: { amount: { old: '1500.00', new: '1750.00' } } }),
    );
  });

  it('locks approved budgets', async () => {
    mockDb.query.budgets.findFirst.mockResolvedValueOnce({ ...budget, status: 'Approved' });

    await expect(updateBudget(createTestContext(), BUDGET, { amount: 10 })).rejects.toThrow(
      new ValidationError('Cannot update an approved budget'),
    );
  });

  it('submits a draft', async () => {
    mockDb.query.budgets.findFirst.mockResolvedValueOnce(budget);

    await submitBudget(createTestContext(), BUDGET);

    expect(mockDb.writesTo('budgets', 'update')[0]?.values).toMatchObject({ status: 'Submitted' });
  });

  it('only submits drafts', async () => {
    mockDb.query.budgets.findFirst.mockResolvedValueOnce({ ...budget, status: 'Rejected' });

    await expect(submitBudget(createTestContext(), BUDGET)).rejects.toThrow(
      new ValidationError("Cannot submit a budget in 'Rejected' status"),
    );
  });

  it('approves a submitted budget', async () => {
    mockDb.query.budgets.findFirst.mockResolvedValueOnce({ ...budget, status: 'Submitted' });

    await reviewBudget(createTestContext(), BUDGET, { action: 'approve' });

    expect(mockDb.writesTo('budgets', 'update')[0]?.values).toMatchObject({
      status: 'Approved',
      reviewedBy: TEST_USER_ID,
    });
    expect(mockDb.writesTo('communications', 'insert')[0]?.values).toEqual([
      expect.objectContaining({ title: 'Budget Approved', message: 'Budget "Youth camp" has been approved.' }),
    ]);
    expect(audit.log).toHaveBeenCalledWith(
      expect.objectContaining({
        action: 'budget.approved',
        metadata: { requestId: 'req-1', category: 'approval', decision: 'Approved', comments: null },
      }),
    );
  });

  it('carries rejection comments into the notice', async () => {
    mockDb.query.budgets.findFirst.mockResolvedValueOnce({ ...budget, status: 'Submitted' });

    await reviewBudget(createTestContext(), BUDGET, { action: 'reject', comments: 'Trim transport' });

    expect(mockDb.writesTo('communications', 'insert')[0]?.values).toEqual([
      expect.objectContaining({
        title: 'Budget Rejected',
        message: 'Budget "Youth camp" has been rejected. Comments: Trim transport',
      }),
    ]);
  });

  it('only reviews submitted budgets', async () => {
    mockDb.query.budgets.findFirst.mockResolvedValueOnce(budget);

    await expect(reviewBudget(createTestContext(), BUDGET, { action: 'approve' })).rejects.toThrow(
      new ValidationError('Only submitted budgets can be reviewed'),
    );
  });

  it('never deletes an approved budget', async () => {
    mockDb.query.budgets.findFirst.mockResolvedValueOnce({ ...budget, status: 'Approved' });

    await expect(deleteBudget(createTestContext(), BUDGET)).rejects.toThrow(
      new ConflictError('Cannot delete an approved budget'),
    );
    expect(mockDb.writes).toHaveLength(0);
  });
});

describe('getBudget', () => {
  it('converts the amount to a number', async () => {
    mockDb.executeResults.push([
      {
        id: BUDGET,
        title: 'Youth camp',
        description: null,
        amount: '1500.00',
        status: 'Draft',
        fiscal_year_id: FY,
        fiscal_year_start: '2026-01-01',
        fiscal_year_end: '2026-12-31',
        category_id: CATEGORY,
        category_name: 'Outreach',
        branch_id: BRANCH,
        branch_name: 'Main',
      },
    ]);

    const found = await getBudget(BUDGET);

    expect(found.amount).toBe(1500);
    expect(found.categoryName).toBe('Outreach');
  });
});

describe('listBudgets', () => {
  const row = {
    id: BUDGET,
    title: 'Youth camp',
    description: null,
    amount: '1500.00',
    status: 'Submitted',
    fiscal_year_id: FY,
    fiscal_year_start: '2026-01-01',
    fiscal_year_end: '2026-12-31',
    category_id: CATEGORY,
    category_name: 'Youth',
    branch_id: BRANCH,
    branch_name: 'Main',
  };

  it('filters by fiscal year and status and pages the result', async () => {
    mockDb.executeResults.push([{ total: 7 }], [row]);

    const result = await listBudgets({ page: 2, limit: 5, fiscalYearId: FY, status: 'Submitted' });

    expect(result).toEqual({
      data: [
        {
          id: BUDGET,
          title: 'Youth camp',
          description: null,
          amount: 1500,
          status: 'Submitted',
          fiscalYearId: FY,
          fiscalYearStart: '2026-01-01',
          fiscalYearEnd: '2026-12-31',
          categoryId: CATEGORY,
          categoryName: 'Youth',
          branchId: BRANCH,
          branchName: 'Main',
        },
      ],
      pagination: { page: 2, limit: 5, total: 7, pages: 2 },
    });

    const [count, page] = mockDb.executedQueries();
    expect(count).toEqual({
      sql: 'SELECT count(*)::int AS total FROM budgets bu WHERE bu.fiscal_year_id = $1 AND bu.status = $2',
      params: [FY, 'Submitted'],
    });
    expect(page?.sql).toContain('WHERE bu.fiscal_year_id = $1 AND bu.status = $2');
    expect(page?.params).toEqual([FY, 'Submitted', 5, 5]);
  });

  it('filters by branch', async () => {
    mockDb.executeResults.push([{ total: 0 }], []);

    await listBudgets({ branchId: BRANCH });

    const [count] = mockDb.executedQueries();
    expect(count).toEqual({
      sql: 'SELECT count(*)::int AS total FROM budgets bu WHERE bu.branch_id = $1',
      params: [BRANCH],
    });
  });

  it('lists everything on the first page by default', async () => {
    mockDb.executeResults.push([{ total: 0 }], []);

    const result = await listBudgets();

    expect(result).toEqual({ data: [], pagination: { page: 1, limit: 10, total: 0, pages: 0 } });
    const [count, page] = mockDb.executedQueries();
    expect(count?.sql).toBe('SELECT count(*)::int AS total FROM budgets bu WHERE TRUE');
    expect(page?.params).toEqual([10, 0]);
  });
});
