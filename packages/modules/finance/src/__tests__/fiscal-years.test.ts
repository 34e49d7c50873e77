import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@shepherd/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@shepherd/db')>();
  const { mockDb } = await import('@shepherd/core/testing');
  return { ...actual, db: mockDb };
});

import { ConflictError, NotFoundError, ValidationError } from '@shepherd/shared';
import { setAuditLogger } from '@shepherd/core/audit';
import { mockDb, createTestContext, testId, TEST_USER_ID } from '@shepherd/core/testing';
import {
  closeFiscalYear,
  createFiscalYear,
  deleteFiscalYear,
  updateFiscalYear,
} from '../commands/fiscal-years';
import { getFiscalYear, listFiscalYears } from '../queries/fiscal-years';

const FY = testId('FY1');
const BRANCH = testId('B1');

const audit = { log: vi.fn().mockResolvedValue(undefined) };
const fiscalYear = { id: FY, branchId: BRANCH, startDate: '2026-01-01', endDate: '2026-12-31', status: 'Active' };

beforeEach(() => {
  mockDb.reset();
  audit.log.mockClear();
  setAuditLogger(audit);
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
});

describe('createFiscalYear', () => {
  it('creates an active year and announces it', async () => {
    mockDb.query.branches.findFirst.mockResolvedValueOnce({ id: BRANCH });

    const created = await createFiscalYear(createTestContext(), {
      branchId: BRANCH,
      startDate: '2026-01-01',
      endDate: '2026-12-31',
    });

    expect(created).toEqual({
      id: 'fiscal_years-1',
      branchId: BRANCH,
      startDate: '2026-01-01',
      endDate: '2026-12-31',
      status: 'Active',
    });
    expect(mockDb.writesTo('communications', 'insert')[0]?.values).toEqual([
      {
        title: 'New Fiscal Year Created',
        message: 'Fiscal year 2026-01-01 to 2026-12-31 has been created.',
        channel: 'in_app',
        sentBy: TEST_USER_ID,
        targetGroupId: null,
      },
    ]);
    expect(audit.log).toHaveBeenCalledWith(expect.objectContaining({ action: 'fiscal_year.created' }));
  });

  it('rejects a start date after the end date', async () => {
    await expect(
      createFiscalYear(createTestContext(), { branchId: BRANCH, startDate: '2026-12-31', endDate: '2026-01-01' }),
    ).rejects.toMatchObject({
      details: [{ field: 'endDate', message: 'Start date must be before end date' }],
    });
  });

  it('rejects an overlapping active year in the same branch', async () => {
    mockDb.query.branches.findFirst.mockResolvedValueOnce({ id: BRANCH });
    mockDb.query.fiscalYears.findMany.mockResolvedValueOnce([
      { ...fiscalYear, id: testId('FY2'), startDate: '2026-06-01', endDate: '2027-05-31' },
    ]);

    await expect(
      createFiscalYear(createTestContext(), { branchId: BRANCH, startDate: '2026-01-01', endDate: '2026-12-31' }),
    ).rejects.toThrow(new ConflictError('Fiscal year overlaps with an existing active fiscal year'));
  });

  it('skips the overlap check for a closed year', async () => {
    mockDb.query.branches.findFirst.mockResolvedValueOnce({ id: BRANCH });

    await createFiscalYear(createTestContext(), {
      branchId: BRANCH,
      startDate: '2025-01-01',
      endDate: '2025-12-31',
      status: 'Closed',
    });

    expect(mockDb.query.fiscalYears.findMany).not.toHaveBeenCalled();
  });
});

describe('updateFiscalYear', () => {
  it('ignores its own row when checking overlap', async () => {
    mockDb.query.fiscalYears.findFirst.mockResolvedValueOnce(fiscalYear);
    mockDb.query.fiscalYears.findMany.mockResolvedValueOnce([fiscalYear]);

    await updateFiscalYear(createTestContext(), FY, { endDate: '2026-11-30' });

    expect(audit.log).toHaveBeenCalledWith(
      expect.objectContaining({ changes: { endDate: { old: '2026-12-31', new: '2026-11-30' } } }),
    );
  });

  it('checks the merged dates', async () => {
    mockDb.query.fiscalYears.findFirst.mockResolvedValueOnce(fiscalYear);

    await expect(updateFiscalYear(createTestContext(), FY, { startDate: '2027-01-01' })).rejects.toThrow(
      new ValidationError('Start date must be before end date'),
    );
  });
});

describe('deleteFiscalYear', () => {
  it('is blocked while contributions reference it', async () => {
    mockDb.query.fiscalYears.findFirst.mockResolvedValueOnce(fiscalYear);
    mockDb.countResults.push(0, 4, 0);

    await expect(deleteFiscalYear(createTestContext(), FY)).rejects.toThrow(
      new ConflictError('Cannot delete fiscal year with associated budgets, contributions, or expenses'),
    );
  });

  it('reports an unknown year', async () => {
    await expect(deleteFiscalYear(createTestContext(), FY)).rejects.toThrow(new NotFoundError('Fiscal year', FY));
  });
});

describe('closeFiscalYear', () => {
  it('closes an active year', async () => {
    mockDb.query.fiscalYears.findFirst.mockResolvedValueOnce(fiscalYear);

    await closeFiscalYear(createTestContext(), FY);

    expect(mockDb.writesTo('fiscal_years', 'update')[0]?.values).toMatchObject({ status: 'Closed' });
    expect(audit.log).toHaveBeenCalledWith(
      expect.objectContaining({ action: 'fiscal_year.closed', changes: { status: { old: 'Active', new: 'Closed' } } }),
    );
  });

  it('fails when already closed', async () => {
    mockDb.query.fiscalYears.findFirst.mockResolvedValueOnce({ ...fiscalYear, status: 'Closed' });

    await expect(closeFiscalYear(createTestContext(), FY)).rejects.toThrow(
      new ValidationError('Fiscal year is already closed'),
    );
  });
});

describe('fiscal year queries', () => {
  const row = {
    id: FY,
    branch_id: BRANCH,
    branch_name: 'Main',
    start_date: '2026-01-01',
    end_date: '2026-12-31',
    status: 'Active',
    created_at: new Date('2025-12-01T09:00:00.000Z'),
  };

  it('getFiscalYear maps the row', async () => {
    mockDb.executeResults.push([row]);

    expect(await getFiscalYear(FY)).toEqual({
      id: FY,
      branchId: BRANCH,
      branchName: 'Main',
      startDate: '2026-01-01',
      endDate: '2026-12-31',
      status: 'Active',
      createdAt: '2025-12-01T09:00:00.000Z',
    });
  });

  it('listFiscalYears returns a page', async () => {
    mockDb.executeResults.push([{ total: 1 }], [row]);

    const result = await listFiscalYears({ status: 'Active' });

    expect(result.pagination).toEqual({ page: 1, limit: 10, total: 1, pages: 1 });
    expect(result.data[0]?.branchName).toBe('Main');
  });
});
