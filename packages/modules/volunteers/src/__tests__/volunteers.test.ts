import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@shepherd/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@shepherd/db')>();
  const { mockDb } = await import('@shepherd/core/testing');
  return { ...actual, db: mockDb };
});

import { AuthorizationError, ConflictError, NotFoundError, ValidationError } from '@shepherd/shared';
import { setAuditLogger } from '@shepherd/core/audit';
import { mockDb, createTestContext, testId, TEST_USER_ID } from '@shepherd/core/testing';
import { createEvent } from '../commands/events';
import { createVolunteerRole } from '../commands/volunteer-roles';
import {
  assignVolunteers,
  completeAssignment,
  removeAssignment,
  respondToAssignment,
} from '../commands/assignments';
import { listEventVolunteers } from '../queries/volunteers';
import { listEvents } from '../queries/events';

const EVENT = testId('EV1');
const BRANCH = testId('B1');
const ROLE = testId('R1');
const M1 = testId('M1');
const M2 = testId('M2');
const ASSIGNMENT = testId('A1');

const audit = { log: vi.fn().mockResolvedValue(undefined) };
const event = { id: EVENT, name: 'Harvest', branchId: BRANCH };
const active = (id: string, firstName: string, familyName: string) => ({
  id,
  firstName,
  familyName,
  membershipStatus: 'Active',
  deleted: false,
});

beforeEach(() => {
  mockDb.reset();
  audit.log.mockClear();
  setAuditLogger(audit);
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
});

describe('createEvent', () => {
  it('schedules a future event and announces it', async () => {
    mockDb.query.branches.findFirst.mockResolvedValueOnce({ id: BRANCH });

    await createEvent(createTestContext(), {
      name: 'Harvest',
      eventDate: '2999-05-01',
      location: 'Main hall',
      branchId: BRANCH,
    });

    expect(mockDb.writesTo('events', 'insert')[0]?.values).toEqual({
      name: 'Harvest',
      description: null,
      eventDate: new Date('2999-05-01T00:00:00Z'),
      location: 'Main hall',
      branchId: BRANCH,
      createdBy: TEST_USER_ID,
    });
    expect(mockDb.writesTo('communications', 'insert')[0]?.values).toEqual([
      expect.objectContaining({
        title: 'New Event Created',
        message: "New event 'Harvest' scheduled for 2999-05-01 at Main hall.",
      }),
    ]);
  });

  it('refuses past dates', async () => {
    await expect(
      createEvent(createTestContext(), { name: 'Harvest', eventDate: '2020-05-01', branchId: BRANCH }),
    ).rejects.toThrow(new ValidationError('Event date must be in the future'));
  });

  it('requires the branch to exist', async () => {
    await expect(
      createEvent(createTestContext(), { name: 'Harvest', eventDate: '2999-05-01', branchId: BRANCH }),
    ).rejects.toThrow(new NotFoundError('Branch', BRANCH));
  });
});

describe('createVolunteerRole', () => {
  it('rejects a duplicate name', async () => {
    mockDb.query.volunteerRoles.findFirst.mockResolvedValueOnce({ id: ROLE, name: 'Usher' });

    await expect(createVolunteerRole(createTestContext(), { name: 'Usher' })).rejects.toThrow(
      new ConflictError('Volunteer role name already exists'),
    );
  });
});

describe('assignVolunteers', () => {
  it('assigns new volunteers and skips existing ones', async () => {
    mockDb.query.events.findFirst.mockResolvedValueOnce(event);
    mockDb.query.members.findFirst
      .mockResolvedValueOnce(active(M1, 'Ama', 'Owusu'))
      .mockResolvedValueOnce(active(M2, 'Kofi', 'Boateng'));
    mockDb.query.volunteerRoles.findFirst.mockResolvedValueOnce({ id: ROLE, name: 'Usher' });
    mockDb.query.eventVolunteers.findFirst
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce({ id: testId('A9'), eventId: EVENT, memberId: M2 });

    const outcome = await assignVolunteers(createTestContext(), EVENT, {
      volunteers: [{ memberId: M1, roleId: ROLE }, { memberId: M2 }],
    });

    expect(outcome).toEqual({ assigned: ['event_volunteers-1'], skipped: [M2] });
    expect(mockDb.writesTo('event_volunteers', 'insert')[0]?.values).toEqual({
      eventId: EVENT,
      memberId: M1,
      volunteerRoleId: ROLE,
      assignedBy: TEST_USER_ID,
      notes: null,
      status: 'Pending',
    });
    expect(mockDb.writesTo('communications', 'insert')[0]?.values).toEqual([
      expect.objectContaining({ message: "Ama Owusu has been assigned as Usher for event 'Harvest'." }),
    ]);
    expect(audit.log).toHaveBeenCalledWith(
      expect.objectContaining({ metadata: { requestId: 'req-1', assigned: 1, skipped: 1 } }),
    );
  });

  it('rolls back every row when a later entry is invalid', async () => {
    mockDb.query.events.findFirst.mockResolvedValueOnce(event);
    mockDb.query.members.findFirst
      .mockResolvedValueOnce(active(M1, 'Ama', 'Owusu'))
      .mockResolvedValueOnce({ ...active(M2, 'Kofi', 'Boateng'), membershipStatus: 'Inactive' });

    await expect(
      assignVolunteers(createTestContext(), EVENT, { volunteers: [{ memberId: M1 }, { memberId: M2 }] }),
    ).rejects.toThrow(new ValidationError(`Invalid member: ${M2}`));
    expect(mockDb.writes).toHaveLength(0);
    expect(audit.log).not.toHaveBeenCalled();
  });

  it('rejects an empty list', async () => {
    await expect(assignVolunteers(createTestContext(), EVENT, { volunteers: [] })).rejects.toMatchObject({
      details: [{ field: 'volunteers', message: 'volunteers array is required' }],
    });
  });

  it('rejects an unknown role', async () => {
    mockDb.query.events.findFirst.mockResolvedValueOnce(event);
    mockDb.query.members.findFirst.mockResolvedValueOnce(active(M1, 'Ama', 'Owusu'));

    await expect(
      assignVolunteers(createTestContext(), EVENT, { volunteers: [{ memberId: M1, roleId: ROLE }] }),
    ).rejects.toThrow(new ValidationError(`Invalid role ID: ${ROLE}`));
  });
});

describe('assignment lifecycle', () => {
  const assignment = { id: ASSIGNMENT, eventId: EVENT, memberId: TEST_USER_ID, status: 'Pending' };

  it('lets the assigned member confirm', async () => {
    mockDb.query.eventVolunteers.findFirst.mockResolvedValueOnce(assignment);

    await respondToAssignment(createTestContext(), ASSIGNMENT, { action: 'confirm' });

    expect(mockDb.writesTo('event_volunteers', 'update')[0]?.values).toMatchObject({ status: 'Confirmed' });
    expect(audit.log).toHaveBeenCalledWith(expect.objectContaining({ action: 'event_volunteer.confirmed' }));
  });

  it('forbids responding for someone else', async () => {
    mockDb.query.eventVolunteers.findFirst.mockResolvedValueOnce({ ...assignment, memberId: M1 });

    await expect(respondToAssignment(createTestContext(), ASSIGNMENT, { action: 'decline' })).rejects.toThrow(
      new AuthorizationError('You can only respond to your own assignment'),
    );
  });

  it('completes a confirmed assignment', async () => {
    mockDb.query.eventVolunteers.findFirst.mockResolvedValueOnce({ ...assignment, status: 'Confirmed' });

    await completeAssignment(createTestContext(), ASSIGNMENT);

    expect(mockDb.writesTo('event_volunteers', 'update')[0]?.values).toMatchObject({ status: 'Completed' });
  });

  it('removes an assignment', async () => {
    mockDb.query.eventVolunteers.findFirst.mockResolvedValueOnce(assignment);

    await removeAssignment(createTestContext(), ASSIGNMENT);

    expect(mockDb.writesTo('event_volunteers', 'delete')).toHaveLength(1);
    expect(audit.log).toHaveBeenCalledWith(
      expect.objectContaining({
        action: 'event_volunteer.removed',
        metadata: { requestId: 'req-1', eventId: EVENT, memberId: TEST_USER_ID },
      }),
    );
  });

  it('reports a missing assignment', async () => {
    await expect(completeAssignment(createTestContext(), ASSIGNMENT)).rejects.toThrow(
      new NotFoundError('Assignment', ASSIGNMENT),
    );
  });
});

describe('listEventVolunteers', () => {
  it('pages through the event roster', async () => {
    mockDb.query.events.findFirst.mockResolvedValueOnce(event);
    mockDb.executeResults.push(
      [{ total: 1 }],
      [
        {
          id: ASSIGNMENT,
          member_id: M1,
          member_name: 'Ama Owusu',
          email: 'ama@example.org',
          role_name: 'Usher',
          status: 'Pending',
          notes: null,
          assigned_by_name: 'Admin User',
          assigned_at: new Date('2026-09-01T08:30:00.000Z'),
        },
      ],
    );

    const result = await listEventVolunteers(EVENT);

    expect(result.data).toEqual([
      {
        id: ASSIGNMENT,
        memberId: M1,
        memberName: 'Ama Owusu',
        email: 'ama@example.org',
        roleName: 'Usher',
        status: 'Pending',
        notes: null,
        assignedByName: 'Admin User',
        assignedAt: '2026-09-01T08:30:00.000Z',
      },
    ]);
    expect(result.pagination).toEqual({ page: 1, limit: 10, total: 1, pages: 1 });
  });
});

describe('listEvents', () => {
  it('filters by branch, date range and escaped name', async () => {
    mockDb.executeResults.push(
      [{ total: 1 }],
      [
        {
          id: EVENT,
          name: 'Harvest 100%',
          description: null,
          event_date: new Date('2026-10-04T09:00:00Z'),
          location: 'Main hall',
          branch_id: BRANCH,
          branch_name: 'Main',
          volunteer_count: 3,
        },
      ],
    );

    const result = await listEvents({
      branchId: BRANCH,
      dateFrom: '2026-10-01',
      dateTo: '2026-10-31',
      name: '100%',
    });

    expect(result).toEqual({
      data: [
        {
          id: EVENT,
          name: 'Harvest 100%',
          description: null,
          eventDate: '2026-10-04T09:00:00.000Z',
          location: 'Main hall',
          branchId: BRANCH,
          branchName: 'Main',
          volunteerCount: 3,
        },
      ],
      pagination: { page: 1, limit: 10, total: 1, pages: 1 },
    });

    const [count, page] = mockDb.executedQueries();
    expect(count).toEqual({
      sql:
        'SELECT count(*)::int AS total FROM events e WHERE e.branch_id = $1 AND e.event_date >= $2::date' +
        ' AND e.event_date < $3::date + 1 AND e.name ILIKE $4',
      params: [BRANCH, '2026-10-01', '2026-10-31', '%100\\%%'],
    });
    expect(page?.params).toEqual([BRANCH, '2026-10-01', '2026-10-31', '%100\\%%', 10, 0]);
  });

  it('pages through every event by default', async () => {
    mockDb.executeResults.push([{ total: 25 }], []);

    const result = await listEvents({ page: 3 });

    expect(result.pagination).toEqual({ page: 3, limit: 10, total: 25, pages: 3 });
    const [count, page] = mockDb.executedQueries();
    expect(count?.sql).toBe('SELECT count(*)::int AS total FROM events e WHERE TRUE');
    expect(page?.params).toEqual([10, 20]);
  });
});
