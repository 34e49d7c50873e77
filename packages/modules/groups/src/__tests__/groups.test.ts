import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@shepherd/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@shepherd/db')>();
  const { mockDb } = await import('@shepherd/core/testing');
  return { ...actual, db: mockDb };
});

import { AuthorizationError, ConflictError, NotFoundError, ValidationError } from '@shepherd/shared';
import { setAuditLogger } from '@shepherd/core/audit';
import { mockDb, createTestContext, testId, TEST_USER_ID } from '@shepherd/core/testing';
import { createGroup } from '../commands/create-group';
import { deleteGroup } from '../commands/delete-group';
import { addGroupMember, removeGroupMember } from '../commands/group-members';
import { sendGroupMessage } from '../commands/send-group-message';
import { deleteGroupType, updateGroupType } from '../commands/group-types';
import { getGroup } from '../queries/get-group';
import { listGroups } from '../queries/list-groups';
import { listGroupMembers, listGroupMessages } from '../queries/group-activity';

const GROUP = testId('G1');
const LEADER = testId('D1');
const MEMBER = testId('M1');
const TYPE = testId('T1');

const audit = { log: vi.fn().mockResolvedValue(undefined) };
const leader = { id: LEADER, firstName: 'Ama', familyName: 'Owusu', membershipStatus: 'Active', deleted: false };
const member = { id: MEMBER, firstName: 'Kofi', familyName: 'Boateng', membershipStatus: 'Active', deleted: false };
const group = { id: GROUP, name: 'Choir', leaderId: LEADER, typeId: TYPE, branchId: null };

beforeEach(() => {
  mockDb.reset();
  audit.log.mockClear();
  setAuditLogger(audit);
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
});

describe('createGroup', () => {
  it('creates the group and enrols the leader', async () => {
    mockDb.query.members.findFirst.mockResolvedValueOnce(leader);
    mockDb.query.groupTypes.findFirst.mockResolvedValueOnce({ id: TYPE, name: 'Ministry' });

    const created = await createGroup(createTestContext(), { name: 'Choir', leaderId: LEADER, typeId: TYPE });

    expect(created.id).toBe('groups-1');
    expect(mockDb.writesTo('group_members', 'insert')[0]?.values).toEqual({ groupId: 'groups-1', memberId: LEADER });
    expect(mockDb.writesTo('communications', 'insert')[0]?.values).toEqual([
      {
        title: 'New Group Created',
        message: 'Group "Choir" has been created.',
        channel: 'in_app',
        sentBy: TEST_USER_ID,
        targetGroupId: 'groups-1',
      },
    ]);
    expect(audit.log).toHaveBeenCalledWith(expect.objectContaining({ action: 'group.created', entityId: 'groups-1' }));
  });

  it('rejects an inactive leader', async () => {
    mockDb.query.members.findFirst.mockResolvedValueOnce({ ...leader, membershipStatus: 'Inactive' });

    await expect(createGroup(createTestContext(), { name: 'Choir', leaderId: LEADER, typeId: TYPE })).rejects.toThrow(
      new ValidationError('Invalid or inactive leader'),
    );
  });

  it('rejects a duplicate name', async () => {
    mockDb.query.members.findFirst.mockResolvedValueOnce(leader);
    mockDb.query.groupTypes.findFirst.mockResolvedValueOnce({ id: TYPE, name: 'Ministry' });
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);

    await expect(createGroup(createTestContext(), { name: 'Choir', leaderId: LEADER, typeId: TYPE })).rejects.toThrow(
      new ConflictError('Group name already exists'),
    );
    expect(mockDb.writes).toHaveLength(0);
  });
});

describe('deleteGroup', () => {
  it('is blocked while members other than the leader remain', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);
    mockDb.countResults.push(2, 0);

    await expect(deleteGroup(createTestContext(), GROUP)).rejects.toThrow(
      new ConflictError('Cannot delete group with members or messages'),
    );
  });

  it('removes the leader row and the group', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);

    await deleteGroup(createTestContext(), GROUP);

    expect(mockDb.writes.map((w) => `${w.op}:${w.table}`)).toEqual(['delete:group_members', 'delete:groups']);
    expect(audit.log).toHaveBeenCalledWith(expect.objectContaining({ action: 'group.deleted', entityId: GROUP }));
  });
});

describe('group membership', () => {
  it('adds a member and notifies the group', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);
    mockDb.query.members.findFirst.mockResolvedValueOnce(member);

    await addGroupMember(createTestContext(), GROUP, { memberId: MEMBER });

    expect(mockDb.writesTo('communications', 'insert')[0]?.values).toEqual([
      expect.objectContaining({
        title: 'Added to Group',
        message: 'Kofi Boateng has been added to group "Choir".',
        targetGroupId: GROUP,
      }),
    ]);
    expect(audit.log).toHaveBeenCalledWith(
      expect.objectContaining({ action: 'group.member_added', metadata: { requestId: 'req-1', memberId: MEMBER } }),
    );
  });

  it('rejects a member already in the group', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);
    mockDb.query.members.findFirst.mockResolvedValueOnce(member);
    mockDb.query.groupMembers.findFirst.mockResolvedValueOnce({ id: testId('GM1') });

    await expect(addGroupMember(createTestContext(), GROUP, { memberId: MEMBER })).rejects.toThrow(
      new ConflictError('Member is already in the group'),
    );
  });

  it('never removes the leader', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);

    await expect(removeGroupMember(createTestContext(), GROUP, LEADER)).rejects.toThrow(
      new ValidationError('Cannot remove group leader as a member'),
    );
  });

  it('reports a missing membership', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);

    await expect(removeGroupMember(createTestContext(), GROUP, MEMBER)).rejects.toThrow(
      new NotFoundError('Group member'),
    );
  });
});

describe('sendGroupMessage', () => {
  it('stores the message and fans it out as a group notice', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);
    mockDb.query.members.findFirst.mockResolvedValueOnce({ ...member, id: TEST_USER_ID });
    mockDb.query.groupMembers.findFirst.mockResolvedValueOnce({ id: testId('GM1') });

    const message = await sendGroupMessage(createTestContext(), GROUP, { subject: 'Rehearsal', body: 'Friday 6pm' });

    expect(message).toEqual({
      id: 'group_messages-1',
      groupId: GROUP,
      senderId: TEST_USER_ID,
      subject: 'Rehearsal',
      body: 'Friday 6pm',
    });
    expect(mockDb.writesTo('communications', 'insert')[0]?.values).toEqual([
      expect.objectContaining({ title: 'Rehearsal', message: 'Friday 6pm', targetGroupId: GROUP }),
    ]);
  });

  it('queues SMS deliveries for every other group member', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);
    mockDb.query.members.findFirst.mockResolvedValueOnce({ ...member, id: TEST_USER_ID });
    mockDb.query.groupMembers.findFirst.mockResolvedValueOnce({ id: testId('GM1') });
    mockDb.query.groupMembers.findMany.mockResolvedValueOnce([
      { memberId: LEADER },
      { memberId: TEST_USER_ID },
      { memberId: MEMBER },
    ]);

    await sendGroupMessage(createTestContext(), GROUP, {
      subject: 'Rehearsal',
      body: 'Friday 6pm',
      channels: ['sms'],
    });

    expect(mockDb.writesTo('communications', 'insert')[1]?.values).toMatchObject({
      title: 'Rehearsal',
      channel: 'sms',
      targetGroupId: GROUP,
    });
    expect(mockDb.writesTo('communication_deliveries', 'insert')[0]?.values).toEqual([
      { communicationId: expect.any(String), memberId: LEADER, channel: 'sms' },
      { communicationId: expect.any(String), memberId: MEMBER, channel: 'sms' },
    ]);
  });

  it('refuses senders outside the group', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);
    mockDb.query.members.findFirst.mockResolvedValueOnce({ ...member, id: TEST_USER_ID });

    await expect(
      sendGroupMessage(createTestContext(), GROUP, { subject: 'Rehearsal', body: 'Friday 6pm' }),
    ).rejects.toThrow(new AuthorizationError('Only members of the group can send messages to it'));
    expect(mockDb.writes).toHaveLength(0);
  });
});

describe('group types', () => {
  it('rejects a rename onto an existing type', async () => {
    mockDb.query.groupTypes.findFirst
      .mockResolvedValueOnce({ id: TYPE, name: 'Ministry', description: null })
      .mockResolvedValueOnce({ id: testId('T2'), name: 'Fellowship', description: null });

    await expect(updateGroupType(createTestContext(), TYPE, { name: 'Fellowship' })).rejects.toThrow(
      new ConflictError('Group type name already exists'),
    );
  });

  it('cannot delete a type still in use', async () => {
    mockDb.query.groupTypes.findFirst.mockResolvedValueOnce({ id: TYPE, name: 'Ministry', description: null });
    mockDb.countResults.push(1);

    await expect(deleteGroupType(createTestContext(), TYPE)).rejects.toThrow(
      new ConflictError('Cannot delete group type used by existing groups'),
    );
  });
});

describe('group queries', () => {
  it('getGroup maps the joined row', async () => {
    mockDb.executeResults.push([
      {
        id: GROUP,
        name: 'Choir',
        description: null,
        leader_id: LEADER,
        leader_name: 'Ama Owusu',
        type_id: TYPE,
        type_name: 'Ministry',
        branch_id: null,
        member_count: 4,
        created_at: new Date('2026-01-04T10:00:00.000Z'),
      },
    ]);

    const found = await getGroup(GROUP);

    expect(found).toMatchObject({ leaderName: 'Ama Owusu', typeName: 'Ministry', memberCount: 4 });
    expect(found.createdAt).toBe('2026-01-04T10:00:00.000Z');
  });

  it('getGroup throws for an unknown id', async () => {
    await expect(getGroup(GROUP)).rejects.toThrow(new NotFoundError('Group', GROUP));
  });

  it('listGroups paginates', async () => {
    mockDb.executeResults.push(
      [{ total: 11 }],
      [{ id: GROUP, name: 'Choir', leader_name: 'Ama Owusu', type_name: 'Ministry', branch_id: null, member_count: 4 }],
    );

    const result = await listGroups({ page: 2 });

    expect(result.data).toEqual([
      { id: GROUP, name: 'Choir', leaderName: 'Ama Owusu', typeName: 'Ministry', branchId: null, memberCount: 4 },
    ]);
    expect(result.pagination).toEqual({ page: 2, limit: 10, total: 11, pages: 2 });
  });

  it('listGroupMembers flags the leader', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);
    mockDb.executeResults.push(
      [{ total: 2 }],
      [
        { member_id: MEMBER, first_name: 'Kofi', family_name: 'Boateng', email: 'kofi@example.org', joined_at: '2026-02-01T00:00:00.000Z' },
        { member_id: LEADER, first_name: 'Ama', family_name: 'Owusu', email: 'ama@example.org', joined_at: '2026-01-04T10:00:00.000Z' },
      ],
    );

    const result = await listGroupMembers(GROUP);

    expect(result.data.map((m) => [m.name, m.isLeader])).toEqual([
      ['Kofi Boateng', false],
      ['Ama Owusu', true],
    ]);
  });
});

describe('listGroupMessages', () => {
  it('pages the messages of one group, newest first', async () => {
    mockDb.query.groups.findFirst.mockResolvedValueOnce(group);
    mockDb.executeResults.push(
      [{ total: 6 }],
      [
        {
          id: testId('GS1'),
          subject: 'Rehearsal',
          body: 'Friday 6pm',
          sender_id: LEADER,
          sender_name: 'Ama Owusu',
          sent_at: new Date('2026-09-01T18:30:00Z'),
        },
      ],
    );

    const result = await listGroupMessages(GROUP, { page: 2, limit: 5 });

    expect(result).toEqual({
      data: [
        {
          id: testId('GS1'),
          subject: 'Rehearsal',
          body: 'Friday 6pm',
          senderId: LEADER,
          senderName: 'Ama Owusu',
          sentAt: '2026-09-01T18:30:00.000Z',
        },
      ],
      pagination: { page: 2, limit: 5, total: 6, pages: 2 },
    });
    const [count, page] = mockDb.executedQueries();
    expect(count).toEqual({
      sql: 'SELECT count(*)::int AS total FROM group_messages WHERE group_id = $1',
      params: [GROUP],
    });
    expect(page?.sql).toContain('ORDER BY gm.sent_at DESC');
    expect(page?.params).toEqual([GROUP, 5, 5]);
  });

  it('returns 404 for an unknown group', async () => {
    await expect(listGroupMessages(GROUP)).rejects.toThrow(new NotFoundError('Group', GROUP));
    expect(mockDb.execute).not.toHaveBeenCalled();
  });
});
