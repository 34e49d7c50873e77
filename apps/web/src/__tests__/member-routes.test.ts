import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NextRequest } from 'next/server';
import { NotFoundError } from '@shepherd/shared';
import { testId } from '@shepherd/core/testing';
import { BASE, getRequest, jsonRequest, params, routePermissions } from '@/test/route-harness';

// ── Hoisted mocks ─────────────────────────────────────────────
const mocks = vi.hoisted(() => ({
  listMembers: vi.fn(),
  registerMember: vi.fn(),
  getMember: vi.fn(),
  deleteMember: vi.fn(),
  addPhone: vi.fn(),
  updatePhone: vi.fn(),
  deletePhone: vi.fn(),
  assignRoleToMember: vi.fn(),
}));

// ── Module mocks ──────────────────────────────────────────────
vi.mock('@shepherd/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@shepherd/core')>();
  const { stubMiddleware } = await import('@/test/route-harness');
  return {
    ...actual,
    ...stubMiddleware(actual.errorResponse),
    assignRoleToMember: mocks.assignRoleToMember,
  };
});

vi.mock('@shepherd/module-membership', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@shepherd/module-membership')>()),
  listMembers: mocks.listMembers,
  registerMember: mocks.registerMember,
  getMember: mocks.getMember,
  deleteMember: mocks.deleteMember,
  addPhone: mocks.addPhone,
  updatePhone: mocks.updatePhone,
  deletePhone: mocks.deletePhone,
}));

// ── Route imports (after mocks) ──────────────────────────────
import { GET as membersGET, POST as membersPOST } from '../app/api/v1/members/route';
import { GET as memberGET, DELETE as memberDELETE } from '../app/api/v1/members/[id]/route';
import { POST as phonesPOST } from '../app/api/v1/members/[id]/phones/route';
import { PATCH as phonePATCH, DELETE as phoneDELETE } from '../app/api/v1/members/[id]/phones/[phoneId]/route';
import { POST as memberRolesPOST } from '../app/api/v1/members/[id]/roles/route';

const MEMBER = testId('M1');
const ROLE = testId('R1');

describe('GET /api/v1/members', () => {
  beforeEach(() => vi.resetAllMocks());

  it('returns the paginated result as-is', async () => {
    const result = {
      data: [{ id: MEMBER, firstName: 'Ama' }],
      pagination: { page: 1, limit: 10, total: 1, pages: 1 },
    };
    mocks.listMembers.mockResolvedValue(result);

    const res = await membersGET(getRequest('/members'));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(result);
  });

  it('passes parsed filters with pagination defaults', async () => {
    mocks.listMembers.mockResolvedValue({ data: [], pagination: { page: 2, limit: 10, total: 0, pages: 0 } });

    await membersGET(getRequest('/members?page=2&status=Active&search=ama'));

    expect(mocks.listMembers).toHaveBeenCalledWith({ page: 2, limit: 10, status: 'Active', search: 'ama' });
  });

  it('rejects an unknown status with a 400', async () => {
    const res = await membersGET(getRequest('/members?status=Gone'));
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.details[0].field).toBe('status');
    expect(mocks.listMembers).not.toHaveBeenCalled();
  });
});

describe('POST /api/v1/members', () => {
  beforeEach(() => vi.resetAllMocks());

  it('registers and answers 201 with the new id', async () => {
    mocks.registerMember.mockResolvedValue({ memberId: MEMBER });

    const res = await membersPOST(
      jsonRequest('POST', '/members', {
        firstName: 'Ama',
        familyName: 'Mensah',
        email: ' Ama@Example.org ',
        username: 'ama',
        password: 'test-password',
      }),
    );

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ data: { memberId: MEMBER } });
    expect(mocks.registerMember).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 'req-1' }),
      {
        firstName: 'Ama',
        familyName: 'Mensah',
        email: 'ama@example.org',
        gender: 'Male',
        phoneNumbers: [],
        username: 'ama',
        password: 'test-password',
      },
    );
  });

  it('answers 400 for a body that is not JSON', async () => {
    const res = await membersPOST(
      new NextRequest(`${BASE}/members`, { method: 'POST', body: 'not json' }),
    );
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.error.message).toBe('Request body must be valid JSON');
    expect(mocks.registerMember).not.toHaveBeenCalled();
  });

  it('answers 400 for a short password', async () => {
    const res = await membersPOST(
      jsonRequest('POST', '/members', {
        firstName: 'Ama',
        familyName: 'Mensah',
        email: 'ama@example.org',
        username: 'ama',
        password: 'short',
      }),
    );
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.error.details).toEqual([
      { field: 'password', message: 'Password must be at least 8 characters' },
    ]);
  });
});

describe('/api/v1/members/[id]', () => {
  beforeEach(() => vi.resetAllMocks());

  it('maps a missing member to 404', async () => {
    mocks.getMember.mockRejectedValue(new NotFoundError('Member', MEMBER));

    const res = await memberGET(getRequest(`/members/${MEMBER}`), params({ id: MEMBER }));
    const body = await res.json();

    expect(res.status).toBe(404);
    expect(body.error).toEqual({ code: 'NOT_FOUND', message: `Member ${MEMBER} not found` });
  });

  it('deletes and answers 204', async () => {
    mocks.deleteMember.mockResolvedValue(undefined);

    const res = await memberDELETE(
      new NextRequest(`${BASE}/members/${MEMBER}`, { method: 'DELETE' }),
      params({ id: MEMBER }),
    );

    expect(res.status).toBe(204);
    expect(mocks.deleteMember).toHaveBeenCalledWith(expect.objectContaining({ requestId: 'req-1' }), MEMBER);
  });
});

describe('member sub-resources', () => {
  beforeEach(() => vi.resetAllMocks());

  it('adds a phone to the member in the path', async () => {
    const phone = { id: testId('P1'), memberId: MEMBER, phoneNumber: '0241234567', phoneType: 'Mobile' };
    mocks.addPhone.mockResolvedValue(phone);

    const res = await phonesPOST(
      jsonRequest('POST', `/members/${MEMBER}/phones`, { phoneNumber: '0241234567' }),
      params({ id: MEMBER }),
    );

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ data: phone });
    expect(mocks.addPhone).toHaveBeenCalledWith(expect.objectContaining({ requestId: 'req-1' }), MEMBER, {
      phoneNumber: '0241234567',
      phoneType: 'Mobile',
      isPrimary: false,
    });
  });

  it('updates a phone scoped to the member in the path', async () => {
    const PHONE = testId('P1');
    mocks.updatePhone.mockResolvedValue({ id: PHONE, memberId: MEMBER, phoneType: 'Home' });

    const res = await phonePATCH(
      jsonRequest('PATCH', `/members/${MEMBER}/phones/${PHONE}`, { phoneType: 'Home' }),
      params({ id: MEMBER, phoneId: PHONE }),
    );

    expect(res.status).toBe(200);
    expect(mocks.updatePhone).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 'req-1' }),
      MEMBER,
      PHONE,
      { phoneType: 'Home' },
    );
  });

  it("returns 404 when the phone is not the member's", async () => {
    const PHONE = testId('P9');
    mocks.deletePhone.mockRejectedValue(new NotFoundError('Phone number', PHONE));

    const res = await phoneDELETE(
      new NextRequest(`${BASE}/members/${MEMBER}/phones/${PHONE}`, { method: 'DELETE' }),
      params({ id: MEMBER, phoneId: PHONE }),
    );

    expect(res.status).toBe(404);
    expect(mocks.deletePhone).toHaveBeenCalledWith(expect.objectContaining({ requestId: 'req-1' }), MEMBER, PHONE);
  });

  it('assigns the role named in the body', async () => {
    mocks.assignRoleToMember.mockResolvedValue({ memberId: MEMBER, roleId: ROLE });

    const res = await memberRolesPOST(
      jsonRequest('POST', `/members/${MEMBER}/roles`, { roleId: ROLE }),
      params({ id: MEMBER }),
    );

    expect(res.status).toBe(201);
    expect(mocks.assignRoleToMember).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 'req-1' }),
      MEMBER,
      ROLE,
    );
  });

  it('registers each route under its permission', () => {
    expect(routePermissions).toEqual([
      'members.view',
      'members.edit',
      'members.view',
      'members.edit',
      'members.delete',
      'members.view',
      'members.edit',
      'members.edit',
      'members.edit',
      'roles.view',
      'roles.manage',
    ]);
  });
});
