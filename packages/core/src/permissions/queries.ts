import { eq } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll, permissions, roles, containsPattern } from '@shepherd/db';
import { NotFoundError, assertUlid, paginate, parseInput, toPaginatedResult } from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { getPermissionEngine } from './engine';
import { listPermissionsSchema } from './validation';
import type { ListPermissionsInput } from './validation';

export type NamedRef = {
  id: string;
  name: string;
};

export type PermissionListRow = {
  id: string;
  name: string;
  description: string | null;
  roles: string[];
};

export interface RoleListRow {
  id: string;
  name: string;
  description: string | null;
  permissionCount: number;
  memberCount: number;
}

export async function getPermission(permissionId: string) {
  assertUlid(permissionId, 'permissionId');
  const permission = await db.query.permissions.findFirst({
    where: eq(permissions.id, permissionId),
  });
  if (!permission) {
    throw new NotFoundError('Permission', permissionId);
  }

  const roleRows = await db.execute<NamedRef>(sql`
    SELECT r.id, r.name
    FROM role_permissions rp
    JOIN roles r ON r.id = rp.role_id
    WHERE rp.permission_id = ${permissionId}
    ORDER BY r.name
  `);

  return { ...permission, roles: Array.from(roleRows) };
}

export async function listPermissions(
  input: ListPermissionsInput = {},
): Promise<PaginatedResult<PermissionListRow>> {
  const filters = parseInput(listPermissionsSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const conditions: SQL[] = [];
  if (filters.search) {
    conditions.push(sql`p.name ILIKE ${containsPattern(filters.search)}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM permissions p WHERE ${where}`),
    db.execute<PermissionListRow>(sql`
      SELECT p.id, p.name, p.description,
             COALESCE(array_agg(r.name ORDER BY r.name) FILTER (WHERE r.id IS NOT NULL), '{}') AS roles
      FROM permissions p
      LEFT JOIN role_permissions rp ON rp.permission_id = p.id
      LEFT JOIN roles r ON r.id = rp.role_id
      WHERE ${where}
      GROUP BY p.id
      ORDER BY p.name
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  return toPaginatedResult(Array.from(rows), page, limit, total);
}

export async function getRole(roleId: string) {
  assertUlid(roleId, 'roleId');
  const role = await db.query.roles.findFirst({ where: eq(roles.id, roleId) });
  if (!role) {
    throw new NotFoundError('Role', roleId);
  }

  const permissionRows = await db.execute<NamedRef>(sql`
    SELECT p.id, p.name
    FROM role_permissions rp
    JOIN permissions p ON p.id = rp.permission_id
    WHERE rp.role_id = ${roleId}
    ORDER BY p.name
  `);

  return { ...role, permissions: Array.from(permissionRows) };
}

export async function listRoles(): Promise<RoleListRow[]> {
  const rows = await db.execute<{
    id: string;
    name: string;
    description: string | null;
    permission_count: number;
    member_count: number;
  }>(sql`
    SELECT r.id, r.name, r.description,
           (SELECT count(*)::int FROM role_permissions rp WHERE rp.role_id = r.id) AS permission_count,
           (SELECT count(*)::int FROM member_roles mr WHERE mr.role_id = r.id) AS member_count
    FROM roles r
    ORDER BY r.name
  `);

  return Array.from(rows).map((row) => ({
    id: row.id,
    name: row.name,
    description: row.description,
    permissionCount: row.permission_count,
    memberCount: row.member_count,
  }));
}

export async function getMemberRoles(memberId: string): Promise<NamedRef[]> {
  assertUlid(memberId, 'memberId');
  const rows = await db.execute<NamedRef>(sql`
    SELECT r.id, r.name
    FROM member_roles mr
    JOIN roles r ON r.id = mr.role_id
    WHERE mr.member_id = ${memberId}
    ORDER BY r.name
  `);
  return Array.from(rows);
}

/** The member's granted permission names, wildcards included, sorted. */
export async function getEffectivePermissions(memberId: string): Promise<string[]> {
  assertUlid(memberId, 'memberId');
  const granted = await getPermissionEngine().getUserPermissions(memberId);
  return [...granted].sort();
}
