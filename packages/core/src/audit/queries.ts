import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll } from '@shepherd/db';
import { paginate, toPaginatedResult, toIsoTimestamp } from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';

export interface AuditLogRow {
  id: string;
  userId: string | null;
  username: string | null;
  action: string;
  entityType: string;
  entityId: string;
  changes: Record<string, { old: unknown; new: unknown }> | null;
  metadata: Record<string, unknown> | null;
  ipAddress: string | null;
  createdAt: string;
}

type RawAuditRow = {
  id: string;
  user_id: string | null;
  username: string | null;
  action: string;
  entity_type: string;
  entity_id: string;
  changes: Record<string, { old: unknown; new: unknown }> | null;
  metadata: Record<string, unknown> | null;
  ip_address: string | null;
  created_at: Date | string;
};

const SELECT_AUDIT = sql`
  SELECT a.id, a.user_id, c.username, a.action, a.entity_type, a.entity_id,
         a.changes, a.metadata, a.ip_address, a.created_at
  FROM audit_log a
  LEFT JOIN member_credentials c ON c.member_id = a.user_id
`;

function mapRow(row: RawAuditRow): AuditLogRow {
  return {
    id: row.id,
    userId: row.user_id,
    username: row.username,
    action: row.action,
    entityType: row.entity_type,
    entityId: row.entity_id,
    changes: row.changes,
    metadata: row.metadata,
    ipAddress: row.ip_address,
    createdAt: toIsoTimestamp(row.created_at),
  };
}

/** Full history of one entity, newest first. */
export async function getEntityLogs(entityType: string, entityId: string): Promise<AuditLogRow[]> {
  const rows = await db.execute<RawAuditRow>(sql`
    ${SELECT_AUDIT}
    WHERE a.entity_type = ${entityType} AND a.entity_id = ${entityId}
    ORDER BY a.created_at DESC, a.id DESC
  `);
  return Array.from(rows).map(mapRow);
}

export async function getUserActivity(userId: string, limit: number = 50): Promise<AuditLogRow[]> {
  const rows = await db.execute<RawAuditRow>(sql`
    ${SELECT_AUDIT}
    WHERE a.user_id = ${userId}
    ORDER BY a.created_at DESC, a.id DESC
    LIMIT ${Math.min(Math.max(limit, 1), 500)}
  `);
  return Array.from(rows).map(mapRow);
}

export interface SearchAuditLogsInput {
  page?: number;
  limit?: number;
  userId?: string;
  action?: string;
  entityType?: string;
  startDate?: string;
  endDate?: string;
}

export async function searchAuditLogs(
  input: SearchAuditLogsInput = {},
): Promise<PaginatedResult<AuditLogRow>> {
  const { page, limit, offset } = paginate(input.page, input.limit);

  const conditions: SQL[] = [];
  if (input.userId) conditions.push(sql`a.user_id = ${input.userId}`);
  if (input.action) conditions.push(sql`a.action = ${input.action}`);
  if (input.entityType) conditions.push(sql`a.entity_type = ${input.entityType}`);
  if (input.startDate) conditions.push(sql`a.created_at >= ${input.startDate}::date`);
  // inclusive of the whole end day
  if (input.endDate) conditions.push(sql`a.created_at < (${input.endDate}::date + 1)`);
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM audit_log a WHERE ${where}`),
    db.execute<RawAuditRow>(sql`
      ${SELECT_AUDIT}
      WHERE ${where}
      ORDER BY a.created_at DESC, a.id DESC
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  return toPaginatedResult(Array.from(rows).map(mapRow), page, limit, total);
}
