import { db, sql } from '@shepherd/db';
import type { PermissionEngine } from './index';
import { getPermissionCache } from './cache';

const CACHE_TTL = 60; // seconds

export function matchPermission(granted: string, requested: string): boolean {
  if (granted === '*') return true;
  if (granted === requested) return true;
  if (granted.endsWith('.*')) {
    const grantedModule = granted.slice(0, -2);
    const requestedModule = requested.split('.')[0];
    return grantedModule === requestedModule;
  }
  return false;
}

function buildCacheKey(memberId: string): string {
  return `perms:${memberId}`;
}

export class DefaultPermissionEngine implements PermissionEngine {
  async getUserPermissions(memberId: string): Promise<Set<string>> {
    const cache = getPermissionCache();
    const cacheKey = buildCacheKey(memberId);

    const cached = await cache.get(cacheKey);
    if (cached) return cached;

    const permissions = await this._fetchPermissions(memberId);
    await cache.set(cacheKey, permissions, CACHE_TTL);
    return permissions;
  }

  private async _fetchPermissions(memberId: string): Promise<Set<string>> {
    const rows = await db.execute<{ permission: string }>(sql`
      SELECT DISTINCT p.name AS permission
      FROM member_roles mr
      JOIN role_permissions rp ON rp.role_id = mr.role_id
      JOIN permissions p ON p.id = rp.permission_id
      WHERE mr.member_id = ${memberId}
    `);

    const permissions = new Set<string>();
    for (const row of Array.from(rows)) {
      permissions.add(row.permission);
    }
    return permissions;
  }

  async hasPermission(memberId: string, permission: string): Promise<boolean> {
    const permissions = await this.getUserPermissions(memberId);
    for (const granted of permissions) {
      if (matchPermission(granted, permission)) return true;
    }
    return false;
  }

  async invalidateCache(memberId: string): Promise<void> {
    await getPermissionCache().delete(buildCacheKey(memberId));
  }

  async invalidateAll(): Promise<void> {
    await getPermissionCache().delete('perms:*');
  }
}

let engineInstance: PermissionEngine | null = null;

export function getPermissionEngine(): PermissionEngine {
  if (!engineInstance) {
    engineInstance = new DefaultPermissionEngine();
  }
  return engineInstance;
}

export function setPermissionEngine(engine: PermissionEngine): void {
  engineInstance = engine;
}
