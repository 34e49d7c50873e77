import dotenv from 'dotenv';

dotenv.config({ path: '../../.env.local' });
dotenv.config({ path: '../../.env' });

import { drizzle } from 'drizzle-orm/postgres-js';
import { eq } from 'drizzle-orm';
import postgres from 'postgres';
import { generateUlid, hashSecret, todayIso } from '@shepherd/shared';
import * as schema from './schema';
import {
  branches,
  members,
  memberCredentials,
  permissions,
  roles,
  rolePermissions,
  memberRoles,
  contributionTypes,
  paymentOptions,
  expenseCategories,
  groupTypes,
  membershipTypes,
  volunteerRoles,
  fiscalYears,
} from './schema';
import permissionCatalogue from '../seeds/permissions.json';
import roleCatalogue from '../seeds/roles.json';
import referenceData from '../seeds/reference-data.json';

async function seed() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }
  const adminPassword = process.env.SEED_ADMIN_PASSWORD;
  if (!adminPassword) {
    throw new Error('SEED_ADMIN_PASSWORD environment variable is required');
  }

  const client = postgres(connectionString, { max: 1 });
  const db = drizzle(client, { schema });

  const existing = await db.select({ id: branches.id }).from(branches).limit(1);
  if (existing.length > 0) {
    console.log('Database already seeded, skipping.');
    await client.end();
    return;
  }

  await db.transaction(async (tx) => {
    const branchId = generateUlid();
    await tx.insert(branches).values({ id: branchId, name: 'Main Branch' });
    console.log('Branch created');

    const permissionIds = new Map<string, string>();
    for (const p of permissionCatalogue) {
      const id = generateUlid();
      permissionIds.set(p.name, id);
      await tx.insert(permissions).values({ id, name: p.name, description: p.description });
    }
    console.log(`${permissionIds.size} permissions created`);

    const roleIds = new Map<string, string>();
    for (const r of roleCatalogue) {
      const id = generateUlid();
      roleIds.set(r.name, id);
      await tx.insert(roles).values({ id, name: r.name, description: r.description });
      for (const name of r.permissions) {
        const permissionId = permissionIds.get(name);
        if (!permissionId) throw new Error(`Role ${r.name} references unknown permission ${name}`);
        await tx.insert(rolePermissions).values({ roleId: id, permissionId });
      }
    }
    console.log(`${roleIds.size} roles created`);

    await tx.insert(contributionTypes).values(referenceData.contributionTypes.map((name) => ({ name })));
    await tx.insert(paymentOptions).values(referenceData.paymentOptions.map((name) => ({ name })));
    await tx.insert(expenseCategories).values(referenceData.expenseCategories.map((name) => ({ name })));
    await tx.insert(groupTypes).values(referenceData.groupTypes.map((name) => ({ name })));
    await tx.insert(membershipTypes).values(referenceData.membershipTypes.map((name) => ({ name })));
    await tx.insert(volunteerRoles).values(referenceData.volunteerRoles.map((name) => ({ name })));
    console.log('Reference data created');

    const year = new Date().getUTCFullYear();
    await tx.insert(fiscalYears).values({
      branchId,
      startDate: `${year}-01-01`,
      endDate: `${year}-12-31`,
    });

    const adminId = generateUlid();
    await tx.insert(members).values({
      id: adminId,
      firstName: 'System',
      familyName: 'Administrator',
      email: process.env.SEED_ADMIN_EMAIL ?? 'admin@example.com',
      branchId,
      registrationDate: todayIso(),
    });
    await tx.insert(memberCredentials).values({
      memberId: adminId,
      username: 'admin',
      passwordHash: hashSecret(adminPassword),
    });
    const adminRoleId = roleIds.get('Administrator');
    if (!adminRoleId) throw new Error('Administrator role missing from roles.json');
    await tx.insert(memberRoles).values({ memberId: adminId, roleId: adminRoleId });
    console.log('Administrator account created (username: admin)');
  });

  const [admin] = await db
    .select({ id: memberCredentials.memberId })
    .from(memberCredentials)
    .where(eq(memberCredentials.username, 'admin'));
  console.log(`Seed complete. Admin member id: ${admin?.id ?? 'unknown'}`);

  await client.end();
}

seed().catch((err) => {
  console.error('Seed failed:', err);
  process.exit(1);
});
