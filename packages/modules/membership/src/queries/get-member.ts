import { eq, and, desc, asc } from 'drizzle-orm';
import { db, sql, members, memberPhones } from '@shepherd/db';
import { NotFoundError, assertUlid } from '@shepherd/shared';

type MemberRow = {
  id: string;
  first_name: string;
  family_name: string;
  other_names: string | null;
  gender: string;
  email: string;
  date_of_birth: string | null;
  address: string | null;
  occupation: string | null;
  marital_status: string | null;
  branch_id: string | null;
  branch_name: string | null;
  family_id: string | null;
  family_name_label: string | null;
  membership_status: string;
  registration_date: string;
  username: string | null;
};

export async function getMember(memberId: string) {
  assertUlid(memberId, 'memberId');

  const rows = await db.execute<MemberRow>(sql`
    SELECT m.id, m.first_name, m.family_name, m.other_names, m.gender, m.email,
           m.date_of_birth, m.address, m.occupation, m.marital_status,
           m.branch_id, b.name AS branch_name,
           m.family_id, f.name AS family_name_label,
           m.membership_status, m.registration_date,
           c.username
    FROM members m
    LEFT JOIN branches b ON b.id = m.branch_id
    LEFT JOIN families f ON f.id = m.family_id
    LEFT JOIN member_credentials c ON c.member_id = m.id
    WHERE m.id = ${memberId} AND m.deleted = false
  `);
  const row = Array.from(rows)[0];
  if (!row) {
    throw new NotFoundError('Member', memberId);
  }

  const [phones, roleRows] = await Promise.all([
    db.query.memberPhones.findMany({
      where: eq(memberPhones.memberId, memberId),
      orderBy: [desc(memberPhones.isPrimary), asc(memberPhones.phoneNumber)],
    }),
    db.execute<{ name: string }>(sql`
      SELECT r.name
      FROM member_roles mr
      JOIN roles r ON r.id = mr.role_id
      WHERE mr.member_id = ${memberId}
      ORDER BY r.name
    `),
  ]);

  return {
    id: row.id,
    firstName: row.first_name,
    familyName: row.family_name,
    otherNames: row.other_names,
    gender: row.gender,
    email: row.email,
    dateOfBirth: row.date_of_birth,
    address: row.address,
    occupation: row.occupation,
    maritalStatus: row.marital_status,
    branchId: row.branch_id,
    branchName: row.branch_name,
    familyId: row.family_id,
    familyNameLabel: row.family_name_label,
    membershipStatus: row.membership_status,
    registrationDate: row.registration_date,
    username: row.username,
    phones: phones.map((p) => ({
      id: p.id,
      phoneNumber: p.phoneNumber,
      phoneType: p.phoneType,
      isPrimary: p.isPrimary,
    })),
    roles: Array.from(roleRows).map((r) => r.name),
  };
}

export async function listPhones(memberId: string) {
  assertUlid(memberId, 'memberId');

  const member = await db.query.members.findFirst({
    where: and(eq(members.id, memberId), eq(members.deleted, false)),
  });
  if (!member) {
    throw new NotFoundError('Member', memberId);
  }

  return db.query.memberPhones.findMany({
    where: eq(memberPhones.memberId, memberId),
    orderBy: [desc(memberPhones.isPrimary), asc(memberPhones.phoneNumber)],
  });
}
