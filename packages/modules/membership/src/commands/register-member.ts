import { eq, and, inArray } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { logMemberAction } from '@shepherd/core/audit';
import { sendEmail, welcomeEmail } from '@shepherd/core/messaging';
import { logger } from '@shepherd/core/observability/logger';
import {
  members,
  memberPhones,
  memberCredentials,
  memberRoles,
  branches,
  roles,
} from '@shepherd/db';
import { ConflictError, NotFoundError, hashSecret, parseInput, todayIso } from '@shepherd/shared';
import { registerMemberSchema } from '../validation';
import type { RegisterMemberInput } from '../validation';

export const DEFAULT_MEMBER_ROLE = 'Member';

export async function registerMember(ctx: RequestContext, input: RegisterMemberInput) {
  const data = parseInput(registerMemberSchema, input);
  const phoneNumbers = [...new Set(data.phoneNumbers)];

  const memberId = await publishWithNotifications(ctx, async (tx) => {
    const taken = await tx.query.memberCredentials.findFirst({
      where: eq(memberCredentials.username, data.username),
    });
    if (taken) {
      throw new ConflictError('Username already exists');
    }

    const sameEmail = await tx.query.members.findFirst({
      where: and(eq(members.email, data.email), eq(members.deleted, false)),
    });
    if (sameEmail) {
      throw new ConflictError('Email address already registered');
    }

    if (data.branchId) {
      const branch = await tx.query.branches.findFirst({ where: eq(branches.id, data.branchId) });
      if (!branch) {
        throw new NotFoundError('Branch', data.branchId);
      }
    }

    if (phoneNumbers.length > 0) {
      const inUse = await tx.query.memberPhones.findFirst({
        where: inArray(memberPhones.phoneNumber, phoneNumbers),
      });
      if (inUse) {
        throw new ConflictError(`Phone number already in use: ${inUse.phoneNumber}`);
      }
    }

    const [member] = await tx
      .insert(members)
      .values({
        firstName: data.firstName,
        familyName: data.familyName,
        otherNames: data.otherNames ?? null,
        gender: data.gender,
        email: data.email,
        dateOfBirth: data.dateOfBirth ?? null,
        address: data.address ?? null,
        occupation: data.occupation ?? null,
        maritalStatus: data.maritalStatus ?? null,
        branchId: data.branchId ?? null,
        membershipStatus: 'Active',
        registrationDate: todayIso(),
      })
      .returning();

    if (phoneNumbers.length > 0) {
      await tx.insert(memberPhones).values(
        phoneNumbers.map((phoneNumber, i) => ({
          memberId: member.id,
          phoneNumber,
          phoneType: 'Mobile',
          isPrimary: i === 0,
        })),
      );
    }

    await tx.insert(memberCredentials).values({
      memberId: member.id,
      username: data.username,
      passwordHash: hashSecret(data.password),
    });

    const defaultRole = await tx.query.roles.findFirst({ where: eq(roles.name, DEFAULT_MEMBER_ROLE) });
    if (defaultRole) {
      await tx.insert(memberRoles).values({ memberId: member.id, roleId: defaultRole.id });
    } else {
      logger.warn('Default member role missing; member registered without a role', {
        requestId: ctx.requestId,
        memberId: member.id,
      });
    }

    return {
      result: member.id,
      notifications: [
        {
          title: 'New Member Registered',
          message: `${data.firstName} ${data.familyName} has joined the church.`,
        },
      ],
    };
  });

  await logMemberAction(ctx, 'registered', memberId);

  const { subject, html } = welcomeEmail(data.firstName, data.username);
  const sent = await sendEmail(data.email, subject, html);
  if (!sent) {
    logger.warn('Welcome email not delivered', { requestId: ctx.requestId, memberId });
  }

  return { memberId };
}
