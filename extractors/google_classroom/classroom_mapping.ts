import { z } from 'zod';

import type {
  UdmAssignment,
  UdmSection,
  UdmSectionAssociation,
  UdmSubmission,
  UdmUser,
  UdmUserActivity,
} from '../../udm/schema.js';
import {
  flagColumn,
  idColumn,
  numberColumn,
  optionalTextColumn,
  parseBatch,
  syncedTimestamps,
  textColumn,
} from '../common/mapping.js';
import type { RawRecord } from '../common/records.js';

export const SOURCE_SYSTEM = 'Google Classroom';
const ACTIVE = 'active';

const courseSchema = z.object({
  id: idColumn,
  courseState: textColumn,
  descriptionHeading: textColumn,
  name: textColumn,
  creationTime: z.string(),
  updateTime: z.string(),
});

const rosterSchema = z.object({
  id: idColumn,
  courseId: idColumn,
  userId: idColumn,
  role: textColumn,
  ...syncedTimestamps,
});

const userSchema = z.object({
  userId: idColumn,
  role: textColumn,
  'profile.name.fullName': optionalTextColumn,
  'profile.emailAddress': optionalTextColumn,
  ...syncedTimestamps,
});

const courseWorkSchema = z.object({
  id: idColumn,
  courseId: idColumn,
  title: textColumn,
  description: optionalTextColumn,
  workType: optionalTextColumn,
  maxPoints: numberColumn,
  scheduledTime: optionalTextColumn,
  'dueDate.year': numberColumn,
  'dueDate.month': numberColumn,
  'dueDate.day': numberColumn,
  'dueTime.hours': numberColumn,
  'dueTime.minutes': numberColumn,
  creationTime: z.string(),
  updateTime: z.string(),
});

const submissionSchema = z.object({
  id: idColumn,
  courseId: idColumn,
  courseWorkId: idColumn,
  userId: idColumn,
  state: textColumn,
  late: flagColumn,
  assignedGrade: numberColumn,
  creationTime: z.string(),
  updateTime: z.string(),
});

const usageSchema = z.object({
  id: idColumn,
  'entity.profileId': idColumn,
  lastLoginTime: optionalTextColumn,
  ...syncedTimestamps,
});

export function mapSections(courses: readonly RawRecord[]): UdmSection[] {
  return parseBatch('classroom courses', courseSchema, courses).map((course) => ({
    SourceSystemIdentifier: course.id,
    SourceSystem: SOURCE_SYSTEM,
    EntityStatus: ACTIVE,
    LMSSectionStatus: course.courseState,
    SISSectionIdentifier: '',
    SectionDescription: course.descriptionHeading,
    Term: '',
    Title: course.name,
    CreateDate: course.creationTime,
    LastModifiedDate: course.updateTime,
  }));
}

export function mapUsers(users: readonly RawRecord[]): UdmUser[] {
  return parseBatch('classroom users', userSchema, users).map((user) => ({
    SourceSystemIdentifier: user.userId,
    SourceSystem: SOURCE_SYSTEM,
    UserRole: user.role,
    SISUserIdentifier: '',
    LocalUserIdentifier: user['profile.emailAddress'],
    Name: user['profile.name.fullName'],
    EmailAddress: user['profile.emailAddress'],
    EntityStatus: ACTIVE,
    CreateDate: user.CreateDate,
    LastModifiedDate: user.LastModifiedDate,
  }));
}

/** Roster rows keyed `<courseId>-<userId>`; Classroom has no enrollment dates. */
export function mapSectionAssociations(rosters: readonly RawRecord[]): UdmSectionAssociation[] {
  return parseBatch('classroom rosters', rosterSchema, rosters).map((roster) => ({
    SourceSystemIdentifier: roster.id,
    SourceSystem: SOURCE_SYSTEM,
    LMSUserSourceSystemIdentifier: roster.userId,
    LMSSectionSourceSystemIdentifier: roster.courseId,
    EnrollmentStatus: 'Active',
    StartDate: null,
    EndDate: null,
    EntityStatus: ACTIVE,
    CreateDate: roster.CreateDate,
    LastModifiedDate: roster.LastModifiedDate,
  }));
}

export function mapAssignments(courseWork: readonly RawRecord[]): UdmAssignment[] {
  return parseBatch('classroom coursework', courseWorkSchema, courseWork).map((work) => ({
    SourceSystemIdentifier: `${work.courseId}-${work.id}`,
    SourceSystem: SOURCE_SYSTEM,
    LMSSectionSourceSystemIdentifier: work.courseId,
    Title: work.title,
    AssignmentCategory: work.workType,
    AssignmentDescription: work.description,
    StartDateTime: work.scheduledTime ?? work.creationTime,
    EndDateTime: null,
    DueDateTime: composeDueDate(work),
    SubmissionType: work.workType ? JSON.stringify([work.workType]) : null,
    MaxPoints: work.maxPoints,
    EntityStatus: ACTIVE,
    CreateDate: work.creationTime,
    LastModifiedDate: work.updateTime,
  }));
}

const SUBMITTED_STATES = new Set(['TURNED_IN', 'RETURNED']);

export function mapSubmissions(submissions: readonly RawRecord[]): UdmSubmission[] {
  return parseBatch('classroom submissions', submissionSchema, submissions).map((submission) => ({
    SourceSystemIdentifier: `${submission.courseId}-${submission.courseWorkId}-${submission.id}`,
    SourceSystem: SOURCE_SYSTEM,
    AssignmentSourceSystemIdentifier: `${submission.courseId}-${submission.courseWorkId}`,
    LMSUserSourceSystemIdentifier: submission.userId,
    SubmissionStatus: submission.late ? 'LATE' : submission.state,
    SubmissionDateTime: SUBMITTED_STATES.has(submission.state ?? '') ? submission.updateTime : null,
    EarnedPoints: submission.assignedGrade,
    Grade: submission.assignedGrade === null ? null : String(submission.assignedGrade),
    EntityStatus: ACTIVE,
    CreateDate: submission.creationTime,
    LastModifiedDate: submission.updateTime,
  }));
}

/**
 * One sign-in activity per distinct last-login time. Consecutive daily reports repeat the
 * same login, so rows are de-duplicated on their identifier.
 */
export function mapUserActivities(usage: readonly RawRecord[]): UdmUserActivity[] {
  const activities = new Map<string, UdmUserActivity>();
  for (const report of parseBatch('classroom usage', usageSchema, usage)) {
    if (!report.lastLoginTime) {
      continue;
    }
    const userId = report['entity.profileId'];
    const identifier = `in#${userId}#${report.lastLoginTime}`;
    if (activities.has(identifier)) {
      continue;
    }
    activities.set(identifier, {
      SourceSystemIdentifier: identifier,
      SourceSystem: SOURCE_SYSTEM,
      LMSUserSourceSystemIdentifier: userId,
      ActivityType: 'sign-in',
      ActivityDateTime: report.lastLoginTime,
      ActivityStatus: ACTIVE,
      ParentSourceSystemIdentifier: null,
      ActivityTimeInMinutes: null,
      EntityStatus: ACTIVE,
      CreateDate: report.CreateDate,
      LastModifiedDate: report.LastModifiedDate,
    });
  }
  return [...activities.values()];
}

function composeDueDate(work: z.output<typeof courseWorkSchema>): string | null {
  const year = work['dueDate.year'];
  const month = work['dueDate.month'];
  const day = work['dueDate.day'];
  if (year === null || month === null || day === null) {
    return null;
  }
  const pad = (value: number) => String(value).padStart(2, '0');
  const hours = work['dueTime.hours'] ?? 0;
  const minutes = work['dueTime.minutes'] ?? 0;
  return `${year}-${pad(month)}-${pad(day)} ${pad(hours)}:${pad(minutes)}:00`;
}
