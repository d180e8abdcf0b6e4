import { z } from 'zod';

import type {
  UdmAssignment,
  UdmAttendanceEvent,
  UdmSection,
  UdmSectionAssociation,
  UdmSubmission,
  UdmUser,
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
import { epochSecondsToTimestamp, type RawRecord } from '../common/records.js';

export const SOURCE_SYSTEM = 'Schoology';
const ACTIVE = 'active';

const roleSchema = z.object({ id: idColumn, title: textColumn });

const gradingPeriodSchema = z.object({ id: idColumn, title: textColumn });

const userSchema = z.object({
  id: idColumn,
  role_id: optionalTextColumn,
  school_uid: optionalTextColumn,
  username: optionalTextColumn,
  name_first: textColumn,
  name_last: textColumn,
  primary_email: optionalTextColumn,
  ...syncedTimestamps,
});

const sectionSchema = z.object({
  id: idColumn,
  section_title: textColumn,
  section_school_code: optionalTextColumn,
  description: optionalTextColumn,
  active: flagColumn,
  grading_periods: optionalTextColumn,
  ...syncedTimestamps,
});

const assignmentSchema = z.object({
  id: idColumn,
  section_id: idColumn,
  title: textColumn,
  description: optionalTextColumn,
  due: optionalTextColumn,
  max_points: numberColumn,
  type: optionalTextColumn,
  allow_dropbox: flagColumn,
  ...syncedTimestamps,
});

const submissionSchema = z.object({
  id: idColumn,
  uid: idColumn,
  created: textColumn,
  late: flagColumn,
  draft: flagColumn,
  ...syncedTimestamps,
});

const enrollmentSchema = z.object({
  id: idColumn,
  uid: idColumn,
  section_id: idColumn,
  status: textColumn,
  ...syncedTimestamps,
});

const attendanceSchema = z.object({
  enrollment_id: idColumn,
  date: z.string().min(1),
  status: numberColumn,
  ...syncedTimestamps,
});

export function mapUsers(users: readonly RawRecord[], roles: readonly RawRecord[]): UdmUser[] {
  const roleTitles = new Map(parseBatch('schoology roles', roleSchema, roles).map((role) => [role.id, role.title]));
  return parseBatch('schoology users', userSchema, users).map((user) => ({
    SourceSystemIdentifier: user.id,
    SourceSystem: SOURCE_SYSTEM,
    UserRole: user.role_id ? (roleTitles.get(user.role_id) ?? null) : null,
    SISUserIdentifier: user.school_uid,
    LocalUserIdentifier: user.username,
    Name: [user.name_first, user.name_last].filter(Boolean).join(' '),
    EmailAddress: user.primary_email,
    EntityStatus: ACTIVE,
    CreateDate: user.CreateDate,
    LastModifiedDate: user.LastModifiedDate,
  }));
}

export function mapSections(sections: readonly RawRecord[], gradingPeriods: readonly RawRecord[]): UdmSection[] {
  const periodTitles = new Map(
    parseBatch('schoology grading periods', gradingPeriodSchema, gradingPeriods).map((period) => [
      period.id,
      period.title,
    ]),
  );
  return parseBatch('schoology sections', sectionSchema, sections).map((section) => ({
    SourceSystemIdentifier: section.id,
    SourceSystem: SOURCE_SYSTEM,
    EntityStatus: ACTIVE,
    LMSSectionStatus: section.active ? 'active' : 'inactive',
    SISSectionIdentifier: section.section_school_code,
    SectionDescription: section.description,
    Term: termFromPeriods(section.grading_periods, periodTitles),
    Title: section.section_title,
    CreateDate: section.CreateDate,
    LastModifiedDate: section.LastModifiedDate,
  }));
}

export function mapAssignments(assignments: readonly RawRecord[]): UdmAssignment[] {
  return parseBatch('schoology assignments', assignmentSchema, assignments).map((assignment) => ({
    SourceSystemIdentifier: assignment.id,
    SourceSystem: SOURCE_SYSTEM,
    LMSSectionSourceSystemIdentifier: assignment.section_id,
    Title: assignment.title,
    AssignmentCategory: assignment.type,
    AssignmentDescription: assignment.description,
    StartDateTime: null,
    EndDateTime: null,
    DueDateTime: assignment.due,
    SubmissionType: assignment.allow_dropbox ? JSON.stringify(['dropbox']) : null,
    MaxPoints: assignment.max_points,
    EntityStatus: ACTIVE,
    CreateDate: assignment.CreateDate,
    LastModifiedDate: assignment.LastModifiedDate,
  }));
}

/**
 * Submission revisions keyed `<section>#<assignment>#<user>`. Status is `draft` for drafts,
 * otherwise `late` or `on-time`.
 */
export function mapSubmissions(submissions: readonly RawRecord[]): UdmSubmission[] {
  return parseBatch('schoology submissions', submissionSchema, submissions).map((submission) => ({
    SourceSystemIdentifier: submission.id,
    SourceSystem: SOURCE_SYSTEM,
    AssignmentSourceSystemIdentifier: submission.id.split('#')[1] ?? '',
    LMSUserSourceSystemIdentifier: submission.uid,
    SubmissionStatus: submission.draft ? 'draft' : submission.late ? 'late' : 'on-time',
    SubmissionDateTime: epochSecondsToTimestamp(submission.created),
    EarnedPoints: null,
    Grade: null,
    EntityStatus: ACTIVE,
    CreateDate: submission.CreateDate,
    LastModifiedDate: submission.LastModifiedDate,
  }));
}

const ENROLLMENT_STATUS: Record<string, string | undefined> = {
  '1': 'Active',
  '2': 'Expired',
  '3': 'Invite pending',
  '4': 'Request Pending',
  '5': 'Archived',
};

export function mapSectionAssociations(enrollments: readonly RawRecord[]): UdmSectionAssociation[] {
  return parseBatch('schoology enrollments', enrollmentSchema, enrollments).map((enrollment) => ({
    SourceSystemIdentifier: enrollment.id,
    SourceSystem: SOURCE_SYSTEM,
    LMSUserSourceSystemIdentifier: enrollment.uid,
    LMSSectionSourceSystemIdentifier: enrollment.section_id,
    EnrollmentStatus: ENROLLMENT_STATUS[enrollment.status ?? ''] ?? null,
    StartDate: null,
    EndDate: null,
    EntityStatus: ACTIVE,
    CreateDate: enrollment.CreateDate,
    LastModifiedDate: enrollment.LastModifiedDate,
  }));
}

const ATTENDANCE_STATUS: Record<number, string | undefined> = {
  1: 'present',
  2: 'absent',
  3: 'late',
  4: 'excused',
};

export function attendanceStatus(code: number | null): string {
  return (code !== null ? ATTENDANCE_STATUS[code] : undefined) ?? `Unknown status: ${code ?? ''}`;
}

/**
 * Attendance marks joined to their section association; marks whose enrollment is not in
 * `associations` are dropped.
 */
export function mapAttendanceEvents(
  attendance: readonly RawRecord[],
  associations: readonly UdmSectionAssociation[],
): UdmAttendanceEvent[] {
  const byEnrollment = new Map(associations.map((association) => [association.SourceSystemIdentifier, association]));
  return parseBatch('schoology attendance', attendanceSchema, attendance).flatMap((mark) => {
    const association = byEnrollment.get(mark.enrollment_id);
    if (!association) {
      return [];
    }
    return [
      {
        SourceSystemIdentifier: `${mark.enrollment_id}#${mark.date}`,
        SourceSystem: SOURCE_SYSTEM,
        LMSUserSourceSystemIdentifier: association.LMSUserSourceSystemIdentifier,
        LMSSectionSourceSystemIdentifier: association.LMSSectionSourceSystemIdentifier,
        EventDate: mark.date,
        AttendanceStatus: attendanceStatus(mark.status),
        EntityStatus: ACTIVE,
        CreateDate: mark.CreateDate,
        LastModifiedDate: mark.LastModifiedDate,
      },
    ];
  });
}

function termFromPeriods(raw: string | null, titles: ReadonlyMap<string, string | null>): string | null {
  if (!raw) {
    return null;
  }
  let ids: unknown;
  try {
    ids = JSON.parse(raw);
  } catch {
    ids = raw.split(',');
  }
  const list = Array.isArray(ids) ? ids : [ids];
  const names = list
    .map((id) => titles.get(String(id).trim()))
    .filter((title): title is string => typeof title === 'string' && title.length > 0);
  return names.length > 0 ? names.join(', ') : null;
}
