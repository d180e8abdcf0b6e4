import { z } from 'zod';

import type {
  UdmAssignment,
  UdmGrade,
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
import type { RawRecord } from '../common/records.js';

export const SOURCE_SYSTEM = 'Canvas';
const ACTIVE = 'active';

const courseSchema = z.object({
  id: idColumn,
  name: textColumn,
  workflow_state: textColumn,
  start_at: optionalTextColumn,
  end_at: optionalTextColumn,
  'term.name': optionalTextColumn,
  'term.start_at': optionalTextColumn,
  'term.end_at': optionalTextColumn,
});

const sectionSchema = z.object({
  id: idColumn,
  course_id: idColumn,
  name: textColumn,
  sis_section_id: optionalTextColumn,
  ...syncedTimestamps,
});

const userSchema = z.object({
  id: idColumn,
  name: textColumn,
  role: textColumn,
  sis_user_id: optionalTextColumn,
  login_id: optionalTextColumn,
  email: optionalTextColumn,
  ...syncedTimestamps,
});

const enrollmentSchema = z.object({
  id: idColumn,
  user_id: idColumn,
  course_section_id: idColumn,
  type: textColumn,
  enrollment_state: textColumn,
  start_at: optionalTextColumn,
  end_at: optionalTextColumn,
  'grades.final_grade': optionalTextColumn,
  'grades.final_score': optionalTextColumn,
  ...syncedTimestamps,
});

const assignmentSchema = z.object({
  id: idColumn,
  name: textColumn,
  description: optionalTextColumn,
  unlock_at: optionalTextColumn,
  lock_at: optionalTextColumn,
  due_at: optionalTextColumn,
  points_possible: numberColumn,
  submission_types: optionalTextColumn,
  ...syncedTimestamps,
});

const submissionSchema = z.object({
  id: idColumn,
  assignment_id: idColumn,
  user_id: idColumn,
  workflow_state: textColumn,
  submitted_at: optionalTextColumn,
  score: numberColumn,
  grade: optionalTextColumn,
  late: flagColumn,
  ...syncedTimestamps,
});

export type CanvasCourse = z.output<typeof courseSchema>;

export function parseCourses(courses: readonly RawRecord[]): CanvasCourse[] {
  return parseBatch('canvas courses', courseSchema, courses);
}

/**
 * Keeps courses whose term (or, lacking one, the course itself) overlaps the range.
 * Courses without any dates are kept.
 */
export function filterCoursesByDate(courses: readonly RawRecord[], startDate?: string, endDate?: string): RawRecord[] {
  const rangeStart = startDate ? Date.parse(startDate) : Number.NEGATIVE_INFINITY;
  const rangeEnd = endDate ? Date.parse(endDate) : Number.POSITIVE_INFINITY;
  const parsed = parseCourses(courses);
  return courses.filter((_, index) => {
    const course = parsed[index];
    const courseStart = parseDate(course['term.start_at'] ?? course.start_at);
    const courseEnd = parseDate(course['term.end_at'] ?? course.end_at);
    if (courseStart === undefined && courseEnd === undefined) {
      return true;
    }
    return (courseEnd === undefined || courseEnd >= rangeStart) && (courseStart === undefined || courseStart <= rangeEnd);
  });
}

export function mapSections(sections: readonly RawRecord[], courses: readonly RawRecord[]): UdmSection[] {
  const byCourse = new Map(parseCourses(courses).map((course) => [course.id, course]));
  return parseBatch('canvas sections', sectionSchema, sections).map((section) => {
    const course = byCourse.get(section.course_id);
    return {
      SourceSystemIdentifier: section.id,
      SourceSystem: SOURCE_SYSTEM,
      EntityStatus: ACTIVE,
      LMSSectionStatus: course?.workflow_state ?? null,
      SISSectionIdentifier: section.sis_section_id,
      SectionDescription: course?.name ?? null,
      Term: course?.['term.name'] ?? null,
      Title: section.name,
      CreateDate: section.CreateDate,
      LastModifiedDate: section.LastModifiedDate,
    };
  });
}

export function mapUsers(users: readonly RawRecord[]): UdmUser[] {
  return parseBatch('canvas users', userSchema, users).map((user) => ({
    SourceSystemIdentifier: user.id,
    SourceSystem: SOURCE_SYSTEM,
    UserRole: user.role,
    SISUserIdentifier: user.sis_user_id,
    LocalUserIdentifier: user.login_id,
    Name: user.name,
    EmailAddress: user.email,
    EntityStatus: ACTIVE,
    CreateDate: user.CreateDate,
    LastModifiedDate: user.LastModifiedDate,
  }));
}

const ENROLLMENT_STATUS: Record<string, string | undefined> = {
  active: 'Active',
  invited: 'Invited',
  completed: 'Completed',
};

export function mapSectionAssociations(enrollments: readonly RawRecord[]): UdmSectionAssociation[] {
  return parseBatch('canvas enrollments', enrollmentSchema, enrollments).map((enrollment) => ({
    SourceSystemIdentifier: enrollment.id,
    SourceSystem: SOURCE_SYSTEM,
    LMSUserSourceSystemIdentifier: enrollment.user_id,
    LMSSectionSourceSystemIdentifier: enrollment.course_section_id,
    EnrollmentStatus: ENROLLMENT_STATUS[enrollment.enrollment_state ?? ''] ?? 'Inactive',
    StartDate: enrollment.start_at,
    EndDate: enrollment.end_at,
    EntityStatus: ACTIVE,
    CreateDate: enrollment.CreateDate,
    LastModifiedDate: enrollment.LastModifiedDate,
  }));
}

/** Final grades of student enrollments; `g#<enrollment id>` keeps them apart from the enrollments. */
export function mapGrades(enrollments: readonly RawRecord[]): UdmGrade[] {
  return parseBatch('canvas grades', enrollmentSchema, enrollments)
    .filter((enrollment) => enrollment.type === 'StudentEnrollment')
    .map((enrollment) => ({
      SourceSystemIdentifier: `g#${enrollment.id}`,
      SourceSystem: SOURCE_SYSTEM,
      LMSUserLMSSectionAssociationSourceSystemIdentifier: enrollment.id,
      LMSUserSourceSystemIdentifier: enrollment.user_id,
      LMSSectionSourceSystemIdentifier: enrollment.course_section_id,
      Grade: enrollment['grades.final_grade'] ?? enrollment['grades.final_score'],
      GradeType: 'Final',
      EntityStatus: ACTIVE,
      CreateDate: enrollment.CreateDate,
      LastModifiedDate: enrollment.LastModifiedDate,
    }));
}

/** Canvas assignments belong to the course; each section gets its own copy. */
export function mapAssignments(assignments: readonly RawRecord[], sectionId: string): UdmAssignment[] {
  return parseBatch('canvas assignments', assignmentSchema, assignments).map((assignment) => ({
    SourceSystemIdentifier: `${sectionId}-${assignment.id}`,
    SourceSystem: SOURCE_SYSTEM,
    LMSSectionSourceSystemIdentifier: sectionId,
    Title: assignment.name,
    AssignmentCategory: null,
    AssignmentDescription: assignment.description,
    StartDateTime: assignment.unlock_at,
    EndDateTime: assignment.lock_at,
    DueDateTime: assignment.due_at,
    SubmissionType: assignment.submission_types,
    MaxPoints: assignment.points_possible,
    EntityStatus: ACTIVE,
    CreateDate: assignment.CreateDate,
    LastModifiedDate: assignment.LastModifiedDate,
  }));
}

export function mapSubmissions(submissions: readonly RawRecord[], sectionId: string): UdmSubmission[] {
  return parseBatch('canvas submissions', submissionSchema, submissions).map((submission) => ({
    SourceSystemIdentifier: `${sectionId}-${submission.id}`,
    SourceSystem: SOURCE_SYSTEM,
    AssignmentSourceSystemIdentifier: `${sectionId}-${submission.assignment_id}`,
    LMSUserSourceSystemIdentifier: submission.user_id,
    SubmissionStatus: submission.late ? 'late' : submission.workflow_state,
    SubmissionDateTime: submission.submitted_at,
    EarnedPoints: submission.score,
    Grade: submission.grade,
    EntityStatus: ACTIVE,
    CreateDate: submission.CreateDate,
    LastModifiedDate: submission.LastModifiedDate,
  }));
}

function parseDate(value: string | null): number | undefined {
  if (!value) return undefined;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}
