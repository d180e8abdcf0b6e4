import type { UdmSection } from '../../udm/schema.js';
import type { RawRecord } from '../common/records.js';
import { groupBy, runEntity, syncResource, writeResource, type RunContext } from '../common/run_context.js';
import type { CanvasClient, CanvasUserRole } from './canvas_api_client.js';
import {
  filterCoursesByDate,
  mapAssignments,
  mapGrades,
  mapSectionAssociations,
  mapSections,
  mapSubmissions,
  mapUsers,
} from './canvas_mapping.js';

export type CanvasContext = RunContext<Pick<CanvasClient, keyof CanvasClient>>;

export interface CanvasExtractOptions {
  accountId: string;
  startDate?: string;
  endDate?: string;
}

interface SectionRef {
  sectionId: string;
  courseId: string;
}

const USER_ROLES: Array<[CanvasUserRole, string]> = [
  ['student', 'Student'],
  ['teacher', 'Teacher'],
];

export async function runCanvasExtract(ctx: CanvasContext, options: CanvasExtractOptions): Promise<void> {
  let courses: RawRecord[] = [];
  let sections: SectionRef[] = [];

  await runEntity(ctx, 'sections', async () => {
    courses = filterCoursesByDate(await ctx.client.listCourses(options.accountId), options.startDate, options.endDate);
    const syncedCourses = syncResource(ctx, 'courses', courses);
    const rawSections: RawRecord[] = [];
    for (const course of courses) {
      rawSections.push(...(await ctx.client.listSections(String(course.id))));
    }
    const mapped: UdmSection[] = mapSections(syncResource(ctx, 'sections', rawSections), syncedCourses);
    writeResource(ctx, 'sections', mapped);
    sections = rawSections.map((section) => ({ sectionId: String(section.id), courseId: String(section.course_id) }));
    return mapped.length;
  });

  await runEntity(ctx, 'users', async () => {
    const users: RawRecord[] = [];
    for (const course of courses) {
      for (const [role, label] of USER_ROLES) {
        const members = await ctx.client.listUsers(String(course.id), role);
        users.push(...members.map((member) => ({ ...member, role: label })));
      }
    }
    const mapped = mapUsers(syncResource(ctx, 'users', users));
    writeResource(ctx, 'users', mapped);
    return mapped.length;
  });

  await runEntity(ctx, 'section-associations', async () => {
    const enrollments: RawRecord[] = [];
    for (const { sectionId } of sections) {
      enrollments.push(...(await ctx.client.listEnrollments(sectionId)));
    }
    const synced = syncResource(ctx, 'enrollments', enrollments);
    const bySection = groupBy(synced, (row) => String(row.course_section_id));
    let total = 0;
    for (const { sectionId } of sections) {
      const rows = bySection.get(sectionId) ?? [];
      const associations = mapSectionAssociations(rows);
      const grades = mapGrades(rows);
      writeResource(ctx, 'section-associations', associations, { sectionId });
      writeResource(ctx, 'grades', grades, { sectionId });
      total += associations.length + grades.length;
    }
    return total;
  });

  const assignmentsByCourse = new Map<string, RawRecord[]>();
  await runEntity(ctx, 'assignments', async () => {
    const courseIds = [...new Set(sections.map((section) => section.courseId))];
    const assignments: RawRecord[] = [];
    for (const courseId of courseIds) {
      const rows = await ctx.client.listAssignments(courseId);
      assignmentsByCourse.set(courseId, rows);
      assignments.push(...rows);
    }
    const synced = groupBy(syncResource(ctx, 'assignments', assignments), (row) => String(row.course_id));
    let total = 0;
    for (const { sectionId, courseId } of sections) {
      const mapped = mapAssignments(synced.get(courseId) ?? [], sectionId);
      writeResource(ctx, 'assignments', mapped, { sectionId });
      total += mapped.length;
    }
    return total;
  });

  await runEntity(ctx, 'submissions', async () => {
    let total = 0;
    for (const { sectionId, courseId } of sections) {
      for (const assignment of assignmentsByCourse.get(courseId) ?? []) {
        const assignmentId = String(assignment.id);
        const raw = await ctx.client.listSubmissions(sectionId, assignmentId);
        const mapped = mapSubmissions(syncResource(ctx, 'submissions', raw), sectionId);
        writeResource(ctx, 'submissions', mapped, { sectionId, assignmentId: `${sectionId}-${assignmentId}` });
        total += mapped.length;
      }
    }
    return total;
  });
}
