import type { RawRecord } from '../common/records.js';
import { groupBy, runEntity, syncResource, writeResource, type RunContext } from '../common/run_context.js';
import type { ClassroomClient } from './classroom_api_client.js';
import {
  mapAssignments,
  mapSectionAssociations,
  mapSections,
  mapSubmissions,
  mapUserActivities,
  mapUsers,
} from './classroom_mapping.js';

export type ClassroomContext = RunContext<Pick<ClassroomClient, keyof ClassroomClient>>;

export interface ClassroomExtractOptions {
  usageStartDate?: string;
  usageEndDate?: string;
}

export async function runGoogleClassroomExtract(ctx: ClassroomContext, options: ClassroomExtractOptions): Promise<void> {
  let courseIds: string[] = [];

  await runEntity(ctx, 'sections', async () => {
    const courses = await ctx.client.listCourses();
    const mapped = mapSections(syncResource(ctx, 'courses', courses));
    writeResource(ctx, 'sections', mapped);
    courseIds = mapped.map((section) => section.SourceSystemIdentifier);
    return mapped.length;
  });

  await runEntity(ctx, 'users', async () => {
    const rosters: RawRecord[] = [];
    for (const courseId of courseIds) {
      const students = await ctx.client.listStudents(courseId);
      const teachers = await ctx.client.listTeachers(courseId);
      rosters.push(...students.map((row) => toRoster(row, courseId, 'Student')));
      rosters.push(...teachers.map((row) => toRoster(row, courseId, 'Teacher')));
    }

    const users = mapUsers(syncResource(ctx, 'users', rosters, 'userId'));
    writeResource(ctx, 'users', users);

    const byCourse = groupBy(syncResource(ctx, 'rosters', rosters), (row) => String(row.courseId));
    let associations = 0;
    for (const courseId of courseIds) {
      const mapped = mapSectionAssociations(byCourse.get(courseId) ?? []);
      writeResource(ctx, 'section-associations', mapped, { sectionId: courseId });
      associations += mapped.length;
    }
    return users.length + associations;
  });

  const courseWorkIds = new Map<string, string[]>();
  await runEntity(ctx, 'assignments', async () => {
    let total = 0;
    for (const courseId of courseIds) {
      const courseWork = await ctx.client.listCourseWork(courseId);
      const mapped = mapAssignments(syncResource(ctx, 'coursework', courseWork));
      writeResource(ctx, 'assignments', mapped, { sectionId: courseId });
      courseWorkIds.set(
        courseId,
        courseWork.map((work) => String(work.id)),
      );
      total += mapped.length;
    }
    return total;
  });

  await runEntity(ctx, 'submissions', async () => {
    let total = 0;
    for (const courseId of courseIds) {
      const raw = await ctx.client.listStudentSubmissions(courseId);
      const byWork = groupBy(mapSubmissions(syncResource(ctx, 'submissions', raw)), (row) => row.AssignmentSourceSystemIdentifier);
      for (const workId of courseWorkIds.get(courseId) ?? []) {
        const assignmentId = `${courseId}-${workId}`;
        const rows = byWork.get(assignmentId) ?? [];
        writeResource(ctx, 'submissions', rows, { sectionId: courseId, assignmentId });
        total += rows.length;
      }
    }
    return total;
  });

  if (options.usageStartDate && options.usageEndDate) {
    const { usageStartDate, usageEndDate } = options;
    await runEntity(ctx, 'system-activities', async () => {
      const reports: RawRecord[] = [];
      for (const date of eachDate(usageStartDate, usageEndDate)) {
        const daily = await ctx.client.listUsageReports(date);
        reports.push(...daily.map((row) => ({ ...row, id: `${String(row['entity.profileId'])}#${date}` })));
      }
      const mapped = mapUserActivities(syncResource(ctx, 'usage', reports));
      writeResource(ctx, 'system-activities', mapped);
      return mapped.length;
    });
  }
}

function toRoster(row: RawRecord, courseId: string, role: string): RawRecord {
  return { ...row, courseId, id: `${courseId}-${String(row.userId)}`, role };
}

/** Inclusive list of `YYYY-MM-DD` days. */
export function eachDate(startDate: string, endDate: string): string[] {
  const days: string[] = [];
  const cursor = new Date(`${startDate}T00:00:00Z`);
  const end = new Date(`${endDate}T00:00:00Z`);
  while (cursor.getTime() <= end.getTime()) {
    days.push(cursor.toISOString().slice(0, 10));
    cursor.setUTCDate(cursor.getUTCDate() + 1);
  }
  return days;
}
