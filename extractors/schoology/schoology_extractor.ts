import type { UdmSectionAssociation } from '../../udm/schema.js';
import type { RawRecord } from '../common/records.js';
import { groupBy, runEntity, syncResource, writeResource, type RunContext } from '../common/run_context.js';
import type { SchoologyClient } from './schoology_api_client.js';
import {
  mapAssignments,
  mapAttendanceEvents,
  mapSectionAssociations,
  mapSections,
  mapSubmissions,
  mapUsers,
} from './schoology_mapping.js';

export type SchoologyContext = RunContext<Pick<SchoologyClient, keyof SchoologyClient>>;

export async function runSchoologyExtract(ctx: SchoologyContext): Promise<void> {
  let sectionIds: string[] = [];
  const assignmentIds = new Map<string, string[]>();
  const associationsBySection = new Map<string, UdmSectionAssociation[]>();

  await runEntity(ctx, 'users', async () => {
    const roles = await ctx.client.listRoles();
    const mapped = mapUsers(syncResource(ctx, 'users', await ctx.client.listUsers()), roles);
    writeResource(ctx, 'users', mapped);
    return mapped.length;
  });

  await runEntity(ctx, 'sections', async () => {
    const gradingPeriods = await ctx.client.listGradingPeriods();
    const sections: RawRecord[] = [];
    for (const course of await ctx.client.listCourses()) {
      sections.push(...(await ctx.client.listSections(String(course.id))));
    }
    const mapped = mapSections(syncResource(ctx, 'sections', sections), gradingPeriods);
    writeResource(ctx, 'sections', mapped);
    sectionIds = mapped.map((section) => section.SourceSystemIdentifier);
    return mapped.length;
  });

  await runEntity(ctx, 'assignments', async () => {
    const assignments: RawRecord[] = [];
    for (const sectionId of sectionIds) {
      const rows = await ctx.client.listAssignments(sectionId);
      assignments.push(...rows.map((row) => ({ ...row, section_id: sectionId })));
    }
    const bySection = groupBy(mapAssignments(syncResource(ctx, 'assignments', assignments)), (row) =>
      row.LMSSectionSourceSystemIdentifier,
    );
    let total = 0;
    for (const sectionId of sectionIds) {
      const rows = bySection.get(sectionId) ?? [];
      writeResource(ctx, 'assignments', rows, { sectionId });
      assignmentIds.set(
        sectionId,
        rows.map((row) => row.SourceSystemIdentifier),
      );
      total += rows.length;
    }
    return total;
  });

  await runEntity(ctx, 'submissions', async () => {
    let total = 0;
    for (const sectionId of sectionIds) {
      for (const assignmentId of assignmentIds.get(sectionId) ?? []) {
        const revisions = await ctx.client.listSubmissions(sectionId, assignmentId);
        const keyed = revisions.map((row) => ({ ...row, id: `${sectionId}#${assignmentId}#${String(row.uid)}` }));
        const mapped = mapSubmissions(syncResource(ctx, 'submissions', keyed));
        writeResource(ctx, 'submissions', mapped, { sectionId, assignmentId });
        total += mapped.length;
      }
    }
    return total;
  });

  await runEntity(ctx, 'section-associations', async () => {
    const enrollments: RawRecord[] = [];
    for (const sectionId of sectionIds) {
      const rows = await ctx.client.listEnrollments(sectionId);
      enrollments.push(...rows.map((row) => ({ ...row, section_id: sectionId })));
    }
    const bySection = groupBy(mapSectionAssociations(syncResource(ctx, 'enrollments', enrollments)), (row) =>
      row.LMSSectionSourceSystemIdentifier,
    );
    let total = 0;
    for (const sectionId of sectionIds) {
      const rows = bySection.get(sectionId) ?? [];
      writeResource(ctx, 'section-associations', rows, { sectionId });
      associationsBySection.set(sectionId, rows);
      total += rows.length;
    }
    return total;
  });

  await runEntity(ctx, 'attendance-events', async () => {
    let total = 0;
    for (const sectionId of sectionIds) {
      const marks = await ctx.client.listAttendance(sectionId);
      const keyed = marks.map((row) => ({ ...row, id: `${String(row.enrollment_id)}#${String(row.date)}` }));
      const mapped = mapAttendanceEvents(
        syncResource(ctx, 'attendance', keyed),
        associationsBySection.get(sectionId) ?? [],
      );
      writeResource(ctx, 'attendance-events', mapped, { sectionId });
      total += mapped.length;
    }
    return total;
  });
}
