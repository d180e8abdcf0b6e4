import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import test from 'node:test';

import { createHarness, readOutput } from '../../common/tests/harness.js';
import type { ClassroomClient } from '../classroom_api_client.js';
import { runGoogleClassroomExtract } from '../classroom_extractor.js';

type ClassroomApi = Pick<ClassroomClient, keyof ClassroomClient>;

const CREATED = '2024-01-02T03:04:05.000Z';
const UPDATED = '2024-02-03T04:05:06.000Z';

function stubClient(): ClassroomApi {
  return {
    listCourses: async () => [
      {
        id: 'c1',
        courseState: 'ACTIVE',
        descriptionHeading: 'Algebra, period 1',
        name: 'Algebra',
        creationTime: CREATED,
        updateTime: UPDATED,
      },
    ],
    listStudents: async () => [
      { courseId: 'c1', userId: 'u1', 'profile.name.fullName': 'Ada Lovelace', 'profile.emailAddress': 'ada@example.test' },
    ],
    listTeachers: async () => [
      { courseId: 'c1', userId: 'u2', 'profile.name.fullName': 'Grace Hopper', 'profile.emailAddress': 'grace@example.test' },
    ],
    listCourseWork: async () => [
      { id: 'w1', courseId: 'c1', title: 'Quiz 1', workType: 'ASSIGNMENT', maxPoints: 10, creationTime: CREATED, updateTime: UPDATED },
    ],
    listStudentSubmissions: async () => [
      {
        id: 's1',
        courseId: 'c1',
        courseWorkId: 'w1',
        userId: 'u1',
        state: 'TURNED_IN',
        assignedGrade: 9,
        creationTime: CREATED,
        updateTime: UPDATED,
      },
    ],
    listUsageReports: async () => [{ 'entity.profileId': 'u1', lastLoginTime: '2024-05-01T08:00:00.000Z' }],
  };
}

test('a run writes sections, rosters, coursework and submissions per course', async (t) => {
  const { ctx, outputDirectory, tracker } = createHarness(t, 'google-classroom', stubClient());

  await runGoogleClassroomExtract(ctx, {});

  assert.equal(tracker.exitCode(), 0);
  assert.deepEqual(
    readOutput(outputDirectory, 'sections').map((row) => [row.SourceSystemIdentifier, row.CreateDate]),
    [['c1', CREATED]],
  );
  assert.deepEqual(
    readOutput(outputDirectory, 'users').map((row) => [row.SourceSystemIdentifier, row.UserRole, row.Name]),
    [
      ['u1', 'Student', 'Ada Lovelace'],
      ['u2', 'Teacher', 'Grace Hopper'],
    ],
  );
  assert.deepEqual(
    readOutput(outputDirectory, 'section=c1/section-associations').map((row) => [
      row.SourceSystemIdentifier,
      row.LMSUserSourceSystemIdentifier,
    ]),
    [
      ['c1-u1', 'u1'],
      ['c1-u2', 'u2'],
    ],
  );
  assert.equal(readOutput(outputDirectory, 'section=c1/assignments')[0].SourceSystemIdentifier, 'c1-w1');

  const [submission] = readOutput(outputDirectory, 'section=c1/assignment=c1-w1/submissions');
  assert.equal(submission.SourceSystemIdentifier, 'c1-w1-s1');
  assert.equal(submission.SubmissionDateTime, UPDATED);
  assert.equal(submission.EarnedPoints, '9');

  assert.equal(fs.existsSync(path.join(outputDirectory, 'system-activities')), false);
});

test('usage reports are pulled for every day of the range', async (t) => {
  const { ctx, outputDirectory } = createHarness(t, 'google-classroom', stubClient());

  await runGoogleClassroomExtract(ctx, { usageStartDate: '2024-05-01', usageEndDate: '2024-05-02' });

  assert.deepEqual(
    readOutput(outputDirectory, 'system-activities').map((row) => [row.SourceSystemIdentifier, row.ActivityDateTime]),
    [['in#u1#2024-05-01T08:00:00.000Z', '2024-05-01T08:00:00.000Z']],
  );
});
