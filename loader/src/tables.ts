import type { UdmResource } from '../../udm/schema.js';

export type ColumnType = 'text' | 'number' | 'timestamp';

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  /** Destination width of a text column; longer values are cut to this length when staged. */
  maxLength?: number;
}

/**
 * A natural-key reference from a staging column to a parent table. At insert time the
 * parent's surrogate key (`key`) is looked up by `(SourceSystemIdentifier, SourceSystem)`.
 */
export interface TableReference {
  column: string;
  table: string;
  key: string;
}

export interface TableDefinition {
  resource: UdmResource;
  table: string;
  stagingTable: string;
  /** Surrogate key of the production table. */
  key: string;
  /** Mutable columns copied from staging; natural key, references and timestamps excluded. */
  columns: readonly ColumnDefinition[];
  references: readonly TableReference[];
  /**
   * Staging column of the reference that bounds soft deletes. Only production rows whose
   * parent appears in the staged file are candidates.
   */
  scope?: string;
}

const IDENTIFIER_LENGTH = 255;

const text = (name: string, maxLength = IDENTIFIER_LENGTH): ColumnDefinition => ({ name, type: 'text', maxLength });
const timestamp = (name: string): ColumnDefinition => ({ name, type: 'timestamp' });
const number = (name: string): ColumnDefinition => ({ name, type: 'number' });

const USER_REFERENCE: TableReference = { column: 'LMSUserSourceSystemIdentifier', table: 'LMSUser', key: 'LMSUserIdentifier' };
const SECTION_REFERENCE: TableReference = {
  column: 'LMSSectionSourceSystemIdentifier',
  table: 'LMSSection',
  key: 'LMSSectionIdentifier',
};
const ASSIGNMENT_REFERENCE: TableReference = {
  column: 'AssignmentSourceSystemIdentifier',
  table: 'Assignment',
  key: 'AssignmentIdentifier',
};
const ASSOCIATION_REFERENCE: TableReference = {
  column: 'LMSUserLMSSectionAssociationSourceSystemIdentifier',
  table: 'LMSUserLMSSectionAssociation',
  key: 'LMSUserLMSSectionAssociationIdentifier',
};

function defineTable(
  resource: UdmResource,
  table: string,
  columns: readonly ColumnDefinition[],
  references: readonly TableReference[] = [],
  scope?: TableReference,
): TableDefinition {
  return {
    resource,
    table,
    stagingTable: `stg_${table}`,
    key: `${table}Identifier`,
    columns,
    references,
    scope: scope?.column,
  };
}

export const USERS = defineTable('users', 'LMSUser', [
  text('UserRole', 60),
  text('SISUserIdentifier'),
  text('LocalUserIdentifier'),
  text('Name'),
  text('EmailAddress'),
  text('EntityStatus', 60),
]);

export const SECTIONS = defineTable('sections', 'LMSSection', [
  text('LMSSectionStatus', 60),
  text('SISSectionIdentifier'),
  text('SectionDescription', 1024),
  text('Term', 60),
  text('Title'),
  text('EntityStatus', 60),
]);

export const USER_ACTIVITIES = defineTable(
  'system-activities',
  'LMSUserActivity',
  [
    text('ActivityType', 60),
    timestamp('ActivityDateTime'),
    text('ActivityStatus', 60),
    text('ParentSourceSystemIdentifier'),
    number('ActivityTimeInMinutes'),
    text('EntityStatus', 60),
  ],
  [USER_REFERENCE],
);

export const ASSIGNMENTS = defineTable(
  'assignments',
  'Assignment',
  [
    text('Title'),
    text('AssignmentCategory', 60),
    text('AssignmentDescription', 1024),
    timestamp('StartDateTime'),
    timestamp('EndDateTime'),
    timestamp('DueDateTime'),
    number('MaxPoints'),
    text('EntityStatus', 60),
  ],
  [SECTION_REFERENCE],
  SECTION_REFERENCE,
);

export const SECTION_ASSOCIATIONS = defineTable(
  'section-associations',
  'LMSUserLMSSectionAssociation',
  [text('EnrollmentStatus', 60), timestamp('StartDate'), timestamp('EndDate'), text('EntityStatus', 60)],
  [SECTION_REFERENCE, USER_REFERENCE],
  SECTION_REFERENCE,
);

export const SUBMISSIONS = defineTable(
  'submissions',
  'AssignmentSubmission',
  [
    text('SubmissionStatus', 60),
    timestamp('SubmissionDateTime'),
    number('EarnedPoints'),
    text('Grade', 20),
    text('EntityStatus', 60),
  ],
  [ASSIGNMENT_REFERENCE, USER_REFERENCE],
  ASSIGNMENT_REFERENCE,
);

export const GRADES = defineTable(
  'grades',
  'LMSGrade',
  [text('Grade', 20), text('GradeType', 60), text('EntityStatus', 60)],
  [SECTION_REFERENCE, USER_REFERENCE, ASSOCIATION_REFERENCE],
  SECTION_REFERENCE,
);

export const ATTENDANCE_EVENTS = defineTable(
  'attendance-events',
  'LMSUserAttendanceEvent',
  [timestamp('EventDate'), text('AttendanceStatus', 60), text('EntityStatus', 60)],
  [SECTION_REFERENCE, USER_REFERENCE],
  SECTION_REFERENCE,
);

/** Parents before children, so every reference can resolve within a single run. */
export const LOAD_ORDER: readonly TableDefinition[] = [
  USERS,
  SECTIONS,
  USER_ACTIVITIES,
  ASSIGNMENTS,
  SECTION_ASSOCIATIONS,
  SUBMISSIONS,
  GRADES,
  ATTENDANCE_EVENTS,
];

/** Staging column order: natural key, references, mutable columns, then source timestamps. */
export function stagingColumns(table: TableDefinition): string[] {
  return [
    'SourceSystemIdentifier',
    'SourceSystem',
    ...table.references.map((reference) => reference.column),
    ...table.columns.map((column) => column.name),
    'CreateDate',
    'LastModifiedDate',
  ];
}

export const SUBMISSION_TYPE_TABLE = 'AssignmentSubmissionType';
export const SUBMISSION_TYPE_STAGING_TABLE = `stg_${SUBMISSION_TYPE_TABLE}`;
export const SUBMISSION_TYPE_LENGTH = 60;
