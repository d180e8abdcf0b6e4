import path from 'node:path';

export type UdmText = string | null;
export type UdmNumber = number | null;

interface UdmTimestamps {
  SourceSystemIdentifier: string;
  SourceSystem: string;
  EntityStatus: string;
  CreateDate: string;
  LastModifiedDate: string;
}

export interface UdmSection extends UdmTimestamps {
  LMSSectionStatus: UdmText;
  SISSectionIdentifier: UdmText;
  SectionDescription: UdmText;
  Term: UdmText;
  Title: UdmText;
}

export interface UdmUser extends UdmTimestamps {
  UserRole: UdmText;
  SISUserIdentifier: UdmText;
  LocalUserIdentifier: UdmText;
  Name: UdmText;
  EmailAddress: UdmText;
}

export interface UdmAssignment extends UdmTimestamps {
  LMSSectionSourceSystemIdentifier: string;
  Title: UdmText;
  AssignmentCategory: UdmText;
  AssignmentDescription: UdmText;
  StartDateTime: UdmText;
  EndDateTime: UdmText;
  DueDateTime: UdmText;
  /** JSON array of submission type names, e.g. `["online_upload"]`. */
  SubmissionType: UdmText;
  MaxPoints: UdmNumber;
}

export interface UdmSubmission extends UdmTimestamps {
  AssignmentSourceSystemIdentifier: string;
  LMSUserSourceSystemIdentifier: string;
  SubmissionStatus: UdmText;
  SubmissionDateTime: UdmText;
  EarnedPoints: UdmNumber;
  Grade: UdmText;
}

export interface UdmSectionAssociation extends UdmTimestamps {
  LMSUserSourceSystemIdentifier: string;
  LMSSectionSourceSystemIdentifier: string;
  EnrollmentStatus: UdmText;
  StartDate: UdmText;
  EndDate: UdmText;
}

export interface UdmGrade extends UdmTimestamps {
  LMSUserLMSSectionAssociationSourceSystemIdentifier: string;
  LMSUserSourceSystemIdentifier: string;
  LMSSectionSourceSystemIdentifier: string;
  Grade: UdmText;
  GradeType: UdmText;
}

export interface UdmAttendanceEvent extends UdmTimestamps {
  LMSUserSourceSystemIdentifier: string;
  LMSSectionSourceSystemIdentifier: string;
  EventDate: string;
  AttendanceStatus: string;
}

export interface UdmUserActivity extends UdmTimestamps {
  LMSUserSourceSystemIdentifier: string;
  ActivityType: string;
  ActivityDateTime: string;
  ActivityStatus: UdmText;
  ParentSourceSystemIdentifier: UdmText;
  ActivityTimeInMinutes: UdmNumber;
}

export interface UdmRowMap {
  users: UdmUser;
  sections: UdmSection;
  'system-activities': UdmUserActivity;
  assignments: UdmAssignment;
  'section-associations': UdmSectionAssociation;
  submissions: UdmSubmission;
  grades: UdmGrade;
  'attendance-events': UdmAttendanceEvent;
}

export type UdmResource = keyof UdmRowMap;

export type UdmColumn<R extends UdmResource> = keyof UdmRowMap[R] & string;

export const UDM_COLUMNS: { readonly [R in UdmResource]: readonly UdmColumn<R>[] } = {
  users: [
    'SourceSystemIdentifier',
    'SourceSystem',
    'UserRole',
    'SISUserIdentifier',
    'LocalUserIdentifier',
    'Name',
    'EmailAddress',
    'EntityStatus',
    'CreateDate',
    'LastModifiedDate',
  ],
  sections: [
    'SourceSystemIdentifier',
    'SourceSystem',
    'EntityStatus',
    'LMSSectionStatus',
    'SISSectionIdentifier',
    'SectionDescription',
    'Term',
    'Title',
    'CreateDate',
    'LastModifiedDate',
  ],
  'system-activities': [
    'SourceSystemIdentifier',
    'SourceSystem',
    'LMSUserSourceSystemIdentifier',
    'ActivityType',
    'ActivityDateTime',
    'ActivityStatus',
    'ParentSourceSystemIdentifier',
    'ActivityTimeInMinutes',
    'EntityStatus',
    'CreateDate',
    'LastModifiedDate',
  ],
  assignments: [
    'SourceSystemIdentifier',
    'SourceSystem',
    'LMSSectionSourceSystemIdentifier',
    'Title',
    'AssignmentCategory',
    'AssignmentDescription',
    'StartDateTime',
    'EndDateTime',
    'DueDateTime',
    'SubmissionType',
    'MaxPoints',
    'EntityStatus',
    'CreateDate',
    'LastModifiedDate',
  ],
  'section-associations': [
    'SourceSystemIdentifier',
    'SourceSystem',
    'LMSUserSourceSystemIdentifier',
    'LMSSectionSourceSystemIdentifier',
    'EnrollmentStatus',
    'StartDate',
    'EndDate',
    'EntityStatus',
    'CreateDate',
    'LastModifiedDate',
  ],
  submissions: [
    'SourceSystemIdentifier',
    'SourceSystem',
    'AssignmentSourceSystemIdentifier',
    'LMSUserSourceSystemIdentifier',
    'SubmissionStatus',
    'SubmissionDateTime',
    'EarnedPoints',
    'Grade',
    'EntityStatus',
    'CreateDate',
    'LastModifiedDate',
  ],
  grades: [
    'SourceSystemIdentifier',
    'SourceSystem',
    'LMSUserLMSSectionAssociationSourceSystemIdentifier',
    'LMSUserSourceSystemIdentifier',
    'LMSSectionSourceSystemIdentifier',
    'Grade',
    'GradeType',
    'EntityStatus',
    'CreateDate',
    'LastModifiedDate',
  ],
  'attendance-events': [
    'SourceSystemIdentifier',
    'SourceSystem',
    'LMSUserSourceSystemIdentifier',
    'LMSSectionSourceSystemIdentifier',
    'EventDate',
    'AttendanceStatus',
    'EntityStatus',
    'CreateDate',
    'LastModifiedDate',
  ],
};

export const UDM_RESOURCES = Object.keys(UDM_COLUMNS).filter(isUdmResource);

export function isUdmResource(value: string): value is UdmResource {
  return Object.prototype.hasOwnProperty.call(UDM_COLUMNS, value);
}

export type ResourceScope = 'root' | 'section' | 'assignment';

export const RESOURCE_SCOPE: Record<UdmResource, ResourceScope> = {
  users: 'root',
  sections: 'root',
  'system-activities': 'root',
  assignments: 'section',
  'section-associations': 'section',
  grades: 'section',
  'attendance-events': 'section',
  submissions: 'assignment',
};

export interface ResourcePartition {
  sectionId?: string;
  assignmentId?: string;
}

/**
 * Directory of a resource relative to the output root:
 * `users`, `section=<id>/grades`, `section=<id>/assignment=<id>/submissions`, ...
 */
export function resourceDirectory(resource: UdmResource, partition: ResourcePartition = {}): string {
  const scope = RESOURCE_SCOPE[resource];
  if (scope === 'root') {
    return resource;
  }
  if (!partition.sectionId) {
    throw new Error(`Resource ${resource} requires a section partition`);
  }
  const sectionDir = `section=${partition.sectionId}`;
  if (scope === 'section') {
    return path.join(sectionDir, resource);
  }
  if (!partition.assignmentId) {
    throw new Error(`Resource ${resource} requires an assignment partition`);
  }
  return path.join(sectionDir, `assignment=${partition.assignmentId}`, resource);
}
