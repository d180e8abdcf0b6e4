import type { Logger } from '../../shared/logger.js';
import { UnexpectedPayloadError, requestJson, type FetchLike } from '../common/http_client.js';
import { flattenRecord, isPlainObject, type RawRecord } from '../common/records.js';
import { DEFAULT_RETRY_POLICY, callWithRetry, type RetryPolicy } from '../common/retry_policy.js';
import { buildAuthorizationHeader, createNonce, type OAuth1Credentials, type OAuth1Nonce } from './oauth1.js';

export const SCHOOLOGY_BASE_URL = 'https://api.schoology.com/v1/';

export interface SchoologyClientOptions {
  credentials: OAuth1Credentials;
  baseUrl?: string;
  pageSize?: number;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  fetchImpl?: FetchLike;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  nonce?: () => OAuth1Nonce;
}

function nestedList(container: unknown, key: string): Record<string, unknown>[] {
  const list = isPlainObject(container) ? container[key] : undefined;
  return Array.isArray(list) ? list.filter(isPlainObject) : [];
}

/** Schoology REST API v1: OAuth 1.0a signed, `start`/`limit` pages linked through `links.next`. */
export class SchoologyClient {
  private readonly baseUrl: string;

  constructor(private readonly options: SchoologyClientOptions) {
    this.baseUrl = options.baseUrl ?? SCHOOLOGY_BASE_URL;
  }

  async listUsers(): Promise<RawRecord[]> {
    return (await this.paginate('users', 'user')).map((item) => flattenRecord(item));
  }

  async listRoles(): Promise<RawRecord[]> {
    return (await this.paginate('roles', 'role')).map((item) => flattenRecord(item));
  }

  async listCourses(): Promise<RawRecord[]> {
    return (await this.paginate('courses', 'course')).map((item) => flattenRecord(item));
  }

  async listSections(courseId: string): Promise<RawRecord[]> {
    return (await this.paginate(`courses/${encodeURIComponent(courseId)}/sections`, 'section')).map((item) =>
      flattenRecord(item),
    );
  }

  async listGradingPeriods(): Promise<RawRecord[]> {
    return (await this.paginate('gradingperiods', 'gradingperiods')).map((item) => flattenRecord(item));
  }

  async listAssignments(sectionId: string): Promise<RawRecord[]> {
    return (await this.paginate(`sections/${encodeURIComponent(sectionId)}/assignments`, 'assignment')).map(
      (item) => flattenRecord(item),
    );
  }

  /** Submission revisions of one grade item. */
  async listSubmissions(sectionId: string, assignmentId: string): Promise<RawRecord[]> {
    const path = `sections/${encodeURIComponent(sectionId)}/submissions/${encodeURIComponent(assignmentId)}`;
    return (await this.paginate(path, 'revision')).map((item) => flattenRecord(item));
  }

  async listEnrollments(sectionId: string): Promise<RawRecord[]> {
    return (await this.paginate(`sections/${encodeURIComponent(sectionId)}/enrollments`, 'enrollment')).map(
      (item) => flattenRecord(item),
    );
  }

  /**
   * Attendance comes back grouped by day, then by status
   * (`date[].statuses.status[].attendances.attendance[]`); it is returned as one
   * `{ enrollment_id, date, status, comment }` row per mark.
   */
  async listAttendance(sectionId: string): Promise<RawRecord[]> {
    const days = await this.paginate(`sections/${encodeURIComponent(sectionId)}/attendance`, 'date');
    const rows: RawRecord[] = [];
    for (const day of days) {
      const date = typeof day.date === 'string' ? day.date : null;
      for (const group of nestedList(day.statuses, 'status')) {
        for (const mark of nestedList(group.attendances, 'attendance')) {
          rows.push({ ...flattenRecord(mark), date });
        }
      }
    }
    return rows;
  }

  private async paginate(path: string, key: string): Promise<Record<string, unknown>[]> {
    const items: Record<string, unknown>[] = [];
    const first = new URL(path, this.baseUrl);
    first.searchParams.set('start', '0');
    first.searchParams.set('limit', String(this.options.pageSize ?? 200));
    let url: string | undefined = first.toString();

    while (url) {
      const target: string = url;
      const response = await callWithRetry(
        () =>
          requestJson({
            url: target,
            headers: {
              authorization: buildAuthorizationHeader(
                'GET',
                target,
                this.options.credentials,
                (this.options.nonce ?? createNonce)(),
              ),
            },
            timeoutMs: this.options.timeoutMs,
            fetchImpl: this.options.fetchImpl,
          }),
        this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
        { label: path, logger: this.options.logger, sleep: this.options.sleep },
      );

      const body = response.body;
      if (!isPlainObject(body)) {
        throw new UnexpectedPayloadError(`Expected a JSON object listing ${key}`, target);
      }
      const page = body[key] ?? [];
      if (!Array.isArray(page)) {
        throw new UnexpectedPayloadError(`Expected ${key} to be an array`, target);
      }
      items.push(...page.filter(isPlainObject));
      const links: Record<string, unknown> = isPlainObject(body.links) ? body.links : {};
      url = typeof links.next === 'string' && links.next !== '' ? links.next : undefined;
    }

    this.options.logger?.debug({ path, records: items.length }, 'schoology collection fetched');
    return items;
  }
}
