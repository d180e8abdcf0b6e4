import type { Logger } from '../../shared/logger.js';
import { UnexpectedPayloadError, requestJson, type FetchLike } from '../common/http_client.js';
import { flattenRecord, isPlainObject, type RawRecord } from '../common/records.js';
import { DEFAULT_RETRY_POLICY, callWithRetry, type RetryPolicy } from '../common/retry_policy.js';
import type { AccessTokenProvider } from './google_auth.js';

const CLASSROOM_ROOT = 'https://classroom.googleapis.com/v1';
const REPORTS_ROOT = 'https://admin.googleapis.com/admin/reports/v1';

export const LAST_LOGIN_PARAMETER = 'accounts:last_login_time';

export interface ClassroomClientOptions {
  auth: AccessTokenProvider;
  pageSize?: number;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  fetchImpl?: FetchLike;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

type QueryParams = Array<[string, string]>;

/** Google Classroom and Admin Reports APIs, paginated with `nextPageToken`. */
export class ClassroomClient {
  constructor(private readonly options: ClassroomClientOptions) {}

  async listCourses(): Promise<RawRecord[]> {
    const items = await this.paginate(`${CLASSROOM_ROOT}/courses`, 'courses');
    return items.map((item) => flattenRecord(item));
  }

  async listStudents(courseId: string): Promise<RawRecord[]> {
    const items = await this.paginate(`${CLASSROOM_ROOT}/courses/${encodeURIComponent(courseId)}/students`, 'students');
    return items.map((item) => flattenRecord(item));
  }

  async listTeachers(courseId: string): Promise<RawRecord[]> {
    const items = await this.paginate(`${CLASSROOM_ROOT}/courses/${encodeURIComponent(courseId)}/teachers`, 'teachers');
    return items.map((item) => flattenRecord(item));
  }

  async listCourseWork(courseId: string): Promise<RawRecord[]> {
    const items = await this.paginate(
      `${CLASSROOM_ROOT}/courses/${encodeURIComponent(courseId)}/courseWork`,
      'courseWork',
    );
    return items.map((item) => flattenRecord(item));
  }

  async listStudentSubmissions(courseId: string): Promise<RawRecord[]> {
    const items = await this.paginate(
      `${CLASSROOM_ROOT}/courses/${encodeURIComponent(courseId)}/courseWork/-/studentSubmissions`,
      'studentSubmissions',
    );
    return items.map((item) => flattenRecord(item));
  }

  /**
   * Per-user usage for one day (`YYYY-MM-DD`). The last sign-in time is lifted out of the
   * report's `parameters` list into a `lastLoginTime` column.
   */
  async listUsageReports(date: string): Promise<RawRecord[]> {
    const items = await this.paginate(
      `${REPORTS_ROOT}/usage/users/all/dates/${encodeURIComponent(date)}`,
      'usageReports',
      [['parameters', LAST_LOGIN_PARAMETER]],
    );
    return items.map((item) => {
      const { parameters, ...rest } = item;
      return { ...flattenRecord(rest), lastLoginTime: findDatetimeParameter(parameters, LAST_LOGIN_PARAMETER) };
    });
  }

  private async paginate(url: string, key: string, params: QueryParams = []): Promise<Record<string, unknown>[]> {
    const items: Record<string, unknown>[] = [];
    let pageToken: string | undefined;

    do {
      const search = new URLSearchParams([...params, ['pageSize', String(this.options.pageSize ?? 100)]]);
      if (pageToken) {
        search.set('pageToken', pageToken);
      }
      const target = `${url}?${search.toString()}`;
      const response = await callWithRetry(
        async () =>
          requestJson({
            url: target,
            headers: { authorization: `Bearer ${await this.options.auth.getAccessToken()}` },
            timeoutMs: this.options.timeoutMs,
            fetchImpl: this.options.fetchImpl,
          }),
        this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
        { label: key, logger: this.options.logger, sleep: this.options.sleep },
      );

      const body = response.body;
      if (!isPlainObject(body)) {
        throw new UnexpectedPayloadError(`Expected a JSON object listing ${key}`, target);
      }
      // empty collections come back without the key
      const page = body[key] ?? [];
      if (!Array.isArray(page)) {
        throw new UnexpectedPayloadError(`Expected ${key} to be an array`, target);
      }
      items.push(...page.filter(isPlainObject));
      pageToken = typeof body.nextPageToken === 'string' && body.nextPageToken !== '' ? body.nextPageToken : undefined;
    } while (pageToken);

    this.options.logger?.debug({ key, records: items.length }, 'classroom collection fetched');
    return items;
  }
}

function findDatetimeParameter(parameters: unknown, name: string): string | null {
  if (!Array.isArray(parameters)) {
    return null;
  }
  for (const parameter of parameters) {
    if (isPlainObject(parameter) && parameter.name === name && typeof parameter.datetimeValue === 'string') {
      return parameter.datetimeValue;
    }
  }
  return null;
}
