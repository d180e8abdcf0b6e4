import type { Logger } from '../../shared/logger.js';
import {
  UnexpectedPayloadError,
  nextLinkFromHeader,
  requestJson,
  type FetchLike,
} from '../common/http_client.js';
import { flattenRecord, type RawRecord } from '../common/records.js';
import { DEFAULT_RETRY_POLICY, callWithRetry, type RetryPolicy } from '../common/retry_policy.js';

export interface CanvasClientOptions {
  baseUrl: string;
  accessToken: string;
  perPage?: number;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  fetchImpl?: FetchLike;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export type CanvasUserRole = 'student' | 'teacher';

type QueryParams = Array<[string, string]>;

/** Canvas REST API v1, paginated through the `Link` response header. */
export class CanvasClient {
  private readonly apiRoot: string;

  constructor(private readonly options: CanvasClientOptions) {
    this.apiRoot = `${options.baseUrl.replace(/\/+$/, '')}/api/v1`;
  }

  listCourses(accountId: string): Promise<RawRecord[]> {
    return this.paginate(`/accounts/${encodeURIComponent(accountId)}/courses`, [
      ['state[]', 'available'],
      ['state[]', 'completed'],
      ['include[]', 'term'],
    ]);
  }

  listSections(courseId: string): Promise<RawRecord[]> {
    return this.paginate(`/courses/${encodeURIComponent(courseId)}/sections`);
  }

  listUsers(courseId: string, role: CanvasUserRole): Promise<RawRecord[]> {
    return this.paginate(`/courses/${encodeURIComponent(courseId)}/users`, [
      ['enrollment_type[]', role],
      ['include[]', 'email'],
    ]);
  }

  listEnrollments(sectionId: string): Promise<RawRecord[]> {
    return this.paginate(`/sections/${encodeURIComponent(sectionId)}/enrollments`, [
      ['type[]', 'StudentEnrollment'],
      ['type[]', 'TeacherEnrollment'],
      ['state[]', 'active'],
      ['state[]', 'invited'],
    ]);
  }

  listAssignments(courseId: string): Promise<RawRecord[]> {
    return this.paginate(`/courses/${encodeURIComponent(courseId)}/assignments`);
  }

  listSubmissions(sectionId: string, assignmentId: string): Promise<RawRecord[]> {
    return this.paginate(
      `/sections/${encodeURIComponent(sectionId)}/assignments/${encodeURIComponent(assignmentId)}/submissions`,
    );
  }

  private async paginate(pathname: string, params: QueryParams = []): Promise<RawRecord[]> {
    const search = new URLSearchParams([...params, ['per_page', String(this.options.perPage ?? 100)]]);
    let url: string | undefined = `${this.apiRoot}${pathname}?${search.toString()}`;
    const records: RawRecord[] = [];

    while (url) {
      const target: string = url;
      const response = await callWithRetry(
        () =>
          requestJson({
            url: target,
            headers: { authorization: `Bearer ${this.options.accessToken}` },
            timeoutMs: this.options.timeoutMs,
            fetchImpl: this.options.fetchImpl,
          }),
        this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
        { label: pathname, logger: this.options.logger, sleep: this.options.sleep },
      );
      if (!Array.isArray(response.body)) {
        throw new UnexpectedPayloadError(`Expected a JSON array from ${pathname}`, target);
      }
      for (const item of response.body) {
        records.push(flattenRecord(item));
      }
      url = nextLinkFromHeader(response.headers.get('link'));
    }

    this.options.logger?.debug({ pathname, records: records.length }, 'canvas collection fetched');
    return records;
  }
}
