/**
 * Plane REST API client
 */

import { z } from 'zod';
import { classifyStatus, DataSourceUnavailable, errorMessage, toSyncError, ValidationError } from './errors';
import { Logger, silentLogger } from './logger';
import { DEFAULT_RETRY_POLICY, executeWithRetry, RetryPolicy, sleep } from './retry-policy';
import { Issue, IssuePriority, IssueState, ProjectRef, StateGroup } from './types';

/**
 * Upstream issue data as the sync engine consumes it
 */
export interface IssueSource {
  listProjects(): Promise<ProjectRef[]>;
  getProject(projectId: string): Promise<ProjectRef | null>;
  listProjectIssues(project: ProjectRef): Promise<IssueListing>;
  getIssue(project: ProjectRef, issueId: string): Promise<Issue | null>;
}

/**
 * A complete issue listing; records that failed validation are reported by id
 */
export interface IssueListing {
  issues: Issue[];
  rejected: Array<{ id: string; error: string }>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface PlaneClientOptions {
  baseUrl: string;
  apiToken: string;
  workspaceSlug: string;
  requestTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  fetch?: FetchLike;
  pageSize?: number;
  maxPages?: number;
}

const STATE_GROUPS: readonly StateGroup[] = ['backlog', 'unstarted', 'started', 'completed', 'cancelled'];
const PRIORITIES = ['urgent', 'high', 'medium', 'low', 'none'] as const;

const stateSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  group: z.string(),
});

const userSchema = z.object({
  id: z.string(),
  display_name: z.string().nullish(),
});

const labelSchema = z.object({
  id: z.string(),
  name: z.string(),
});

const issueSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description_stripped: z.string().nullish(),
  description_html: z.string().nullish(),
  state: z.union([stateSchema, z.string()]).nullish(),
  target_date: z.string().nullish(),
  start_date: z.string().nullish(),
  sequence_id: z.number().int(),
  priority: z.enum(PRIORITIES).nullish().catch(null),
  assignees: z.array(z.union([userSchema, z.string()])).nullish(),
  labels: z.array(z.union([labelSchema, z.string()])).nullish(),
});

type RawIssue = z.infer<typeof issueSchema>;

const projectSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  identifier: z.string(),
});

const pageSchema = z.union([
  z.array(z.unknown()),
  z.object({
    results: z.array(z.unknown()),
    next_cursor: z.string().nullish(),
    next_page_results: z.boolean().nullish(),
  }),
]);

const EXPAND = 'assignees,labels,state';

function toStateGroup(group: string): StateGroup {
  const normalized = group.toLowerCase();
  return STATE_GROUPS.find((candidate) => candidate === normalized) ?? 'backlog';
}

/**
 * Plain text from the rich-text description
 */
export function stripHtml(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|h[1-6])>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export class PlaneClient implements IssueSource {
  private apiRoot: string;
  private apiToken: string;
  private requestTimeoutMs: number;
  private retryPolicy: RetryPolicy;
  private sleep: (ms: number) => Promise<void>;
  private logger: Logger;
  private fetch: FetchLike;
  private pageSize: number;
  private maxPages: number;

  constructor(options: PlaneClientOptions) {
    const baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiRoot = `${baseUrl}/api/v1/workspaces/${encodeURIComponent(options.workspaceSlug)}`;
    this.apiToken = options.apiToken;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? silentLogger;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.pageSize = options.pageSize ?? 100;
    this.maxPages = options.maxPages ?? 100;
  }

  async listProjects(): Promise<ProjectRef[]> {
    const records = await this.listAll('/projects/', 'projects');
    const projects: ProjectRef[] = [];

    for (const record of records) {
      const parsed = projectSchema.safeParse(record);
      if (!parsed.success) {
        throw new DataSourceUnavailable(`Project listing contains an invalid record: ${parsed.error.issues[0]?.message}`);
      }
      projects.push(parsed.data);
    }

    this.logger.debug(`Retrieved ${projects.length} projects`);
    return projects;
  }

  async getProject(projectId: string): Promise<ProjectRef | null> {
    const body = await this.get(`/projects/${encodeURIComponent(projectId)}/`, {}, `project ${projectId}`);
    if (body === null) return null;

    const parsed = projectSchema.safeParse(body);
    if (!parsed.success) {
      throw new DataSourceUnavailable(`Project ${projectId} has an invalid shape`);
    }
    return parsed.data;
  }

  /**
   * Every issue of the project; fails as a whole if any page fails
   */
  async listProjectIssues(project: ProjectRef): Promise<IssueListing> {
    const records = await this.listAll(
      `/projects/${encodeURIComponent(project.id)}/issues/`,
      `issues of ${project.identifier}`,
      { expand: EXPAND }
    );

    const listing: IssueListing = { issues: [], rejected: [] };
    const raw: RawIssue[] = [];

    for (const record of records) {
      const parsed = issueSchema.safeParse(record);
      if (parsed.success) {
        raw.push(parsed.data);
      } else {
        const id = z.object({ id: z.string() }).safeParse(record);
        listing.rejected.push({
          id: id.success ? id.data.id : '',
          error: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        });
      }
    }

    const states = await this.statesFor(project, raw);
    listing.issues = raw.map((issue) => this.normalize(issue, project, states));

    this.logger.debug(`Retrieved ${listing.issues.length} issues for ${project.identifier}`);
    return listing;
  }

  async getIssue(project: ProjectRef, issueId: string): Promise<Issue | null> {
    const body = await this.get(
      `/projects/${encodeURIComponent(project.id)}/issues/${encodeURIComponent(issueId)}/`,
      { expand: EXPAND },
      `issue ${issueId}`
    );
    if (body === null) return null;

    const parsed = issueSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError(`Issue ${issueId} has an invalid shape: ${parsed.error.issues[0]?.message}`);
    }

    const states = await this.statesFor(project, [parsed.data]);
    return this.normalize(parsed.data, project, states);
  }

  /**
   * Whether the token can read the workspace
   */
  async verifyAccess(): Promise<{ ok: boolean; projects?: number; error?: string }> {
    try {
      const projects = await this.listProjects();
      return { ok: true, projects: projects.length };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  /**
   * State names for issues whose state was not expanded
   */
  private async statesFor(project: ProjectRef, issues: RawIssue[]): Promise<Map<string, IssueState>> {
    const states = new Map<string, IssueState>();
    if (!issues.some((issue) => typeof issue.state === 'string')) {
      return states;
    }

    const records = await this.listAll(`/projects/${encodeURIComponent(project.id)}/states/`, `states of ${project.identifier}`);
    for (const record of records) {
      const parsed = stateSchema.safeParse(record);
      if (parsed.success && parsed.data.id) {
        states.set(parsed.data.id, { name: parsed.data.name, group: toStateGroup(parsed.data.group) });
      }
    }
    return states;
  }

  private normalize(raw: RawIssue, project: ProjectRef, states: Map<string, IssueState>): Issue {
    let state: IssueState = { name: 'Unknown', group: 'backlog' };
    if (typeof raw.state === 'string') {
      state = states.get(raw.state) ?? state;
    } else if (raw.state) {
      state = { name: raw.state.name, group: toStateGroup(raw.state.group) };
    }

    const priority: IssuePriority = raw.priority ?? 'none';

    return {
      id: raw.id,
      name: raw.name,
      description: raw.description_stripped ?? (raw.description_html ? stripHtml(raw.description_html) : ''),
      state,
      target_date: raw.target_date ?? null,
      start_date: raw.start_date ?? null,
      sequence_id: raw.sequence_id,
      priority,
      assignees: (raw.assignees ?? []).map((a) =>
        typeof a === 'string' ? { id: a, display_name: a } : { id: a.id, display_name: a.display_name ?? a.id }
      ),
      labels: (raw.labels ?? []).map((l) => (typeof l === 'string' ? { id: l, name: l } : l)),
      project,
    };
  }

  /**
   * Follow cursor pagination to the end; any failure makes the listing unavailable
   */
  private async listAll(path: string, what: string, query: Record<string, string> = {}): Promise<unknown[]> {
    const records: unknown[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < this.maxPages; page++) {
      const params: Record<string, string> = { ...query, per_page: String(this.pageSize) };
      if (cursor) params.cursor = cursor;

      let body: unknown;
      try {
        body = await this.get(path, params, what);
      } catch (error) {
        throw new DataSourceUnavailable(`Could not list ${what}: ${errorMessage(error)}`, { cause: error });
      }
      if (body === null) {
        throw new DataSourceUnavailable(`Could not list ${what}: not found`);
      }

      const parsed = pageSchema.safeParse(body);
      if (!parsed.success) {
        throw new DataSourceUnavailable(`Could not list ${what}: unexpected response shape`);
      }

      if (Array.isArray(parsed.data)) {
        records.push(...parsed.data);
        return records;
      }

      records.push(...parsed.data.results);
      if (!parsed.data.next_page_results || !parsed.data.next_cursor) {
        return records;
      }
      cursor = parsed.data.next_cursor;
    }

    throw new DataSourceUnavailable(`Could not list ${what}: more than ${this.maxPages} pages`);
  }

  /**
   * GET with retry and a per-attempt timeout; null on 404
   */
  private async get(path: string, params: Record<string, string>, what: string): Promise<unknown> {
    const url = new URL(`${this.apiRoot}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    const label = `GET ${what}`;

    return executeWithRetry(
      this.retryPolicy,
      async () => {
        let response: Response;
        try {
          response = await this.fetch(url.toString(), {
            method: 'GET',
            headers: { 'X-API-Key': this.apiToken, Accept: 'application/json' },
            signal: AbortSignal.timeout(this.requestTimeoutMs),
          });
        } catch (error) {
          throw toSyncError(error, label);
        }

        if (response.status === 404) return null;
        if (!response.ok) {
          throw classifyStatus(response.status, `${label}: HTTP ${response.status}`);
        }

        try {
          const body: unknown = await response.json();
          return body;
        } catch (error) {
          throw toSyncError(error, `${label}: invalid JSON`);
        }
      },
      {
        label,
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) =>
          this.logger.warn(`${label} failed (${errorMessage(error)}); retry ${attempt} in ${delayMs}ms`),
      }
    );
  }
}
