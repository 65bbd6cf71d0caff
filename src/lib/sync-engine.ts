/**
 * Reconciler: converges each project's calendar onto its issues
 *
 * A full run per project goes FETCHING → RESOLVING_CALENDAR → DIFFING → APPLYING
 * and ends COMPLETED or FAILED. Listing and applying for one calendar happen
 * under that calendar's lock, so a webhook and a scheduled run never both see
 * an event as missing and create it twice.
 */

import { CalendarClient } from './caldav-client';
import { CalendarDirectory, calendarName } from './calendar-directory';
import { DataSourceUnavailable, errorKind, errorMessage, ValidationError } from './errors';
import { EventMapper, isEngineUid, issueUid } from './event-mapper';
import { KeyedLock } from './keyed-lock';
import { Logger, silentLogger } from './logger';
import { IssueListing, IssueSource } from './plane-client';
import {
  CalendarEvent,
  CalendarReference,
  emptySyncState,
  mergeSyncStates,
  ProjectPlan,
  ProjectRef,
  RemoteEvent,
  RunPhase,
  SingleIssuePayload,
  SyncAction,
  SyncCounts,
  SyncItemError,
  SyncState,
  SyncStatus,
  WebhookAction,
} from './types';

const ACTIVE_PHASES: RunPhase[] = ['FETCHING', 'RESOLVING_CALENDAR', 'DIFFING', 'APPLYING'];
const MAX_PENDING_ERRORS = 100;

export interface SyncEngineDeps {
  source: IssueSource;
  directory: CalendarDirectory;
  client: CalendarClient;
  mapper: EventMapper;
  lock?: KeyedLock;
}

export interface SyncEngineOptions {
  /** Further consecutive runs an issue must stay missing from its listing before its event goes */
  absenceGraceRuns?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface DiffInput {
  listing: IssueListing;
  remote: RemoteEvent[];
  mapper: EventMapper;
  project: ProjectRef;
  absenceGraceRuns?: number;
  /** Consecutive runs each uid has already been missing */
  absence?: ReadonlyMap<string, number>;
}

export interface DiffResult {
  actions: SyncAction[];
  unchanged: number;
  errors: SyncItemError[];
  /** Uids still inside their grace period, with their updated miss counts */
  absence: Map<string, number>;
}

/**
 * Compare desired events (from the listing) against the calendar's current events
 */
export function diffEvents(input: DiffInput): DiffResult {
  const { listing, remote, mapper, project } = input;
  const graceRuns = input.absenceGraceRuns ?? 0;
  const previousAbsence = input.absence ?? new Map<string, number>();

  const desired = new Map<string, { issueId: string; event: CalendarEvent }>();
  const listed = new Set<string>();
  const cleared = new Set<string>();
  // Uids whose issue could not be mapped keep their current event
  const held = new Set<string>();
  const errors: SyncItemError[] = [];

  for (const issue of listing.issues) {
    const uid = issueUid(issue.id);
    listed.add(uid);
    try {
      const event = mapper.transform(issue);
      if (event) {
        desired.set(uid, { issueId: issue.id, event });
      } else {
        cleared.add(uid);
      }
    } catch (error) {
      held.add(uid);
      errors.push({ kind: errorKind(error), error: errorMessage(error), projectId: project.id, issueId: issue.id, uid });
    }
  }

  for (const rejected of listing.rejected) {
    const uid = rejected.id ? issueUid(rejected.id) : undefined;
    if (uid) {
      listed.add(uid);
      held.add(uid);
    }
    errors.push({
      kind: 'ValidationError',
      error: `Invalid issue record: ${rejected.error}`,
      projectId: project.id,
      issueId: rejected.id || undefined,
      uid,
    });
  }

  const remoteByUid = new Map<string, RemoteEvent[]>();
  for (const event of remote) {
    if (!isEngineUid(event.uid)) continue;
    const copies = remoteByUid.get(event.uid) ?? [];
    copies.push(event);
    remoteByUid.set(event.uid, copies);
  }

  const actions: SyncAction[] = [];
  let unchanged = 0;

  for (const [uid, { issueId, event }] of desired) {
    const [actual, ...duplicates] = remoteByUid.get(uid) ?? [];
    if (!actual) {
      actions.push({ type: 'create', uid, issueId, desired: event });
      continue;
    }

    const changed = mapper.changedFields(event, actual);
    if (changed.length > 0) {
      actions.push({ type: 'update', uid, issueId, desired: event, actual, changed });
    } else {
      unchanged++;
    }
    for (const duplicate of duplicates) {
      actions.push({ type: 'delete', uid, actual: duplicate, reason: 'duplicate' });
    }
  }

  const absence = new Map<string, number>();
  for (const [uid, copies] of remoteByUid) {
    if (desired.has(uid) || held.has(uid)) continue;

    if (cleared.has(uid)) {
      for (const actual of copies) {
        actions.push({ type: 'delete', uid, actual, reason: 'cleared' });
      }
      continue;
    }

    if (listed.has(uid)) continue;

    const misses = previousAbsence.get(uid) ?? 0;
    if (misses >= graceRuns) {
      for (const actual of copies) {
        actions.push({ type: 'delete', uid, actual, reason: 'absent' });
      }
    } else {
      absence.set(uid, misses + 1);
    }
  }

  return { actions, unchanged, errors, absence };
}

export class SyncEngine {
  private source: IssueSource;
  private directory: CalendarDirectory;
  private client: CalendarClient;
  private mapper: EventMapper;
  private lock: KeyedLock;
  private absenceGraceRuns: number;
  private logger: Logger;
  private now: () => Date;

  private controllers = new Set<AbortController>();
  private absence = new Map<string, number>();
  private projectPhases = new Map<string, RunPhase>();
  private totals: SyncCounts = { created: 0, updated: 0, deleted: 0, skipped: 0 };
  private pendingErrors: SyncItemError[] = [];
  private lastRunAt: string | null = null;
  private lastCompletedAt: string | null = null;

  constructor(deps: SyncEngineDeps, options: SyncEngineOptions = {}) {
    this.source = deps.source;
    this.directory = deps.directory;
    this.client = deps.client;
    this.mapper = deps.mapper;
    this.lock = deps.lock ?? new KeyedLock();
    this.absenceGraceRuns = options.absenceGraceRuns ?? 0;
    this.logger = (options.logger ?? silentLogger).child('SyncEngine');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Reconcile every project, or only `projectId`
   *
   * Throws DataSourceUnavailable when the project list (or, for a single
   * project, its issue list) cannot be fetched. Failures of one project in a
   * multi-project run are recorded in the returned state instead.
   */
  async runFullReconciliation(projectId?: string): Promise<SyncState> {
    const controller = new AbortController();
    this.controllers.add(controller);
    this.lastRunAt = this.now().toISOString();
    this.pendingErrors = [];

    const state = emptySyncState();
    try {
      if (projectId) {
        const project = await this.fetchProject(projectId);
        mergeSyncStates(state, await this.reconcileProject(project, controller.signal));
      } else {
        const projects = await this.fetchProjects();
        this.logger.info(`Reconciling ${projects.length} project(s)`);

        const results = await Promise.allSettled(
          projects.map((project) => this.reconcileProject(project, controller.signal))
        );
        results.forEach((result, index) => {
          if (result.status === 'fulfilled') {
            mergeSyncStates(state, result.value);
          } else {
            const project = projects[index];
            this.logger.error(`Project ${project.identifier} failed: ${errorMessage(result.reason)}`);
            state.errors.push({ kind: errorKind(result.reason), error: errorMessage(result.reason), projectId: project.id });
          }
        });
      }
    } catch (error) {
      this.recordErrors([{ kind: errorKind(error), error: errorMessage(error), projectId }]);
      this.logger.error(`Full reconciliation failed: ${errorMessage(error)}`);
      throw error;
    } finally {
      this.controllers.delete(controller);
    }

    this.accumulate(state);
    this.recordErrors(state.errors);
    this.lastCompletedAt = this.now().toISOString();
    this.logger.info(`Full reconciliation done: ${formatCounts(state)}${state.aborted ? ' (aborted)' : ''}`);
    return state;
  }

  /**
   * Apply one webhook-triggered change. Errors are recorded in the returned
   * state; nothing here deletes an event unless the action is `deleted`.
   */
  async runSingleIssueReconciliation(
    issueId: string,
    action: WebhookAction,
    payload: SingleIssuePayload = {}
  ): Promise<SyncState> {
    const state = emptySyncState();
    const uid = issueUid(issueId);

    try {
      if (action === 'deleted') {
        await this.deleteIssueEvent(uid, payload.projectId, state);
      } else {
        await this.upsertIssueEvent(issueId, payload.projectId, state);
      }
    } catch (error) {
      this.logger.error(`Issue ${issueId} (${action}) failed: ${errorMessage(error)}`);
      if (error instanceof ValidationError) state.skipped++;
      state.errors.push({
        kind: errorKind(error),
        error: errorMessage(error),
        projectId: payload.projectId,
        issueId,
        uid,
      });
    }

    this.accumulate(state);
    this.recordErrors(state.errors);
    return state;
  }

  /**
   * Actions a full reconciliation would take, without applying them
   */
  async plan(projectId?: string): Promise<ProjectPlan[]> {
    const projects = projectId ? [await this.fetchProject(projectId)] : await this.fetchProjects();
    return Promise.all(projects.map((project) => this.planProject(project)));
  }

  async planProject(project: ProjectRef): Promise<ProjectPlan> {
    const listing = await this.listIssues(project);

    // A dry run never creates calendars
    const existing = await this.directory.find(project);
    const calendar = existing ?? { name: calendarName(project), url: '' };

    return this.lock.run(calendar.url || `plan:${project.id}`, async () => {
      const remote = existing ? await this.client.list(existing) : [];
      const diff = this.diff(project, listing, remote);
      return { project, calendar, actions: diff.actions, unchanged: diff.unchanged, errors: diff.errors };
    });
  }

  /**
   * Delete every engine-owned event from the project's calendar
   */
  async cleanProject(project: ProjectRef): Promise<SyncState> {
    const state = emptySyncState();
    const calendar = await this.directory.find(project);
    if (!calendar) return state;

    await this.lock.run(calendar.url, async () => {
      const remote = (await this.client.list(calendar)).filter((event) => isEngineUid(event.uid));
      for (const event of remote) {
        await this.applyAction(
          project,
          calendar,
          { type: 'delete', uid: event.uid, actual: event, reason: 'cleared' },
          state
        );
      }
    });

    this.logger.info(`Cleaned ${project.identifier}: ${state.deleted} event(s) removed`);
    return state;
  }

  /**
   * Stop in-flight full runs after their current item; false when none was running
   */
  cancel(): boolean {
    if (this.controllers.size === 0) return false;
    for (const controller of this.controllers) {
      controller.abort();
    }
    return true;
  }

  isRunning(): boolean {
    return this.controllers.size > 0;
  }

  getStatus(): SyncStatus {
    const projectPhases = Object.fromEntries(this.projectPhases);
    const active = [...this.projectPhases.values()].filter((phase) => ACTIVE_PHASES.includes(phase));

    let phase: SyncStatus['phase'] = 'IDLE';
    if (this.isRunning()) {
      // The least advanced project determines the run's phase
      phase = active.length > 0
        ? ACTIVE_PHASES[Math.min(...active.map((p) => ACTIVE_PHASES.indexOf(p)))]
        : 'FETCHING';
    }

    return {
      running: this.isRunning(),
      lastRunAt: this.lastRunAt,
      lastCompletedAt: this.lastCompletedAt,
      phase,
      projectPhases,
      totals: { ...this.totals },
      pendingErrors: [...this.pendingErrors],
    };
  }

  private async reconcileProject(project: ProjectRef, signal: AbortSignal): Promise<SyncState> {
    const state = emptySyncState();

    try {
      this.projectPhases.set(project.id, 'FETCHING');
      const listing = await this.listIssues(project);

      this.projectPhases.set(project.id, 'RESOLVING_CALENDAR');
      const calendar = await this.directory.resolve(project);

      await this.lock.run(calendar.url, async () => {
        this.projectPhases.set(project.id, 'DIFFING');
        const remote = await this.client.list(calendar);
        const diff = this.diff(project, listing, remote);
        this.commitAbsence(remote, diff.absence);

        state.errors.push(...diff.errors);
        state.skipped += diff.errors.length;

        this.projectPhases.set(project.id, 'APPLYING');
        for (let i = 0; i < diff.actions.length; i++) {
          if (signal.aborted) {
            state.skipped += diff.actions.length - i;
            state.aborted = true;
            this.logger.warn(`${project.identifier}: cancelled, ${diff.actions.length - i} action(s) left`);
            break;
          }
          await this.applyAction(project, calendar, diff.actions[i], state);
        }
      });
    } catch (error) {
      this.projectPhases.set(project.id, 'FAILED');
      throw error;
    }

    this.projectPhases.set(project.id, 'COMPLETED');
    this.logger.info(`${project.identifier}: ${formatCounts(state)}`);
    return state;
  }

  private diff(project: ProjectRef, listing: IssueListing, remote: RemoteEvent[]): DiffResult {
    return diffEvents({
      listing,
      remote,
      project,
      mapper: this.mapper,
      absenceGraceRuns: this.absenceGraceRuns,
      absence: this.absence,
    });
  }

  /**
   * Miss counters only survive for uids still waiting out their grace period
   */
  private commitAbsence(remote: RemoteEvent[], pending: Map<string, number>): void {
    for (const event of remote) {
      this.absence.delete(event.uid);
    }
    for (const [uid, misses] of pending) {
      this.absence.set(uid, misses);
    }
  }

  private async applyAction(
    project: ProjectRef,
    calendar: CalendarReference,
    action: SyncAction,
    state: SyncState
  ): Promise<void> {
    try {
      switch (action.type) {
        case 'create': {
          const result = await this.client.create(calendar, action.desired);
          state[result]++;
          this.logger.debug(`${result} ${action.uid}`);
          break;
        }
        case 'update':
          await this.client.update(action.actual, action.desired);
          state.updated++;
          this.logger.debug(`updated ${action.uid} (${action.changed.join(', ')})`);
          break;
        case 'delete':
          if (await this.client.deleteObject(action.actual)) {
            state.deleted++;
            this.logger.debug(`deleted ${action.uid} (${action.reason})`);
          }
          break;
      }
    } catch (error) {
      this.logger.warn(`${project.identifier}: ${action.type} ${action.uid} failed: ${errorMessage(error)}`);
      state.errors.push({
        kind: errorKind(error),
        error: errorMessage(error),
        projectId: project.id,
        issueId: action.type === 'delete' ? undefined : action.issueId,
        uid: action.uid,
      });
    }
  }

  private async upsertIssueEvent(issueId: string, projectId: string | undefined, state: SyncState): Promise<void> {
    if (!projectId) {
      throw new ValidationError(`Issue ${issueId}: project id is required to fetch the issue`);
    }

    const project = await this.source.getProject(projectId);
    if (!project) {
      throw new ValidationError(`Issue ${issueId}: project ${projectId} not found`);
    }

    const issue = await this.source.getIssue(project, issueId);
    if (!issue) {
      this.logger.warn(`Issue ${issueId} no longer exists; leaving its event to the next full run`);
      state.skipped++;
      return;
    }

    const event = this.mapper.transform(issue);
    if (!event) {
      this.logger.debug(`Issue ${issueId} has no target date; nothing to write`);
      state.skipped++;
      return;
    }

    const calendar = await this.directory.resolve(project);
    await this.lock.run(calendar.url, async () => {
      const remote = await this.client.list(calendar);
      const existing = remote.find((candidate) => candidate.uid === event.uid);
      if (existing && this.mapper.changedFields(event, existing).length === 0) {
        return;
      }

      const result = await this.client.upsert(calendar, event, remote);
      state[result]++;
      this.logger.info(`${result} ${event.uid} in "${calendar.name}"`);
    });
  }

  private async deleteIssueEvent(uid: string, projectId: string | undefined, state: SyncState): Promise<void> {
    const known = projectId ? await this.directory.find(projectId) : null;
    const calendars = known ? [known] : await this.directory.engineCalendars();

    for (const calendar of calendars) {
      await this.lock.run(calendar.url, async () => {
        if (await this.client.delete(calendar, uid)) {
          state.deleted++;
          this.logger.info(`deleted ${uid} from "${calendar.name}"`);
        }
      });
    }
  }

  private async fetchProjects(): Promise<ProjectRef[]> {
    try {
      return await this.source.listProjects();
    } catch (error) {
      if (error instanceof DataSourceUnavailable) throw error;
      throw new DataSourceUnavailable(`Could not list projects: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async fetchProject(projectId: string): Promise<ProjectRef> {
    let project: ProjectRef | null;
    try {
      project = await this.source.getProject(projectId);
    } catch (error) {
      throw new DataSourceUnavailable(`Could not fetch project ${projectId}: ${errorMessage(error)}`, { cause: error });
    }
    if (!project) {
      throw new DataSourceUnavailable(`Project ${projectId} not found`);
    }
    return project;
  }

  private async listIssues(project: ProjectRef): Promise<IssueListing> {
    try {
      return await this.source.listProjectIssues(project);
    } catch (error) {
      if (error instanceof DataSourceUnavailable) throw error;
      throw new DataSourceUnavailable(`Could not list issues of ${project.identifier}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private accumulate(state: SyncState): void {
    this.totals.created += state.created;
    this.totals.updated += state.updated;
    this.totals.deleted += state.deleted;
    this.totals.skipped += state.skipped;
  }

  private recordErrors(errors: SyncItemError[]): void {
    this.pendingErrors.push(...errors);
    if (this.pendingErrors.length > MAX_PENDING_ERRORS) {
      this.pendingErrors = this.pendingErrors.slice(-MAX_PENDING_ERRORS);
    }
  }
}

export function formatCounts(state: SyncCounts): string {
  return `+${state.created} ~${state.updated} -${state.deleted} skipped ${state.skipped}`;
}
