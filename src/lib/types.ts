/**
 * Shared types for the issue → calendar sync engine
 */

export type StateGroup = 'backlog' | 'unstarted' | 'started' | 'completed' | 'cancelled';

export type IssuePriority = 'urgent' | 'high' | 'medium' | 'low' | 'none';

export interface IssueState {
  name: string;
  group: StateGroup;
}

export interface IssueAssignee {
  id: string;
  display_name: string;
}

export interface IssueLabel {
  id: string;
  name: string;
}

export interface ProjectRef {
  id: string;
  name: string;
  identifier: string;
}

export interface Issue {
  id: string;
  name: string;
  description: string;
  state: IssueState;
  target_date: string | null;
  start_date: string | null; // carried for completeness, never read by the mapper
  sequence_id: number;
  priority: IssuePriority;
  assignees: IssueAssignee[];
  labels: IssueLabel[];
  project: ProjectRef;
}

export type EventStatus = 'CONFIRMED' | 'CANCELLED';

/**
 * All-day calendar event owned by the engine. Dates are ISO calendar dates (YYYY-MM-DD),
 * `end` is exclusive.
 */
export interface CalendarEvent {
  uid: string;
  summary: string;
  description: string;
  start: string;
  end: string;
  status: EventStatus;
  categories: string[];
  url?: string;
  color?: string;
}

export interface CalendarReference {
  name: string;
  url: string;
}

/**
 * Event as it currently exists on the server
 */
export interface RemoteEvent extends CalendarEvent {
  href: string;
  etag?: string;
  data: string;
}

export type SyncAction =
  | { type: 'create'; uid: string; issueId: string; desired: CalendarEvent }
  | { type: 'update'; uid: string; issueId: string; desired: CalendarEvent; actual: RemoteEvent; changed: OwnedField[] }
  | { type: 'delete'; uid: string; actual: RemoteEvent; reason: 'cleared' | 'absent' | 'duplicate' };

export type OwnedField = 'summary' | 'description' | 'start' | 'end' | 'status' | 'categories' | 'url' | 'color';

export type WebhookAction = 'created' | 'updated' | 'deleted';

export type SyncErrorKind =
  | 'ValidationError'
  | 'AuthenticationError'
  | 'TransientIOError'
  | 'PermanentIOError'
  | 'ResourceConflictError'
  | 'DataSourceUnavailable'
  | 'ConfigError';

export interface SyncItemError {
  kind: SyncErrorKind;
  error: string;
  projectId?: string;
  issueId?: string;
  uid?: string;
}

export interface SyncState {
  created: number;
  updated: number;
  deleted: number;
  skipped: number;
  errors: SyncItemError[];
  aborted?: boolean;
}

export type RunPhase = 'FETCHING' | 'RESOLVING_CALENDAR' | 'DIFFING' | 'APPLYING' | 'COMPLETED' | 'FAILED';

export interface SyncCounts {
  created: number;
  updated: number;
  deleted: number;
  skipped: number;
}

export interface SyncStatus {
  running: boolean;
  lastRunAt: string | null;
  lastCompletedAt: string | null;
  phase: RunPhase | 'IDLE';
  projectPhases: Record<string, RunPhase>;
  totals: SyncCounts;
  pendingErrors: SyncItemError[];
}

export interface ProjectPlan {
  project: ProjectRef;
  calendar: CalendarReference;
  actions: SyncAction[];
  unchanged: number;
  errors: SyncItemError[];
}

export interface SingleIssuePayload {
  projectId?: string;
}

export function emptySyncState(): SyncState {
  return { created: 0, updated: 0, deleted: 0, skipped: 0, errors: [] };
}

export function mergeSyncStates(target: SyncState, source: SyncState): SyncState {
  target.created += source.created;
  target.updated += source.updated;
  target.deleted += source.deleted;
  target.skipped += source.skipped;
  target.errors.push(...source.errors);
  if (source.aborted) {
    target.aborted = true;
  }
  return target;
}
