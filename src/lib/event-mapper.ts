/**
 * One-way field mapper from tracker issues to all-day calendar events
 */

import { DateTime } from 'luxon';
import { ValidationError } from './errors';
import { CalendarEvent, EventStatus, Issue, IssuePriority, OwnedField, StateGroup } from './types';

export const UID_PREFIX = 'plane-issue-';
export const UID_DOMAIN = 'calplanebot';

const UID_PATTERN = new RegExp(`^${UID_PREFIX}(.+)@${UID_DOMAIN}$`);

const PRIORITY_COLORS: Record<IssuePriority, string | undefined> = {
  urgent: 'red',
  high: 'orange',
  medium: 'yellow',
  low: 'green',
  none: undefined,
};

// Completed and cancelled both render as CANCELLED; there is no separate COMPLETED status
const CLOSED_GROUPS: ReadonlySet<StateGroup> = new Set<StateGroup>(['completed', 'cancelled']);

const OWNED_FIELDS: OwnedField[] = ['summary', 'description', 'start', 'end', 'status', 'categories', 'url', 'color'];

export interface EventMapperOptions {
  /** Tracker web URL, used to link events back to their issue */
  baseUrl?: string;
  workspaceSlug?: string;
}

// Calendar servers hand back bare LF; CRLF in the source would never compare equal
function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

export function issueUid(issueId: string): string {
  return `${UID_PREFIX}${issueId}@${UID_DOMAIN}`;
}

/**
 * Issue id encoded in an engine-owned uid, or null for foreign events
 */
export function issueIdFromUid(uid: string): string | null {
  const match = UID_PATTERN.exec(uid);
  return match ? match[1] : null;
}

export function isEngineUid(uid: string): boolean {
  return issueIdFromUid(uid) !== null;
}

export class EventMapper {
  private readonly baseUrl?: string;
  private readonly workspaceSlug?: string;

  constructor(options: EventMapperOptions = {}) {
    this.baseUrl = options.baseUrl?.replace(/\/+$/, '');
    this.workspaceSlug = options.workspaceSlug;
  }

  /**
   * Convert an issue to its calendar event; null when the issue has no target date
   */
  transform(issue: Issue): CalendarEvent | null {
    if (issue.target_date === null || issue.target_date === undefined || issue.target_date === '') {
      return null;
    }

    const start = this.parseDate(issue.target_date, issue.id);
    const event: CalendarEvent = {
      uid: issueUid(issue.id),
      summary: `[${issue.sequence_id}] ${normalizeNewlines(issue.name)}`,
      description: this.buildDescription(issue),
      start: this.toISODate(start),
      end: this.toISODate(start.plus({ days: 1 })),
      status: this.statusFor(issue.state.group),
      categories: this.categoryNames(issue),
    };

    const url = this.issueUrl(issue);
    if (url) event.url = url;

    const color = PRIORITY_COLORS[issue.priority];
    if (color) event.color = color;

    return event;
  }

  statusFor(group: StateGroup): EventStatus {
    return CLOSED_GROUPS.has(group) ? 'CANCELLED' : 'CONFIRMED';
  }

  /**
   * Original description followed by a fixed-order metadata block
   */
  buildDescription(issue: Issue): string {
    const metadata = [
      `Priority: ${issue.priority}`,
      `State: ${normalizeNewlines(issue.state.name)}`,
      `Assignees: ${issue.assignees.map((a) => normalizeNewlines(a.display_name)).join(', ')}`,
      `Labels: ${this.categoryNames(issue).join(', ')}`,
      `Project: ${normalizeNewlines(issue.project.name)}`,
    ].join('\n');

    const body = normalizeNewlines(issue.description).trim();
    return body ? `${body}\n\n${metadata}` : metadata;
  }

  /**
   * Label names in input order; unnamed labels carry nothing a calendar can show
   */
  categoryNames(issue: Issue): string[] {
    return issue.labels.map((label) => normalizeNewlines(label.name)).filter((name) => name.length > 0);
  }

  issueUrl(issue: Issue): string | undefined {
    if (!this.baseUrl || !this.workspaceSlug) return undefined;
    return `${this.baseUrl}/${this.workspaceSlug}/projects/${issue.project.id}/issues/${issue.id}`;
  }

  /**
   * Owned fields whose values differ between the desired and the actual event
   */
  changedFields(desired: CalendarEvent, actual: CalendarEvent): OwnedField[] {
    return OWNED_FIELDS.filter((field) => {
      if (field === 'categories') {
        return (
          desired.categories.length !== actual.categories.length ||
          desired.categories.some((name, i) => name !== actual.categories[i])
        );
      }
      return (desired[field] ?? '') !== (actual[field] ?? '');
    });
  }

  private parseDate(value: string, issueId: string): DateTime {
    const parsed = DateTime.fromISO(value.trim(), { zone: 'utc', setZone: true });
    if (!parsed.isValid) {
      throw new ValidationError(`Issue ${issueId} has malformed target_date "${value}"`);
    }
    return parsed;
  }

  private toISODate(date: DateTime): string {
    return date.toFormat('yyyy-MM-dd');
  }
}
