/**
 * CalDAV protocol client
 *
 * Wraps the subset of the tsdav DAVClient the engine needs. Every call runs
 * under the retry policy with its own timeout, and a timed-out attempt aborts
 * its request before the next one is sent. Event payloads are written by the
 * iCalendar codec so that only engine-owned properties ever change.
 */

import type { DAVAccount, DAVCalendar, DAVClient } from 'tsdav';
import {
  classifyStatus,
  errorMessage,
  PermanentIOError,
  ResourceConflictError,
  toSyncError,
  ValidationError,
} from './errors';
import { mergeOwnedFields, parseEvents, serializeEvent } from './ical';
import { Logger, silentLogger } from './logger';
import { DEFAULT_RETRY_POLICY, executeWithRetry, RetryPolicy, sleep, withTimeout } from './retry-policy';
import { CalendarEvent, CalendarReference, RemoteEvent } from './types';

/**
 * The DAVClient methods the engine calls; tests provide an in-process implementation
 */
export type DavConnection = Pick<
  DAVClient,
  | 'login'
  | 'fetchCalendars'
  | 'makeCalendar'
  | 'fetchCalendarObjects'
  | 'createCalendarObject'
  | 'updateCalendarObject'
  | 'deleteCalendarObject'
> & { account?: DAVAccount };

export interface NewCalendar {
  name: string;
  /** Last path segment of the collection, below the account's calendar home */
  slug: string;
  description?: string;
}

export type UpsertResult = 'created' | 'updated';

export interface CalendarClient {
  listCalendars(): Promise<CalendarReference[]>;
  createCalendar(calendar: NewCalendar): Promise<CalendarReference>;
  list(calendar: CalendarReference): Promise<RemoteEvent[]>;
  create(calendar: CalendarReference, event: CalendarEvent): Promise<UpsertResult>;
  update(remote: RemoteEvent, event: CalendarEvent): Promise<void>;
  upsert(calendar: CalendarReference, event: CalendarEvent, known?: RemoteEvent[]): Promise<UpsertResult>;
  delete(calendar: CalendarReference, uid: string, known?: RemoteEvent[]): Promise<boolean>;
  deleteObject(remote: RemoteEvent): Promise<boolean>;
}

export interface CalDAVClientOptions {
  retryPolicy?: RetryPolicy;
  requestTimeoutMs?: number;
  connectTimeoutMs?: number;
  /** Used as calendar home when the server does not report one */
  serverUrl?: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

// Statuses a server answers MKCALENDAR with when the collection is already there
const ALREADY_EXISTS = new Set([405, 409, 412]);

const SCHEDULING_COLLECTION = /\/(inbox|outbox)\/?$/i;

export class CalDAVClient implements CalendarClient {
  private connection: DavConnection;
  private retryPolicy: RetryPolicy;
  private requestTimeoutMs: number;
  private connectTimeoutMs: number;
  private serverUrl?: string;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;
  private now: () => Date;
  private loginPromise: Promise<void> | null = null;

  constructor(connection: DavConnection, options: CalDAVClientOptions = {}) {
    this.connection = connection;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.serverUrl = options.serverUrl;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  async listCalendars(): Promise<CalendarReference[]> {
    await this.connect();
    const calendars = await this.request('PROPFIND calendars', (signal) =>
      this.connection.fetchCalendars({ fetchOptions: { signal } })
    );

    return calendars
      .filter((calendar) => !SCHEDULING_COLLECTION.test(calendar.url))
      .map((calendar) => ({ name: displayName(calendar), url: calendar.url }));
  }

  /**
   * MKCALENDAR under the account home; an existing collection counts as success
   */
  async createCalendar(calendar: NewCalendar): Promise<CalendarReference> {
    await this.connect();
    const url = new URL(`${encodeURIComponent(calendar.slug)}/`, this.calendarHome()).href;
    const label = `MKCALENDAR ${url}`;

    const props = {
      displayname: calendar.name,
      ...(calendar.description ? { 'c:calendar-description': calendar.description } : {}),
    };

    const responses = await this.request(label, async (signal) => {
      const result = await this.connection.makeCalendar({ url, props, fetchOptions: { signal } });
      const failed = result.find((response) => !response.ok && !ALREADY_EXISTS.has(response.status));
      if (failed) throw classifyStatus(failed.status, `${label}: HTTP ${failed.status}`);
      return result;
    });

    if (responses.some((response) => ALREADY_EXISTS.has(response.status))) {
      this.logger.debug(`Calendar already exists at ${url}`);
    } else {
      this.logger.info(`Created calendar "${calendar.name}" at ${url}`);
    }

    return { name: calendar.name, url };
  }

  /**
   * Every event currently stored in the calendar, one entry per (object, uid)
   */
  async list(calendar: CalendarReference): Promise<RemoteEvent[]> {
    await this.connect();
    const objects = await this.request(`REPORT ${calendar.url}`, (signal) =>
      this.connection.fetchCalendarObjects({ calendar: toDavCalendar(calendar), fetchOptions: { signal } })
    );

    const events: RemoteEvent[] = [];
    for (const object of objects) {
      const data: unknown = object.data;
      if (typeof data !== 'string') continue;

      let parsedEvents: CalendarEvent[];
      try {
        parsedEvents = parseEvents(data);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        this.logger.warn(`Skipping ${object.url}: ${error.message}`);
        continue;
      }

      const seen = new Set<string>();
      for (const parsed of parsedEvents) {
        // Recurrence overrides share the uid of their master
        if (seen.has(parsed.uid)) continue;
        seen.add(parsed.uid);
        events.push({ ...parsed, href: object.url, etag: object.etag, data });
      }
    }

    return events;
  }

  /**
   * PUT a new object; a conflicting existing object is updated in place instead
   */
  async create(calendar: CalendarReference, event: CalendarEvent): Promise<UpsertResult> {
    await this.connect();
    const label = `PUT ${event.uid}`;

    try {
      await this.request(label, async (signal) => {
        const response = await this.connection.createCalendarObject({
          calendar: toDavCalendar(calendar),
          filename: `${event.uid}.ics`,
          iCalString: serializeEvent(event, this.now()),
          fetchOptions: { signal },
        });
        assertOk(response, label);
      });
      return 'created';
    } catch (error) {
      if (!(error instanceof ResourceConflictError)) throw error;

      this.logger.debug(`${label}: object already exists, updating instead`);
      const existing = (await this.list(calendar)).find((remote) => remote.uid === event.uid);
      if (!existing) throw error;

      await this.update(existing, event);
      return 'updated';
    }
  }

  async update(remote: RemoteEvent, event: CalendarEvent): Promise<void> {
    await this.connect();
    const label = `PUT ${remote.href}`;
    const data = mergeOwnedFields(remote.data, event, this.now());

    await this.request(label, async (signal) => {
      const response = await this.connection.updateCalendarObject({
        calendarObject: { url: remote.href, etag: remote.etag, data },
        fetchOptions: { signal },
      });
      assertOk(response, label);
    });
  }

  async upsert(calendar: CalendarReference, event: CalendarEvent, known?: RemoteEvent[]): Promise<UpsertResult> {
    const events = known ?? (await this.list(calendar));
    const existing = events.find((remote) => remote.uid === event.uid);

    if (!existing) {
      return this.create(calendar, event);
    }
    await this.update(existing, event);
    return 'updated';
  }

  /**
   * Remove every object carrying `uid`; false when there was nothing to remove
   */
  async delete(calendar: CalendarReference, uid: string, known?: RemoteEvent[]): Promise<boolean> {
    const events = known ?? (await this.list(calendar));
    let removed = false;

    for (const remote of events.filter((candidate) => candidate.uid === uid)) {
      if (await this.deleteObject(remote)) removed = true;
    }

    return removed;
  }

  async deleteObject(remote: RemoteEvent): Promise<boolean> {
    await this.connect();
    const label = `DELETE ${remote.href}`;

    return this.request(label, async (signal) => {
      const response = await this.connection.deleteCalendarObject({
        calendarObject: { url: remote.href, etag: remote.etag },
        fetchOptions: { signal },
      });
      if (response.status === 404 || response.status === 410) return false;
      assertOk(response, label);
      return true;
    });
  }

  private async connect(): Promise<void> {
    if (!this.loginPromise) {
      this.loginPromise = this.request('CalDAV login', () => this.connection.login(), this.connectTimeoutMs);
      this.loginPromise.catch(() => {
        this.loginPromise = null;
      });
    }
    await this.loginPromise;
  }

  private calendarHome(): string {
    const home = this.connection.account?.homeUrl ?? this.serverUrl;
    if (!home) {
      throw new PermanentIOError('CalDAV discovery: server did not report a calendar home');
    }
    return home.endsWith('/') ? home : `${home}/`;
  }

  /**
   * Run one DAV call under the retry policy; each attempt gets a signal that is
   * aborted when that attempt times out
   */
  private request<T>(
    label: string,
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs = this.requestTimeoutMs
  ): Promise<T> {
    return executeWithRetry(
      this.retryPolicy,
      async () => {
        const controller = new AbortController();
        try {
          return await withTimeout(operation(controller.signal), timeoutMs, label, controller);
        } catch (error) {
          throw toSyncError(error, label);
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

function assertOk(response: Response, label: string): void {
  if (!response.ok) {
    throw classifyStatus(response.status, `${label}: HTTP ${response.status}`);
  }
}

function toDavCalendar(calendar: CalendarReference): DAVCalendar {
  return { url: calendar.url, displayName: calendar.name };
}

function displayName(calendar: DAVCalendar): string {
  if (typeof calendar.displayName === 'string' && calendar.displayName.trim()) {
    return calendar.displayName;
  }
  const segments = calendar.url.replace(/\/+$/, '').split('/');
  return decodeURIComponent(segments[segments.length - 1] ?? calendar.url);
}
