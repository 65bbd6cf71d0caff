/**
 * Project → calendar resolution with a TTL cache
 */

import { CalendarClient } from './caldav-client';
import { Logger, silentLogger } from './logger';
import { TtlCache } from './ttl-cache';
import { CalendarReference, ProjectRef } from './types';

export const CALENDAR_NAME_PREFIX = 'Plane: ';
export const CALENDAR_SLUG_PREFIX = 'plane-';

export interface CalendarDirectoryOptions {
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
}

export function calendarName(project: ProjectRef): string {
  return `${CALENDAR_NAME_PREFIX}${project.name}`;
}

export function calendarSlug(project: ProjectRef): string {
  return `${CALENDAR_SLUG_PREFIX}${project.id}`;
}

function lastSegment(url: string): string {
  const segments = url.replace(/\/+$/, '').split('/');
  return segments[segments.length - 1] ?? '';
}

function matchCalendar(calendars: CalendarReference[], slug: string, name?: string): CalendarReference | undefined {
  return (
    calendars.find((candidate) => lastSegment(candidate.url) === slug) ??
    (name === undefined ? undefined : calendars.find((candidate) => candidate.name === name))
  );
}

/**
 * Whether a calendar looks like one the engine created
 */
export function isEngineCalendar(calendar: CalendarReference): boolean {
  return calendar.name.startsWith(CALENDAR_NAME_PREFIX) || lastSegment(calendar.url).startsWith(CALENDAR_SLUG_PREFIX);
}

export class CalendarDirectory {
  private client: CalendarClient;
  private cache: TtlCache<string, CalendarReference>;
  private pending = new Map<string, Promise<CalendarReference>>();
  private logger: Logger;

  constructor(client: CalendarClient, options: CalendarDirectoryOptions = {}) {
    this.client = client;
    this.cache = new TtlCache(options.ttlMs ?? 3_600_000, options.now);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Calendar for the project, creating it on the server when missing
   */
  async resolve(project: ProjectRef): Promise<CalendarReference> {
    const cached = this.cache.get(project.id);
    if (cached) return cached;

    // Concurrent resolves of one project share a single lookup
    const inFlight = this.pending.get(project.id);
    if (inFlight) return inFlight;

    const lookup = this.lookup(project).finally(() => {
      this.pending.delete(project.id);
    });
    this.pending.set(project.id, lookup);
    return lookup;
  }

  /**
   * Existing calendar of a project, without creating one; matched by collection path
   * (and by display name when the project record is known)
   */
  async find(project: ProjectRef | string): Promise<CalendarReference | null> {
    const projectId = typeof project === 'string' ? project : project.id;
    const cached = this.cache.get(projectId);
    if (cached) return cached;

    const calendars = await this.client.listCalendars();
    const found = matchCalendar(
      calendars,
      `${CALENDAR_SLUG_PREFIX}${projectId}`,
      typeof project === 'string' ? undefined : calendarName(project)
    );

    if (!found) return null;
    this.cache.set(projectId, found);
    return found;
  }

  /**
   * Every calendar on the server that the engine created
   */
  async engineCalendars(): Promise<CalendarReference[]> {
    const calendars = await this.client.listCalendars();
    return calendars.filter(isEngineCalendar);
  }

  invalidate(project: ProjectRef | string): void {
    this.cache.delete(typeof project === 'string' ? project : project.id);
  }

  clear(): void {
    this.cache.clear();
  }

  private async lookup(project: ProjectRef): Promise<CalendarReference> {
    const slug = calendarSlug(project);
    const name = calendarName(project);
    const calendars = await this.client.listCalendars();

    // The collection path survives a project rename; the display name is the fallback
    let calendar = matchCalendar(calendars, slug, name);

    if (!calendar) {
      this.logger.info(`No calendar for project ${project.identifier}, creating "${name}"`);
      calendar = await this.client.createCalendar({
        name,
        slug,
        description: `Issues of ${project.name} (${project.identifier})`,
      });
    }

    this.cache.set(project.id, calendar);
    return calendar;
  }
}
