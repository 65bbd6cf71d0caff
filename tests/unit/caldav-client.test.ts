import { CalDAVClient } from '../../src/lib/caldav-client';
import { PermanentIOError, TransientIOError } from '../../src/lib/errors';
import { parseEvents, serializeEvent } from '../../src/lib/ical';
import { DEFAULT_RETRY_POLICY } from '../../src/lib/retry-policy';
import { CalendarEvent, CalendarReference } from '../../src/lib/types';
import { FakeDavServer, HOME_URL } from '../helpers/fake-dav-server';

const NOW = new Date('2025-01-01T12:00:00Z');

const EVENT: CalendarEvent = {
  uid: 'plane-issue-I1@calplanebot',
  summary: '[7] Fix bug',
  description: 'Priority: none',
  start: '2025-01-10',
  end: '2025-01-11',
  status: 'CONFIRMED',
  categories: [],
};

describe('CalDAVClient', () => {
  let server: FakeDavServer;
  let client: CalDAVClient;
  let calendar: CalendarReference;

  beforeEach(() => {
    server = new FakeDavServer();
    client = new CalDAVClient(server, {
      retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
      requestTimeoutMs: 20,
      connectTimeoutMs: 20,
      sleep: async () => undefined,
      now: () => NOW,
    });
    calendar = { name: 'Plane: Website', url: server.addCalendar('plane-P1', 'Plane: Website') };
  });

  describe('listCalendars', () => {
    it('should list calendar collections without scheduling inboxes', async () => {
      await expect(client.listCalendars()).resolves.toEqual([
        { name: 'Plane: Website', url: 'https://dav.test/calendars/user/plane-P1/' },
      ]);
    });

    it('should log in once', async () => {
      await client.listCalendars();
      await client.listCalendars();

      expect(server.calls.login).toBe(1);
    });

    it('should retry the login after a failed attempt', async () => {
      server.inject('login', { kind: 'throw', error: Object.assign(new Error('Unauthorized'), { status: 401 }) });

      await expect(client.listCalendars()).rejects.toThrow(new PermanentIOError('CalDAV login: HTTP 401'));
      await expect(client.listCalendars()).resolves.toHaveLength(1);
      expect(server.calls.login).toBe(2);
    });

    it('should retry transient failures', async () => {
      server.inject('fetchCalendars', { kind: 'throw', error: Object.assign(new Error('Unavailable'), { status: 503 }) });

      await expect(client.listCalendars()).resolves.toHaveLength(1);
      expect(server.calls.fetchCalendars).toBe(2);
    });
  });

  describe('createCalendar', () => {
    it('should create the collection below the calendar home', async () => {
      const created = await client.createCalendar({ name: 'Plane: Backend', slug: 'plane-P2', description: 'Issues' });

      expect(created).toEqual({ name: 'Plane: Backend', url: `${HOME_URL}plane-P2/` });
      expect(server.calendarUrls()).toContain(`${HOME_URL}plane-P2/`);
    });

    it('should accept a collection that already exists', async () => {
      await expect(client.createCalendar({ name: 'Plane: Website', slug: 'plane-P1' })).resolves.toEqual(calendar);
      expect(server.calls.makeCalendar).toBe(1);
    });

    it('should fail on a rejected MKCALENDAR', async () => {
      server.failWith('makeCalendar', 403);

      await expect(client.createCalendar({ name: 'Plane: Backend', slug: 'plane-P2' })).rejects.toThrow(
        new PermanentIOError(`MKCALENDAR ${HOME_URL}plane-P2/: HTTP 403`)
      );
    });
  });

  describe('create', () => {
    it('should write the event as its own object', async () => {
      await expect(client.create(calendar, EVENT)).resolves.toBe('created');

      expect(server.objects(calendar.url)).toEqual([
        { url: `${calendar.url}plane-issue-I1@calplanebot.ics`, data: serializeEvent(EVENT, NOW) },
      ]);
    });

    it('should succeed when the first two attempts time out', async () => {
      server.hang('createCalendarObject', 2);

      await expect(client.create(calendar, EVENT)).resolves.toBe('created');
      expect(server.calls.createCalendarObject).toBe(3);
      expect(server.objects(calendar.url)).toHaveLength(1);
    });

    it('should abort the request of an attempt that timed out', async () => {
      server.hang('createCalendarObject', 1);
      const firstAttempt = new Promise<AbortSignal | undefined>((resolve) => {
        setImmediate(() => resolve(server.signals.createCalendarObject));
      });

      await expect(client.create(calendar, EVENT)).resolves.toBe('created');

      const hungSignal = await firstAttempt;
      expect(hungSignal?.aborted).toBe(true);
      expect(server.signals.createCalendarObject).not.toBe(hungSignal);
      expect(server.signals.createCalendarObject?.aborted).toBe(false);
    });

    it('should give up after the last attempt times out', async () => {
      server.hang('createCalendarObject', 3);

      await expect(client.create(calendar, EVENT)).rejects.toBeInstanceOf(TransientIOError);
      expect(server.calls.createCalendarObject).toBe(3);
      expect(server.objects(calendar.url)).toEqual([]);
    });

    it('should not retry a permanent failure', async () => {
      server.failWith('createCalendarObject', 403);

      await expect(client.create(calendar, EVENT)).rejects.toThrow(
        new PermanentIOError('PUT plane-issue-I1@calplanebot: HTTP 403')
      );
      expect(server.calls.createCalendarObject).toBe(1);
    });

    it('should update the existing object when the create conflicts', async () => {
      server.putObject(calendar.url, 'plane-issue-I1@calplanebot.ics', serializeEvent({ ...EVENT, summary: 'Old' }, NOW));

      await expect(client.create(calendar, EVENT)).resolves.toBe('updated');

      const [stored] = server.objects(calendar.url);
      expect(parseEvents(stored.data)[0].summary).toBe('[7] Fix bug');
      expect(server.objects(calendar.url)).toHaveLength(1);
    });
  });

  describe('list', () => {
    it('should return every stored event with its object location', async () => {
      const href = server.putObject(calendar.url, 'a.ics', serializeEvent(EVENT, NOW));
      server.putObject(calendar.url, 'b.ics', serializeEvent({ ...EVENT, uid: 'meeting@example.com', summary: 'Standup' }, NOW));

      const events = await client.list(calendar);

      expect(events.map((event) => [event.uid, event.href])).toEqual([
        ['plane-issue-I1@calplanebot', href],
        ['meeting@example.com', `${calendar.url}b.ics`],
      ]);
      expect(events[0]).toMatchObject({ ...EVENT, etag: '"etag-1"' });
    });

    it('should skip objects that are not iCalendar', async () => {
      server.putObject(calendar.url, 'broken.ics', 'not a calendar');
      server.putObject(calendar.url, 'a.ics', serializeEvent(EVENT, NOW));

      const events = await client.list(calendar);

      expect(events.map((event) => event.uid)).toEqual(['plane-issue-I1@calplanebot']);
    });
  });

  describe('upsert', () => {
    it('should create when the uid is not in the calendar', async () => {
      await expect(client.upsert(calendar, EVENT)).resolves.toBe('created');
    });

    it('should update the object that carries the uid', async () => {
      server.putObject(calendar.url, 'legacy-name.ics', serializeEvent({ ...EVENT, summary: 'Old' }, NOW));

      await expect(client.upsert(calendar, EVENT)).resolves.toBe('updated');
      expect(server.calls.createCalendarObject).toBe(0);
      expect(parseEvents(server.objects(calendar.url)[0].data)[0].summary).toBe('[7] Fix bug');
    });
  });

  describe('delete', () => {
    it('should report whether something was removed', async () => {
      await client.create(calendar, EVENT);

      await expect(client.delete(calendar, EVENT.uid)).resolves.toBe(true);
      await expect(client.delete(calendar, EVENT.uid)).resolves.toBe(false);
      expect(server.objects(calendar.url)).toEqual([]);
    });

    it('should treat an object that is already gone as not removed', async () => {
      await client.create(calendar, EVENT);
      const [remote] = await client.list(calendar);
      await client.deleteObject(remote);

      await expect(client.deleteObject(remote)).resolves.toBe(false);
    });
  });
});
