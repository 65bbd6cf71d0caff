/**
 * iCalendar codec for engine-owned all-day events
 *
 * Only the properties the engine owns are read or written; everything else in a
 * stored object (alarms, client X- properties) passes through merge untouched.
 */

import ICAL from 'ical.js';
import { errorMessage, ValidationError } from './errors';
import { CalendarEvent, EventStatus } from './types';

type Component = InstanceType<typeof ICAL.Component>;

const PRODID = '-//plane-caldav-sync//EN';

/** Properties rewritten on every update, in the order they are written */
const OWNED_PROPERTIES = [
  'dtstamp',
  'summary',
  'description',
  'dtstart',
  'dtend',
  'duration',
  'status',
  'categories',
  'url',
  'color',
];

export type ParsedEvent = CalendarEvent;

function writeOwnedProperties(vevent: Component, event: CalendarEvent, now: Date): void {
  for (const name of OWNED_PROPERTIES) {
    vevent.removeAllProperties(name);
  }

  vevent.addPropertyWithValue('dtstamp', ICAL.Time.fromJSDate(now, true));
  vevent.addPropertyWithValue('summary', event.summary);
  if (event.description) {
    vevent.addPropertyWithValue('description', event.description);
  }
  vevent.addPropertyWithValue('dtstart', ICAL.Time.fromDateString(event.start));
  vevent.addPropertyWithValue('dtend', ICAL.Time.fromDateString(event.end));
  vevent.addPropertyWithValue('status', event.status);

  if (event.categories.length > 0) {
    const categories = new ICAL.Property('categories');
    categories.setValues(event.categories);
    vevent.addProperty(categories);
  }
  if (event.url) {
    vevent.addPropertyWithValue('url', event.url);
  }
  if (event.color) {
    vevent.addPropertyWithValue('color', event.color);
  }
}

/**
 * Render a calendar object holding a single all-day event
 */
export function serializeEvent(event: CalendarEvent, now: Date = new Date()): string {
  const calendar = new ICAL.Component('vcalendar');
  calendar.addPropertyWithValue('version', '2.0');
  calendar.addPropertyWithValue('prodid', PRODID);
  calendar.addPropertyWithValue('calscale', 'GREGORIAN');

  const vevent = new ICAL.Component('vevent');
  vevent.addPropertyWithValue('uid', event.uid);
  writeOwnedProperties(vevent, event, now);
  calendar.addSubcomponent(vevent);

  return calendar.toString();
}

function parseCalendar(ics: string): Component {
  try {
    return ICAL.Component.fromString(ics);
  } catch (error) {
    throw new ValidationError(`Unparsable calendar object: ${errorMessage(error)}`, { cause: error });
  }
}

function textValue(component: Component, name: string): string {
  const value: unknown = component.getFirstPropertyValue(name);
  return typeof value === 'string' ? value : '';
}

function optionalText(component: Component, name: string): string | undefined {
  const value = textValue(component, name).trim();
  return value || undefined;
}

function dateValue(component: Component, name: string): string {
  const value: unknown = component.getFirstPropertyValue(name);
  if (value instanceof ICAL.Time) return value.toString().slice(0, 10);
  return typeof value === 'string' ? value.slice(0, 10) : '';
}

function parseStatus(value: string): EventStatus {
  return value.trim().toUpperCase() === 'CANCELLED' ? 'CANCELLED' : 'CONFIRMED';
}

function categoryNames(vevent: Component): string[] {
  return vevent
    .getAllProperties('categories')
    .flatMap((property) => property.getValues().map((value: unknown) => (typeof value === 'string' ? value : '')))
    .filter((name) => name.length > 0);
}

/**
 * Read the owned fields of every top-level VEVENT
 *
 * @throws ValidationError when the payload is not iCalendar
 */
export function parseEvents(ics: string): ParsedEvent[] {
  const events: ParsedEvent[] = [];

  for (const vevent of parseCalendar(ics).getAllSubcomponents('vevent')) {
    const uid = textValue(vevent, 'uid').trim();
    if (!uid) continue;

    events.push({
      uid,
      summary: textValue(vevent, 'summary'),
      description: textValue(vevent, 'description'),
      start: dateValue(vevent, 'dtstart'),
      end: dateValue(vevent, 'dtend'),
      status: parseStatus(textValue(vevent, 'status')),
      categories: categoryNames(vevent),
      url: optionalText(vevent, 'url'),
      color: optionalText(vevent, 'color'),
    });
  }

  return events;
}

/**
 * Rewrite the owned properties of the event with the same UID, keeping every
 * other property and nested component (alarms, X- properties) as it was.
 * A payload without that event, or one that does not parse, is replaced.
 */
export function mergeOwnedFields(existingIcs: string, event: CalendarEvent, now: Date = new Date()): string {
  let calendar: Component;
  try {
    calendar = parseCalendar(existingIcs);
  } catch (error) {
    if (error instanceof ValidationError) return serializeEvent(event, now);
    throw error;
  }

  const vevent = calendar
    .getAllSubcomponents('vevent')
    .find((candidate) => textValue(candidate, 'uid').trim() === event.uid);
  if (!vevent) {
    return serializeEvent(event, now);
  }

  writeOwnedProperties(vevent, event, now);
  return calendar.toString();
}
