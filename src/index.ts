/**
 * Plane → CalDAV Sync - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export { EventMapper, issueUid, issueIdFromUid, isEngineUid } from './lib/event-mapper';
export { CalendarDirectory, calendarName, calendarSlug, isEngineCalendar } from './lib/calendar-directory';
export { CalDAVClient } from './lib/caldav-client';
export type { CalendarClient, DavConnection, NewCalendar, UpsertResult } from './lib/caldav-client';
export { PlaneClient, stripHtml } from './lib/plane-client';
export type { IssueSource, IssueListing } from './lib/plane-client';
export { SyncEngine, diffEvents, formatCounts } from './lib/sync-engine';
export { WebhookProcessor, verifySignature, parseWebhookPayload, SIGNATURE_HEADER } from './lib/webhook-processor';
export { SyncScheduler } from './lib/scheduler';
export { PlanViewer, descriptionDiff } from './lib/plan-viewer';
export { createRuntime } from './lib/runtime';
export type { Runtime } from './lib/runtime';
export { loadConfig, describeConfig } from './lib/config';
export type { AppConfig } from './lib/config';
export { createLogger, silentLogger } from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';
export { DEFAULT_RETRY_POLICY, computeBackoff, executeWithRetry, withTimeout } from './lib/retry-policy';
export type { RetryPolicy } from './lib/retry-policy';
export { TtlCache } from './lib/ttl-cache';
export { KeyedLock } from './lib/keyed-lock';
export { serializeEvent, parseEvents, mergeOwnedFields } from './lib/ical';
export * from './lib/errors';

export * from './lib/types';
