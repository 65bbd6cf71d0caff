/**
 * Production object graph
 */

import { DAVClient } from 'tsdav';
import { CalDAVClient } from './caldav-client';
import { CalendarDirectory } from './calendar-directory';
import { AppConfig } from './config';
import { isRetryable } from './errors';
import { EventMapper } from './event-mapper';
import { KeyedLock } from './keyed-lock';
import { Logger } from './logger';
import { PlaneClient } from './plane-client';
import { RetryPolicy } from './retry-policy';
import { SyncScheduler } from './scheduler';
import { SyncEngine } from './sync-engine';
import { WebhookProcessor } from './webhook-processor';

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  plane: PlaneClient;
  caldav: CalDAVClient;
  directory: CalendarDirectory;
  engine: SyncEngine;
  webhooks: WebhookProcessor;
  scheduler: SyncScheduler;
}

export function createRuntime(config: AppConfig, logger: Logger): Runtime {
  const retryPolicy: RetryPolicy = { ...config.retry, isRetryable };

  const connection = new DAVClient({
    serverUrl: config.caldav.url,
    credentials: {
      username: config.caldav.username,
      password: config.caldav.password,
    },
    authMethod: config.caldav.authType === 'digest' ? 'Digest' : 'Basic',
    defaultAccountType: 'caldav',
  });

  const caldav = new CalDAVClient(connection, {
    retryPolicy,
    requestTimeoutMs: config.timeouts.requestMs,
    connectTimeoutMs: config.timeouts.connectMs,
    serverUrl: config.caldav.url,
    logger: logger.child('CalDAV'),
  });

  const plane = new PlaneClient({
    baseUrl: config.plane.baseUrl,
    apiToken: config.plane.apiToken,
    workspaceSlug: config.plane.workspaceSlug,
    requestTimeoutMs: config.timeouts.requestMs,
    retryPolicy,
    logger: logger.child('Plane'),
  });

  const directory = new CalendarDirectory(caldav, {
    ttlMs: config.sync.cacheTtlMs,
    logger: logger.child('Directory'),
  });

  const mapper = new EventMapper({
    baseUrl: config.plane.baseUrl,
    workspaceSlug: config.plane.workspaceSlug,
  });

  const engine = new SyncEngine(
    { source: plane, directory, client: caldav, mapper, lock: new KeyedLock() },
    { absenceGraceRuns: config.sync.absenceGraceRuns, logger }
  );

  const webhooks = new WebhookProcessor(engine, {
    secret: config.plane.webhookSecret,
    logger,
  });

  const scheduler = new SyncScheduler(engine, {
    intervalMs: config.sync.intervalMs,
    runOnStartup: config.sync.runOnStartup,
    logger,
  });

  return { config, logger, plane, caldav, directory, engine, webhooks, scheduler };
}
