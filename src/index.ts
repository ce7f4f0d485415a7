#!/usr/bin/env node

/**
 * Maintenance Desk
 *
 * Terminal client for reviewing submitted maintenance tickets and
 * cycling their status against the ticket backend.
 */

import { render } from 'ink';
import { createElement } from 'react';

// Configuration
import { Configuration } from './config/Configuration.js';

// Infrastructure
import { Logger } from './infrastructure/logging/Logger.js';
import { TicketApiClient } from './infrastructure/http/TicketApiClient.js';

// Core / application
import { TicketService } from './core/services/TicketService.js';
import { SessionController } from './application/SessionController.js';
import { App } from './ui/App.js';
import { formatError } from './utils/errors.js';

// Constants
import { CLIENT_NAME, CLIENT_VERSION } from './constants.js';

async function main(): Promise<number> {
  let config: Configuration;
  try {
    config = new Configuration();
  } catch (error) {
    process.stderr.write(`${formatError(error, 'Failed to load configuration')}\n`);
    return 1;
  }

  const logger = new Logger(config.logLevel, config.logFilePath ?? undefined);
  logger.info(`${CLIENT_NAME} v${CLIENT_VERSION} starting`);
  for (const line of config.summary()) {
    logger.debug(`[Config] ${line}`);
  }

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    logger.error('An interactive terminal is required. Run this from a TTY.');
    return 1;
  }

  const apiClient = new TicketApiClient({
    apiUrl: config.apiUrl,
    timeoutMs: config.apiTimeoutMs,
    logger: logger.child('API')
  });
  const service = new TicketService(apiClient, logger.child('Tickets'));

  // ============================================================================
  // Startup fetch (fatal on failure)
  // ============================================================================

  let controller: SessionController;
  try {
    const session = await service.loadSession();
    controller = new SessionController(service, session, {
      logger: logger.child('Session'),
      updateFailurePolicy: config.updateFailurePolicy
    });
  } catch (error) {
    logger.error(formatError(error, 'Failed to load tickets'));
    return 1;
  }

  // ============================================================================
  // Interactive session
  // ============================================================================

  logger.setConsoleOutput(false);
  try {
    const instance = render(createElement(App, { controller }));
    await instance.waitUntilExit();
  } finally {
    logger.setConsoleOutput(true);
  }

  const { pendingUpdates } = controller.getSnapshot();
  if (pendingUpdates > 0) {
    logger.info(`Waiting for ${pendingUpdates} status update(s) to finish`);
  }
  await controller.whenIdle();

  const { failedUpdates } = controller.getSnapshot();
  if (failedUpdates > 0) {
    const where = logger.filePath ? ` See ${logger.filePath}.` : '';
    logger.warn(`${failedUpdates} status update(s) failed during this session.${where}`);
  }

  return 0;
}

main()
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${formatError(error, 'Unexpected error')}\n`);
    process.exitCode = 1;
  });
