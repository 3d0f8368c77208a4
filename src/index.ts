#!/usr/bin/env node

import { AuditLogger } from './audit/logger.js';
import { loadRuntimeConfig } from './config/runtime.js';
import { createActivityDemo, disposeActivityDemo, runActivityDemo } from './demo/driver.js';
import { serviceVersion } from './version.js';

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const auditLogger = new AuditLogger({
    ...config.audit,
    service: 'trigger-waitset',
    serviceVersion
  });

  const options = {
    capacity: config.capacity,
    ...config.demo,
    auditLogger
  };
  const context = createActivityDemo(options);
  installShutdownHandlers(() => {
    context.controller.abort();
  });

  console.error(
    `[trigger-waitset] running activity demo (capacity ${config.capacity}, ${
      config.demo.iterations === 0 ? 'until interrupted' : `${config.demo.iterations} rounds`
    })`
  );

  try {
    const summary = await runActivityDemo(context, options);
    console.error(
      `[trigger-waitset] stopped after ${summary.batches} batches, ${summary.dispatched} dispatched`
    );
  } finally {
    disposeActivityDemo(context);
    await auditLogger.flush();
  }
}

function installShutdownHandlers(stop: () => void): void {
  const shutdown = (signal: 'SIGINT' | 'SIGTERM'): void => {
    console.error(`[trigger-waitset] ${signal} received, shutting down`);
    stop();
  };

  process.once('SIGINT', () => {
    shutdown('SIGINT');
  });

  process.once('SIGTERM', () => {
    shutdown('SIGTERM');
  });
}

main().catch((error: unknown) => {
  console.error('[trigger-waitset] fatal error:', error);
  process.exit(1);
});
