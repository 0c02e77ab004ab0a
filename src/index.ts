#!/usr/bin/env node

/**
 * Mock job backend - Entry Point
 *
 * Serves the `/v2/{endpointId}/...` job API backed by simulated execution.
 */

import { getConfig, printConfigInfo } from './config.js';
import { StatusService } from './application/services/StatusService.js';
import { ConfigError } from './core/errors.js';
import { JobRunner } from './infrastructure/runner/JobRunner.js';
import { JobStore } from './infrastructure/store/JobStore.js';
import { WebServer } from './infrastructure/web/WebServer.js';

async function main() {
  let webServer: WebServer | null = null;
  let jobRunner: JobRunner | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    const jobStore = new JobStore();
    jobRunner = new JobRunner(jobStore, config.runner);
    const statusService = new StatusService(jobStore, jobRunner);

    webServer = new WebServer(statusService, config.server.port, config.server.host, config.server.debug);
    await webServer.start();

    console.error('\n🚀 Server is running. Press Ctrl+C to stop.\n');

    // Setup graceful shutdown
    const shutdown = async (signal: string) => {
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      const aborted = jobRunner?.abortAll() ?? 0;
      if (aborted > 0) {
        console.error(`[JobRunner] Stopped ${aborted} running job(s)`);
      }

      if (webServer) {
        await webServer.stop();
      }

      console.error('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`\n❌ ${error.message}\n`);
      console.error('💡 Check your .env file and CLI arguments\n');
    } else {
      console.error('💥 Fatal error in main():', error);
    }

    // Cleanup on error
    jobRunner?.abortAll();
    if (webServer) {
      await webServer.stop();
    }

    process.exit(1);
  }
}

// Start the server
void main();
