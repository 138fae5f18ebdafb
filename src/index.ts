#!/usr/bin/env node
/**
 * iline-relay - Main entry point
 */

import { CLI } from './cli';

export async function main(args: string[]): Promise<number> {
  const cli = new CLI();
  return await cli.run(args);
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

// Export for embedding in a chat client
export * from './types';
export { CommandDispatcher, VERSION } from './command-dispatcher';
export type { DispatcherOptions } from './command-dispatcher';
export { StatusCorrelator, RPL_STATSLINKINFO, ERR_NOPRIVILEGES } from './status-correlator';
export type { StatusReplyOutcome } from './status-correlator';
export { LookupExecutor, sanitizeReply, spawnFetchWorker } from './lookup-executor';
export type { WorkerFactory } from './lookup-executor';
export { FloodController } from './flood-controller';
export { RequestCoordinator } from './request-coordinator';
export { ReplyFormatter, PREFIX_LABELS } from './reply-formatter';
export { ConfigParser, DEFAULT_CONFIG } from './config-parser';
export { AuditLogger } from './audit-logger';
export { CLI } from './cli';
export * from './address-classifier';
