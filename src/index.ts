/**
 * Application Entry Point
 *
 * @module index
 */

import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { main } from './server.js';

const MINIMUM_NODE_MAJOR = 20;

/**
 * Check that the runtime is new enough to run the service
 */
export function checkRuntime(nodeVersion: string = process.version): boolean {
  const majorVersion = parseInt(nodeVersion.slice(1).split('.')[0] ?? '0', 10);

  if (majorVersion < MINIMUM_NODE_MAJOR) {
    console.error(
      `[INIT] ERROR: Node.js version ${nodeVersion} is not supported. Minimum required version is ${MINIMUM_NODE_MAJOR}.0.0`
    );
    return false;
  }

  return true;
}

const isMainModule = process.argv[1]
  ? resolve(fileURLToPath(import.meta.url)) === resolve(process.argv[1])
  : false;

if (isMainModule) {
  if (!checkRuntime()) {
    process.exit(1);
  }

  main().catch((error: unknown) => {
    console.error('[MAIN] Unhandled error during initialization:', error);
    process.exit(1);
  });
}
