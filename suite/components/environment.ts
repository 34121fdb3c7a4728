// suite/components/environment.ts
import * as os from 'node:os';
import { fileURLToPath } from 'node:url';

import fs from 'fs-extra';

import type { EnvironmentInfo } from '../types/recorder.ts';

const PACKAGE_JSON = fileURLToPath(new URL('../../package.json', import.meta.url));

function readLibraryVersion(): string {
  let pkg: unknown;
  try {
    pkg = fs.readJsonSync(PACKAGE_JSON);
  } catch {
    return 'unknown';
  }
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

export function collectEnvironmentInfo(): EnvironmentInfo {
  return {
    libraryVersion: readLibraryVersion(),
    runtimeVersion: process.version,
    osVersion: `${os.type()} ${os.release()}`,
  };
}

/** Comment lines printed under "Test run started." */
export function environmentComments(info: EnvironmentInfo): string[] {
  return [
    `Node.js Version: ${info.runtimeVersion}`,
    `Testing Library Version: ${info.libraryVersion}`,
    `OS Version: ${info.osVersion}`,
  ];
}
