/**
 * Host System Probe
 * Looks up executables on PATH, reads tool versions and checks file access
 */

import { access } from 'fs/promises';
import { constants } from 'fs';
import { delimiter, join } from 'path';
import { runCommand } from '../../services/commandRunner.js';
import type { CommandRunner } from '../../services/commandRunner.js';
import { expandHome } from '../../utils/helpers.js';
import type { SystemProbe } from './validation.types.js';

const VERSION_PATTERN = /v?(\d+\.\d+\.\d+)/;

/**
 * Extract the first dotted x.y.z version from tool output
 */
export function extractVersion(text: string): string | undefined {
  return VERSION_PATTERN.exec(text)?.[1];
}

async function canAccess(path: string, mode: number): Promise<boolean> {
  try {
    await access(path, mode);
    return true;
  } catch {
    return false;
  }
}

export class HostSystemProbe implements SystemProbe {
  private readonly run: CommandRunner;
  private readonly pathVariable: string;

  constructor(run: CommandRunner = runCommand, pathVariable: string = process.env.PATH ?? '') {
    this.run = run;
    this.pathVariable = pathVariable;
  }

  async findExecutable(binary: string): Promise<string | undefined> {
    for (const dir of this.pathVariable.split(delimiter)) {
      if (!dir) continue;
      const candidate = join(dir, binary);
      if (await canAccess(candidate, constants.X_OK)) {
        return candidate;
      }
    }
    return undefined;
  }

  async readVersion(
    binary: string,
    args: string[],
    signal?: AbortSignal
  ): Promise<string | undefined> {
    const result = await this.run(binary, args, { signal, timeoutMs: 15_000 });
    return extractVersion(`${result.stdout}\n${result.stderr}`);
  }

  isReadable(path: string): Promise<boolean> {
    return canAccess(expandHome(path), constants.R_OK);
  }
}
