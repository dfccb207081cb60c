/**
 * External command-line tools (poppler's pdftotext / pdfinfo).
 *
 * Tool locations are resolved once at startup. Resolution never fails: when a binary
 * can't be found the bare name is kept and the invocation fails later, which callers
 * degrade to their default value.
 */
import { execFile } from 'child_process';
import fs from 'fs';
import path from 'path';
import { ViewerConfig } from '../config.js';

export class ToolError extends Error {
  constructor(
    readonly tool: string,
    message: string,
    readonly exitCode: number | null = null,
    readonly stderr: string = '',
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

export interface ResolveOptions {
  pathEnv?: string;
  fallbackDir?: string;
}

function isExecutable(file: string): boolean {
  try {
    fs.accessSync(file, fs.constants.X_OK);
    return fs.statSync(file).isFile();
  } catch {
    return false;
  }
}

/**
 * First executable named `name` on the search path, else `<fallbackDir>/<name>` when it
 * exists, else `name` itself.
 */
export function resolveBinary(name: string, options: ResolveOptions = {}): string {
  const pathEnv = options.pathEnv ?? process.env.PATH ?? '';
  for (const dir of pathEnv.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (isExecutable(candidate)) return candidate;
  }

  if (options.fallbackDir) {
    const candidate = path.join(options.fallbackDir, name);
    if (fs.existsSync(candidate)) return candidate;
  }

  return name;
}

export interface ToolLocations {
  pdftotext: string;
  pdfinfo: string;
}

export function resolveToolLocations(
  config: Pick<ViewerConfig, 'toolFallbackDir' | 'pdftotextPath' | 'pdfinfoPath'>,
  pathEnv?: string,
): ToolLocations {
  const options = { pathEnv, fallbackDir: config.toolFallbackDir };
  const tools: ToolLocations = {
    pdftotext: config.pdftotextPath ?? resolveBinary('pdftotext', options),
    pdfinfo: config.pdfinfoPath ?? resolveBinary('pdfinfo', options),
  };

  for (const [name, location] of Object.entries(tools)) {
    if (location === name) {
      console.warn(`[TOOLS] ${name} not found on PATH or in ${config.toolFallbackDir}; calls will fail over to defaults`);
    } else {
      console.log(`[TOOLS] ${name} -> ${location}`);
    }
  }
  return tools;
}

export type ToolRunner = (file: string, args: string[]) => Promise<string>;

/**
 * Run a tool and resolve with its stdout. Spawn errors, timeouts and non-zero exits
 * reject with a ToolError.
 */
export function createToolRunner(timeoutMs: number): ToolRunner {
  return (file, args) =>
    new Promise((resolve, reject) => {
      execFile(
        file,
        args,
        { encoding: 'utf8', timeout: timeoutMs, maxBuffer: 64 * 1024 * 1024 },
        (error, stdout, stderr) => {
          if (error) {
            const exitCode = typeof error.code === 'number' ? error.code : null;
            reject(new ToolError(path.basename(file), `${path.basename(file)} failed: ${error.message}`, exitCode, stderr));
            return;
          }
          resolve(stdout);
        },
      );
    });
}
