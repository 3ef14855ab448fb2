/**
 * Process Detector - classifies a command line by how it interacts
 *
 * Pattern tables live in process-patterns.json. Special commands are matched
 * on their first word before any pattern; patterns are tried from the most
 * specific group (dev servers) to the least specific (REPLs).
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

export type ProcessType =
  | 'oneshot'      // Runs and completes (ls, echo, ...)
  | 'interactive'  // Needs the user inside it (vim, top, ssh, ...)
  | 'persistent'   // Long-running, no input
  | 'watcher'      // File watchers and log followers
  | 'repl'         // Read-eval-print loops and assistants
  | 'devServer'    // Development servers
  | 'buildTool';   // Builds in watch mode

export interface ProcessInfo {
  type: ProcessType;
  command: string;
  requiresInput: boolean;
  isPersistent: boolean;
  needsPty: boolean;
  processName: string | null;
}

type PatternGroup = 'devServer' | 'watcher' | 'buildTool' | 'interactive' | 'repl';

const PATTERN_ORDER: readonly PatternGroup[] = ['devServer', 'watcher', 'buildTool', 'interactive', 'repl'];

const TYPE_FLAGS: Record<ProcessType, Pick<ProcessInfo, 'requiresInput' | 'isPersistent' | 'needsPty'>> = {
  oneshot: { requiresInput: false, isPersistent: false, needsPty: false },
  interactive: { requiresInput: true, isPersistent: true, needsPty: true },
  persistent: { requiresInput: false, isPersistent: true, needsPty: false },
  watcher: { requiresInput: false, isPersistent: true, needsPty: false },
  repl: { requiresInput: true, isPersistent: true, needsPty: true },
  devServer: { requiresInput: false, isPersistent: true, needsPty: false },
  buildTool: { requiresInput: false, isPersistent: true, needsPty: false },
};

const processTypeSchema = z.enum(['oneshot', 'interactive', 'persistent', 'watcher', 'repl', 'devServer', 'buildTool']);

const patternFileSchema = z.object({
  specialCommands: z.record(
    z.object({
      type: processTypeSchema,
      requiresInput: z.boolean(),
      isPersistent: z.boolean(),
      needsPty: z.boolean(),
    })
  ),
  patterns: z.object({
    devServer: z.array(z.string()),
    watcher: z.array(z.string()),
    buildTool: z.array(z.string()),
    interactive: z.array(z.string()),
    repl: z.array(z.string()),
  }),
});

export type ProcessPatternFile = z.infer<typeof patternFileSchema>;

const PATTERN_FILE_URL = new URL('./process-patterns.json', import.meta.url);

export function loadProcessPatterns(fileUrl: URL = PATTERN_FILE_URL): ProcessPatternFile {
  const raw: unknown = JSON.parse(readFileSync(fileUrl, 'utf-8'));
  return patternFileSchema.parse(raw);
}

export const DEFAULT_MAX_CACHE_ENTRIES = 500;

export interface ProcessDetectorOptions {
  /** Classified commands kept before the oldest entry is evicted */
  maxCacheEntries?: number;
}

export class ProcessDetector {
  private readonly specialCommands: ProcessPatternFile['specialCommands'];
  private readonly patterns: Record<PatternGroup, RegExp[]>;
  private readonly cache = new Map<string, ProcessInfo>();
  private readonly maxCacheEntries: number;

  constructor(table: ProcessPatternFile = loadProcessPatterns(), options: ProcessDetectorOptions = {}) {
    this.maxCacheEntries = Math.max(0, Math.floor(options.maxCacheEntries ?? DEFAULT_MAX_CACHE_ENTRIES));
    this.specialCommands = table.specialCommands;
    this.patterns = {
      devServer: table.patterns.devServer.map((source) => new RegExp(source)),
      watcher: table.patterns.watcher.map((source) => new RegExp(source)),
      buildTool: table.patterns.buildTool.map((source) => new RegExp(source)),
      interactive: table.patterns.interactive.map((source) => new RegExp(source)),
      repl: table.patterns.repl.map((source) => new RegExp(source)),
    };
  }

  detect(command: string): ProcessInfo {
    const clean = command.trim().toLowerCase();

    const cached = this.cache.get(clean);
    if (cached) {
      return cached;
    }

    const info = this.classify(command, clean);
    this.remember(clean, info);
    return info;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private remember(clean: string, info: ProcessInfo): void {
    if (this.maxCacheEntries === 0) {
      return;
    }
    // Insertion order: the first key is the oldest
    while (this.cache.size >= this.maxCacheEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        break;
      }
      this.cache.delete(oldest.value);
    }
    this.cache.set(clean, info);
  }

  private classify(command: string, clean: string): ProcessInfo {
    const firstWord = clean.split(/\s+/)[0] ?? '';
    const special = this.specialCommands[firstWord];
    if (special) {
      return {
        type: special.type,
        command,
        requiresInput: special.requiresInput,
        isPersistent: special.isPersistent,
        needsPty: special.needsPty,
        processName: firstWord,
      };
    }

    for (const group of PATTERN_ORDER) {
      if (this.patterns[group].some((pattern) => pattern.test(clean))) {
        return { type: group, command, ...TYPE_FLAGS[group], processName: extractProcessName(clean) };
      }
    }

    return { type: 'oneshot', command, ...TYPE_FLAGS.oneshot, processName: null };
  }
}

/**
 * "npm run dev" → "npm-dev", "python manage.py runserver" → "python-manage",
 * otherwise the first word.
 */
export function extractProcessName(clean: string): string {
  const parts = clean.split(/\s+/).filter(Boolean);
  const first = parts[0];
  if (first === undefined) {
    return 'unknown';
  }

  if (first === 'npm' && parts[1] === 'run' && parts[2] !== undefined) {
    return `npm-${parts[2]}`;
  }

  if (first === 'python' && parts[1]?.endsWith('.py')) {
    return `python-${parts[1].replace(/\.py$/, '')}`;
  }

  return first;
}
