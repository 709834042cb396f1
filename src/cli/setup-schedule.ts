#!/usr/bin/env node
import { readFile, writeFile, rename, rm } from 'fs/promises';
import { realpathSync } from 'fs';
import { basename, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { runSetupPipeline } from '../features/screenplay/pipeline.js';
import { ErrorReporter, ErrorCategory } from '../utils/error-reporter.js';
import {
  parseCliOptions,
  deriveOutputPath,
  SCHEDULE_PREFIX,
  SCREENPLAY_PREFIX,
  USAGE,
  type CliOptions,
} from './options.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface PlannedOutput {
  label: string;
  path: string;
  content: string;
}

function planOutputs(options: CliOptions, schedule: string, screenplay: string): PlannedOutput[] {
  const planned: PlannedOutput[] = [];
  if (options.mode !== 'screenplay') {
    planned.push({
      label: 'Shooting schedule',
      path: options.output ?? deriveOutputPath(options.input, SCHEDULE_PREFIX),
      content: schedule,
    });
  }
  if (options.mode !== 'schedule') {
    planned.push({
      label: 'Annotated screenplay',
      path: options.screenplayOutput ?? deriveOutputPath(options.input, SCREENPLAY_PREFIX),
      content: screenplay,
    });
  }
  return planned;
}

class OutputWriteError extends Error {
  constructor(public readonly path: string, cause: unknown) {
    super(`Could not write ${path}`, { cause });
    this.name = 'OutputWriteError';
  }
}

function tempPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
}

/**
 * All-or-nothing: every view goes to a sibling temp file first, and only when all of
 * them are on disk are they renamed into place. On any failure the temps and the
 * outputs already renamed are removed.
 */
export async function commitOutputs(planned: readonly PlannedOutput[]): Promise<void> {
  const discard = (paths: readonly string[]) => Promise.all(paths.map(p => rm(p, { force: true })));
  const temps = planned.map(out => tempPathFor(out.path));

  for (const [i, out] of planned.entries()) {
    try {
      await writeFile(temps[i] ?? tempPathFor(out.path), out.content, 'utf-8');
    } catch (e) {
      await discard(temps);
      throw new OutputWriteError(out.path, e);
    }
  }

  const committed: string[] = [];
  for (const [i, out] of planned.entries()) {
    try {
      await rename(temps[i] ?? tempPathFor(out.path), out.path);
    } catch (e) {
      await discard([...temps.slice(i), ...committed]);
      throw new OutputWriteError(out.path, e);
    }
    committed.push(out.path);
  }
}

/** True when `argv1` (possibly a bin symlink) resolves to the module at `moduleUrl`. */
export function isDirectRun(argv1: string | undefined, moduleUrl: string): boolean {
  if (!argv1) return false;
  try {
    return realpathSync(argv1) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

/**
 * Reads the screenplay, regroups it by setup and writes the requested views.
 * Nothing is written unless every view rendered. Returns the process exit code.
 */
export async function main(args: readonly string[], reporter = new ErrorReporter()): Promise<number> {
  const parsed = parseCliOptions(args);
  if (!parsed.success) {
    reporter.report(parsed.errors, {
      category: ErrorCategory.VALIDATION,
      context: { issues: parsed.errors.issues.map(i => i.message) },
    });
    console.error(USAGE);
    return EXIT_USAGE;
  }
  if (parsed.help) {
    console.log(USAGE);
    return EXIT_OK;
  }
  const { options } = parsed;

  console.log(`📖 Loading screenplay from ${options.input}...`);
  let text: string;
  try {
    text = await readFile(options.input, 'utf-8');
  } catch (e) {
    reporter.report(e instanceof Error ? e : new Error(String(e)), {
      category: ErrorCategory.FILE_SYSTEM,
      context: { operation: 'read-input', path: options.input },
    });
    return EXIT_FAILURE;
  }

  console.log('🎬 Regrouping by camera setup...');
  const result = runSetupPipeline(text, { title: basename(options.input) });
  if (!result.success) {
    reporter.report(result.error, {
      category: ErrorCategory.PARSING,
      context: { scene: result.error.sceneIndex, setup: result.error.letter },
    });
    return EXIT_FAILURE;
  }

  const { stats } = result;
  console.log(`   ✓ ${result.document.lines.length} lines, ${stats.scenes} scenes, ${stats.segments} segments`);
  console.log(`   ✓ ${stats.setups.length} setups: ${stats.setups.map(s => s.letter).join(', ') || 'none'}`);
  if (stats.unattributedSegments > 0) {
    console.warn(`   (warn) ${stats.unattributedLines} lines precede any setup marker and are left out of both views`);
  }
  if (options.verbose) {
    for (const s of stats.setups) {
      console.log(`   - SETUP ${s.letter}: ${s.segmentCount} segments, scenes ${s.sceneIndexes.join(', ')}, ${s.lineCount} lines`);
      for (const d of s.descriptions) console.log(`       ${d}`);
    }
  }

  const planned = planOutputs(options, result.schedule, result.screenplay);
  try {
    await commitOutputs(planned);
  } catch (e) {
    const failure = e instanceof OutputWriteError ? e : new OutputWriteError('', e);
    reporter.report(failure.cause instanceof Error ? failure.cause : failure, {
      category: ErrorCategory.FILE_SYSTEM,
      context: { operation: 'write-output', path: failure.path },
    });
    return EXIT_FAILURE;
  }
  for (const out of planned) console.log(`✅ ${out.label} saved to ${out.path}`);
  return EXIT_OK;
}

// Only execute if invoked directly (not when imported for tests)
if (isDirectRun(process.argv[1], import.meta.url)) {
  main(process.argv.slice(2)).then(
    (code) => { process.exitCode = code; },
    (e) => {
      console.error('\n❌ Error:', e);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
