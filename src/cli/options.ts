// src/cli/options.ts
import { basename, dirname, join } from "node:path";
import { z } from "zod";

export const OutputModeSchema = z.enum(["schedule", "screenplay", "all"]);
export type OutputMode = z.infer<typeof OutputModeSchema>;

export const CliOptionsSchema = z.object({
  input: z.string().min(1, "Input file path is required"),
  output: z.string().min(1).optional(),
  screenplayOutput: z.string().min(1).optional(),
  mode: OutputModeSchema.default("all"),
  verbose: z.boolean().default(false),
});
export type CliOptions = z.infer<typeof CliOptionsSchema>;

export const SCHEDULE_PREFIX = "SCHEDULE_";
export const SCREENPLAY_PREFIX = "SETUPSCREENPLAY_";

export const USAGE = [
  "Usage: npm run schedule -- <screenplay.fountain> [options]",
  "",
  "Options:",
  "  -o, --output <path>             shooting schedule output (default: SCHEDULE_<input>)",
  "  -s, --screenplay-output <path>  annotated screenplay output (default: SETUPSCREENPLAY_<input>)",
  "  -m, --mode <schedule|screenplay|all>  which views to write (default: all)",
  "  -v, --verbose                   print a per-setup summary",
  "  -h, --help                      show this message",
].join("\n");

const VALUE_FLAGS: Record<string, "output" | "screenplayOutput" | "mode"> = {
  "-o": "output",
  "--output": "output",
  "-s": "screenplayOutput",
  "--screenplay-output": "screenplayOutput",
  "-m": "mode",
  "--mode": "mode",
};

export type ParseOptionsResult =
  | { success: true; help: true }
  | { success: true; help: false; options: CliOptions }
  | { success: false; errors: z.ZodError };

function usageIssue(message: string): z.ZodError {
  return new z.ZodError([{ code: z.ZodIssueCode.custom, path: [], message }]);
}

/** Parses argv (without node and script) into validated options. */
export function parseCliOptions(args: readonly string[]): ParseOptionsResult {
  const raw: Record<string, unknown> = {};
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "-h" || arg === "--help") return { success: true, help: true };
    if (arg === "-v" || arg === "--verbose") {
      raw.verbose = true;
      continue;
    }
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq !== -1 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[flag];
    if (key) {
      const value = flag !== arg ? arg.slice(eq + 1) : args[++i];
      if (value === undefined) return { success: false, errors: usageIssue(`Missing value for ${flag}`) };
      raw[key] = value;
      continue;
    }
    if (arg.startsWith("-") && arg !== "-") {
      return { success: false, errors: usageIssue(`Unknown option ${arg}`) };
    }
    positionals.push(arg);
  }

  if (positionals.length > 1) {
    return { success: false, errors: usageIssue(`Unexpected argument ${positionals[1]}`) };
  }
  raw.input = positionals[0] ?? "";

  const parsed = CliOptionsSchema.safeParse(raw);
  return parsed.success
    ? { success: true, help: false, options: parsed.data }
    : { success: false, errors: parsed.error };
}

/** Keeps the input's directory, prefixes its file name. */
export function deriveOutputPath(inputPath: string, prefix: string): string {
  const dir = dirname(inputPath);
  const name = `${prefix}${basename(inputPath)}`;
  return dir === "." ? name : join(dir, name);
}
