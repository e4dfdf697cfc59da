#!/usr/bin/env node
/**
 * orgsite CLI Entry Point
 *
 * Parses command line arguments and dispatches to appropriate command handlers.
 */

import { existsSync, realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { buildCommand } from "./commands/build.js";

export const VERSION = "0.1.0";

const HELP_TEXT = `orgsite - static pages from outline files

Usage: orgsite build <source> [options]

Options:
  --dest <dir>, -d <dir>  Output directory (default: public)
  --metadata <file>       Also write the extracted article records as JSON
  --force                 Rewrite outputs even when they are up to date
  --verbose, -v           Show detailed progress
  --version               Print the version
  --help, -h              Show this help

Environment:
  ORGSITE_LOG             Log level (fatal, error, warn, info, debug, trace, silent)

Examples:
  orgsite build site                  Render site/ into public/
  orgsite build site -d /srv/www      Render into /srv/www
  orgsite build site --force          Rebuild everything
`;

export interface CLIOptions {
  command: "build";
  sourceDir: string;
  destDir: string;
  metadataFile?: string;
  force: boolean;
  verbose: boolean;
}

export interface ParsedArgs {
  command: "build" | null;
  source: string | null;
  dest: string;
  metadataFile: string | null;
  force: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
  errors: string[];
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: null,
    source: null,
    dest: "public",
    metadataFile: null,
    force: false,
    verbose: false,
    help: false,
    version: false,
    errors: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // Handle --key=value style args
    if (arg.startsWith("--dest=")) {
      result.dest = arg.slice("--dest=".length);
      continue;
    }
    if (arg.startsWith("--metadata=")) {
      result.metadataFile = arg.slice("--metadata=".length);
      continue;
    }

    switch (arg) {
      case "--dest":
      case "-d":
      case "--metadata": {
        const value = args[i + 1];
        if (value === undefined || value.startsWith("-")) {
          result.errors.push(`Missing value for ${arg}`);
          break;
        }
        i++;
        if (arg === "--metadata") {
          result.metadataFile = value;
        } else {
          result.dest = value;
        }
        break;
      }
      case "--force":
        result.force = true;
        break;
      case "--verbose":
      case "-v":
        result.verbose = true;
        break;
      case "--version":
        result.version = true;
        break;
      case "--help":
      case "-h":
        result.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          result.errors.push(`Unknown option: ${arg}`);
        } else if (result.command === null) {
          if (arg === "build") {
            result.command = "build";
          } else {
            result.errors.push(`Unknown command: ${arg}`);
          }
        } else if (result.source === null) {
          result.source = arg;
        } else {
          result.errors.push(`Unexpected argument: ${arg}`);
        }
    }
  }

  return result;
}

export function printHelp(): void {
  console.log(HELP_TEXT);
}

export async function main(args: string[], cwd: string = process.cwd()): Promise<number> {
  const parsed = parseArgs(args);

  if (parsed.help) {
    printHelp();
    return 0;
  }

  if (parsed.version) {
    console.log(`orgsite ${VERSION}`);
    return 0;
  }

  if (parsed.errors.length > 0) {
    for (const error of parsed.errors) {
      console.error(`Error: ${error}`);
    }
    console.error("Run 'orgsite --help' for usage information");
    return 1;
  }

  if (parsed.command === null || parsed.source === null) {
    printHelp();
    return 1;
  }

  const sourceDir = resolve(cwd, parsed.source);
  if (!existsSync(sourceDir)) {
    console.error(`Error: source directory ${sourceDir} not found`);
    return 1;
  }

  const options: CLIOptions = {
    command: parsed.command,
    sourceDir,
    destDir: resolve(cwd, parsed.dest),
    metadataFile: parsed.metadataFile === null ? undefined : resolve(cwd, parsed.metadataFile),
    force: parsed.force,
    verbose: parsed.verbose,
  };

  return buildCommand(options);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint()) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err) => {
      console.error("Fatal error:", err instanceof Error ? err.message : err);
      process.exit(1);
    });
}
